import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Query, SchemaTypes, Types } from 'mongoose';
import { INVENTORY_RECORD_COLLECTION } from '../ledger/inventory-record.schema';

export type ProductDocument = HydratedDocument<Product>;

@Schema({ timestamps: true })
export class Product {
  @Prop({ type: String, required: true, index: true })
  inventoryName!: string;

  @Prop({ type: String, required: true })
  code!: string;

  @Prop({ type: String, required: true })
  description!: string;

  @Prop({ type: String, default: '' })
  group!: string;

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  initialBalance!: Types.Decimal128; // scale 3

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  initialUnitCost!: Types.Decimal128; // scale 2
}

export const ProductSchema = SchemaFactory.createForClass(Product);

ProductSchema.index({ inventoryName: 1, code: 1 }, { unique: true });
ProductSchema.index({ inventoryName: 1, group: 1 });

// Ledger rows reference products; a referenced product cannot be deleted.
ProductSchema.pre(
  /^(deleteOne|deleteMany|findOneAndDelete)$/,
  { query: true, document: false },
  async function (this: Query<unknown, ProductDocument>) {
    const scope = this.getFilter();
    const inventoryName: unknown = scope.inventoryName;
    const session = this.getOptions().session ?? null;
    const ids = await this.model.distinct('_id', scope).session(session);
    if (ids.length === 0) return;
    const referenced = await this.model.db
      .collection(INVENTORY_RECORD_COLLECTION)
      .findOne({ inventoryName, productId: { $in: ids } }, { session: session ?? undefined });
    if (referenced) {
      throw new Error('Product is referenced by ledger entries and cannot be deleted');
    }
  },
);
