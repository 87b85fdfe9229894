import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, SchemaTypes, Types } from 'mongoose';

export type WarehouseDetailDocument = HydratedDocument<WarehouseDetail>;

/** Opening quantity and value of one product in one warehouse. */
@Schema({ collection: 'warehouse_details' })
export class WarehouseDetail {
  @Prop({ type: String, required: true, index: true })
  inventoryName!: string;

  @Prop({ type: SchemaTypes.ObjectId, ref: 'Product', required: true })
  productId!: Types.ObjectId;

  @Prop({ type: String, required: true })
  warehouse!: string;

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  initialQuantity!: Types.Decimal128;

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  initialValue!: Types.Decimal128;
}

export const WarehouseDetailSchema = SchemaFactory.createForClass(WarehouseDetail);

WarehouseDetailSchema.index({ inventoryName: 1, productId: 1, warehouse: 1 }, { unique: true });
