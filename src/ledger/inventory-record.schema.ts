import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import {
  CallbackWithoutResultAndOptionalError,
  HydratedDocument,
  SchemaTypes,
  Types,
} from 'mongoose';

export type InventoryRecordDocument = HydratedDocument<InventoryRecord>;

export const INVENTORY_RECORD_COLLECTION = 'inventoryrecords';

/** One stock movement. Quantity is signed: positive in, negative out. */
@Schema({ collection: INVENTORY_RECORD_COLLECTION })
export class InventoryRecord {
  @Prop({ type: String, required: true })
  inventoryName!: string;

  @Prop({ type: SchemaTypes.ObjectId, ref: 'ImportBatch', required: true, index: true })
  batchId!: Types.ObjectId;

  @Prop({ type: SchemaTypes.ObjectId, ref: 'Product', required: true })
  productId!: Types.ObjectId;

  @Prop({ type: String, default: '' })
  warehouse!: string;

  // UTC midnight of the movement day
  @Prop({ type: Date, required: true })
  date!: Date;

  @Prop({ type: String, default: null })
  documentType!: string | null;

  @Prop({ type: String, default: null })
  documentNumber!: string | null;

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  quantity!: Types.Decimal128;

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  unitCost!: Types.Decimal128;

  @Prop({ type: SchemaTypes.Decimal128, required: true })
  total!: Types.Decimal128;

  @Prop({ type: String, default: '' })
  category!: string;

  @Prop({ type: String, default: '' })
  lot!: string;

  @Prop({ type: SchemaTypes.Decimal128, default: null })
  finalQuantity!: Types.Decimal128 | null;

  @Prop({ type: String, default: null })
  costCenter!: string | null;
}

export const InventoryRecordSchema = SchemaFactory.createForClass(InventoryRecord);

// A document may list a product more than once only under different cost centers.
InventoryRecordSchema.index(
  {
    inventoryName: 1,
    batchId: 1,
    documentType: 1,
    documentNumber: 1,
    productId: 1,
    costCenter: 1,
  },
  { unique: true },
);
InventoryRecordSchema.index({ inventoryName: 1, productId: 1, date: 1 });
InventoryRecordSchema.index({ inventoryName: 1, warehouse: 1, date: 1 });
InventoryRecordSchema.index({ inventoryName: 1, documentType: 1, documentNumber: 1 });

// Append-only: rows leave only together with their batch.
const appendOnlyError = function (next: CallbackWithoutResultAndOptionalError) {
  next(new Error('InventoryRecord is append-only'));
};
InventoryRecordSchema.pre('updateOne', { query: true, document: false }, appendOnlyError);
InventoryRecordSchema.pre('updateMany', { query: true, document: false }, appendOnlyError);
InventoryRecordSchema.pre('findOneAndUpdate', { query: true, document: false }, appendOnlyError);
InventoryRecordSchema.pre('replaceOne', { query: true, document: false }, appendOnlyError);
