import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type ImportBatchDocument = HydratedDocument<ImportBatch>;

@Schema({ collection: 'import_batches' })
export class ImportBatch {
  @Prop({ type: String, required: true, index: true })
  inventoryName!: string;

  @Prop({ type: [String], default: [] })
  fileNames!: string[];

  // sha256 fingerprint of the uploaded file set
  @Prop({ type: String, required: true })
  checksum!: string;

  @Prop({ type: Date, required: true })
  startedAt!: Date;

  @Prop({ type: Date, default: null })
  processedAt!: Date | null;

  @Prop({ type: Number, default: 0 })
  rowsTotal!: number;

  @Prop({ type: Number, default: 0 })
  rowsImported!: number;
}

export const ImportBatchSchema = SchemaFactory.createForClass(ImportBatch);

ImportBatchSchema.index({ inventoryName: 1, checksum: 1 }, { unique: true });
ImportBatchSchema.index({ inventoryName: 1, startedAt: -1 });
