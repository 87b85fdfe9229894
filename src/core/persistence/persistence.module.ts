import { Global, Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ImportBatch, ImportBatchSchema } from '../../batches/import-batch.schema';
import { Product, ProductSchema } from '../../products/product.schema';
import {
  WarehouseDetail,
  WarehouseDetailSchema,
} from '../../products/warehouse-detail.schema';
import {
  InventoryRecord,
  InventoryRecordSchema,
} from '../../ledger/inventory-record.schema';
import { InventoryRepository } from './inventory.repository';
import { MongoInventoryRepository } from './mongo-inventory.repository';

@Global()
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Product.name, schema: ProductSchema },
      { name: WarehouseDetail.name, schema: WarehouseDetailSchema },
      { name: ImportBatch.name, schema: ImportBatchSchema },
      { name: InventoryRecord.name, schema: InventoryRecordSchema },
    ]),
  ],
  providers: [{ provide: InventoryRepository, useClass: MongoInventoryRepository }],
  exports: [InventoryRepository],
})
export class PersistenceModule {}
