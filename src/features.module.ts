import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AnalyticsModule } from './analytics/analytics.module';
import { BatchesModule } from './batches/batches.module';
import { ImportsModule } from './imports/imports.module';
import { LedgerModule } from './ledger/ledger.module';
import { ProductsModule } from './products/products.module';

/** HTTP features; they reach storage only through InventoryRepository. */
@Module({
  imports: [ImportsModule, BatchesModule, ProductsModule, LedgerModule, AnalyticsModule],
  controllers: [AppController],
})
export class FeaturesModule {}
