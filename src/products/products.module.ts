import { Module } from '@nestjs/common';
import { InventoriesController, ProductsController } from './products.controller';
import { ProductsService } from './products.service';

@Module({
  controllers: [InventoriesController, ProductsController],
  providers: [ProductsService],
  exports: [ProductsService],
})
export class ProductsModule {}
