import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import { ApiBadRequestResponse, ApiCreatedResponse, ApiOkResponse, ApiParam, ApiTags } from '@nestjs/swagger';
import { ParsePartitionPipe } from '../common/pipes/parse-partition.pipe';
import { ProductsService } from './products.service';
import { QueryProductsDto } from './dto/query-products.dto';
import { CreateInventoryDto } from './dto/create-inventory.dto';

@ApiTags('Inventories')
@Controller('inventories')
export class InventoriesController {
  constructor(private readonly service: ProductsService) {}

  @Get()
  @ApiOkResponse({ description: 'Names of the inventories holding data' })
  async list() {
    return this.service.listInventories();
  }

  @Post()
  @ApiCreatedResponse({ description: 'Name accepted' })
  @ApiBadRequestResponse({ description: 'Invalid name or inventory already exists' })
  async create(@Body() dto: CreateInventoryDto) {
    return this.service.createInventory(dto.name);
  }
}

@ApiTags('Products')
@ApiParam({ name: 'inventoryName', example: 'default' })
@Controller('inventories/:inventoryName/products')
export class ProductsController {
  constructor(private readonly service: ProductsService) {}

  @Get()
  @ApiOkResponse({ description: 'Products of the inventory ordered by code' })
  async list(
    @Param('inventoryName', ParsePartitionPipe) inventoryName: string,
    @Query() query: QueryProductsDto,
  ) {
    return this.service.listProducts(inventoryName, query);
  }
}
