import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiNotFoundResponse, ApiOkResponse, ApiParam, ApiTags } from '@nestjs/swagger';
import { ParsePartitionPipe } from '../common/pipes/parse-partition.pipe';
import { LedgerService } from './ledger.service';
import { QueryRecordsDto } from './dto/query-records.dto';

@ApiTags('Ledger')
@ApiParam({ name: 'inventoryName', example: 'default' })
@Controller('inventories/:inventoryName')
export class LedgerController {
  constructor(private readonly service: LedgerService) {}

  @Get('records')
  @ApiOkResponse({ description: 'Ledger rows, newest first' })
  async records(
    @Param('inventoryName', ParsePartitionPipe) inventoryName: string,
    @Query() query: QueryRecordsDto,
  ) {
    return this.service.listRecords(inventoryName, query);
  }

  @Get('products/:code/history')
  @ApiOkResponse({ description: 'Movements of one product in date order with running balance' })
  @ApiNotFoundResponse({ description: 'Unknown product code' })
  async history(
    @Param('inventoryName', ParsePartitionPipe) inventoryName: string,
    @Param('code') code: string,
  ) {
    return this.service.getProductHistory(inventoryName, code);
  }
}
