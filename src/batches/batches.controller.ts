import { Controller, Get, Param } from '@nestjs/common';
import { ApiOkResponse, ApiParam, ApiTags } from '@nestjs/swagger';
import { ParsePartitionPipe } from '../common/pipes/parse-partition.pipe';
import { BatchesService } from './batches.service';

@ApiTags('Batches')
@ApiParam({ name: 'inventoryName', example: 'default' })
@Controller('inventories/:inventoryName')
export class BatchesController {
  constructor(private readonly service: BatchesService) {}

  @Get('batches')
  @ApiOkResponse({ description: 'Import batches, newest first' })
  async list(@Param('inventoryName', ParsePartitionPipe) inventoryName: string) {
    return this.service.listBatches(inventoryName);
  }

  @Get('last-update')
  @ApiOkResponse({ description: 'Completion time of the most recent import' })
  async lastUpdate(@Param('inventoryName', ParsePartitionPipe) inventoryName: string) {
    return this.service.getLastUpdate(inventoryName);
  }
}
