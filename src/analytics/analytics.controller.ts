import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOkResponse, ApiParam, ApiTags } from '@nestjs/swagger';
import { ParsePartitionPipe } from '../common/pipes/parse-partition.pipe';
import { AnalyticsService } from './analytics.service';
import { QueryAnalysisDto } from './dto/query-analysis.dto';
import { QueryMonthlyMovementsDto } from './dto/query-monthly-movements.dto';

@ApiTags('Analytics')
@ApiParam({ name: 'inventoryName', example: 'default' })
@Controller('inventories/:inventoryName')
export class AnalyticsController {
  constructor(private readonly service: AnalyticsService) {}

  @Get('analysis')
  @ApiOkResponse({ description: 'Stock, valuation and rotation per product' })
  async analysis(
    @Param('inventoryName', ParsePartitionPipe) inventoryName: string,
    @Query() query: QueryAnalysisDto,
  ) {
    return this.service.getAnalysis(inventoryName, query);
  }

  @Get('monthly-movements')
  @ApiOkResponse({ description: 'Entries, exits and closing balance for the last 12 months' })
  async monthlyMovements(
    @Param('inventoryName', ParsePartitionPipe) inventoryName: string,
    @Query() query: QueryMonthlyMovementsDto,
  ) {
    return this.service.getMonthlyMovements(inventoryName, query);
  }

  @Get('summary')
  @ApiOkResponse({ description: 'Inventory totals' })
  async summary(@Param('inventoryName', ParsePartitionPipe) inventoryName: string) {
    return this.service.getSummary(inventoryName);
  }
}
