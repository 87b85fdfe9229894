import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class QueryMonthlyMovementsDto {
  @ApiPropertyOptional({ description: 'Warehouse contains' })
  @IsOptional()
  @IsString()
  warehouse?: string;

  @ApiPropertyOptional({ description: 'Product group contains' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional({ description: 'Search in product code and description' })
  @IsOptional()
  @IsString()
  search?: string;
}
