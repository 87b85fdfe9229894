import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class QueryProductsDto {
  @ApiPropertyOptional({ description: 'Search in code and description', example: 'TORNILLO' })
  @IsOptional()
  @IsString()
  search?: string;

  @ApiPropertyOptional({ description: 'Product group contains' })
  @IsOptional()
  @IsString()
  group?: string;
}
