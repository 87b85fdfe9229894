import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { DateRangeQueryDto } from '../../common/dto/date-range.dto';
import { toBooleanFlag } from '../../common/dto/query-transforms';
import { Rotation, ROTATIONS } from '../rotation';

export class QueryAnalysisDto extends DateRangeQueryDto {
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

  @ApiPropertyOptional({ enum: ROTATIONS })
  @IsOptional()
  @IsIn(ROTATIONS)
  rotation?: Rotation;

  @ApiPropertyOptional({ description: 'Only stagnant (true) or only moving (false) products' })
  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  stagnant?: boolean;

  @ApiPropertyOptional({ description: 'Only products whose balance changed at least twice this year' })
  @IsOptional()
  @Transform(toBooleanFlag)
  @IsBoolean()
  highRotation?: boolean;

  @ApiPropertyOptional({ minimum: 1, maximum: 100000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100000)
  limit?: number;
}
