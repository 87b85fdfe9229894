import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, Matches } from 'class-validator';

export const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class DateRangeQueryDto {
  @ApiPropertyOptional({ description: 'Inclusive lower bound (YYYY-MM-DD)', example: '2024-01-01' })
  @IsOptional()
  @Matches(DAY_PATTERN, { message: 'dateFrom must be YYYY-MM-DD' })
  dateFrom?: string;

  @ApiPropertyOptional({ description: 'Inclusive upper bound (YYYY-MM-DD)', example: '2024-12-31' })
  @IsOptional()
  @Matches(DAY_PATTERN, { message: 'dateTo must be YYYY-MM-DD' })
  dateTo?: string;
}
