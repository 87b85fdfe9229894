import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { MAX_INVENTORY_NAME_LENGTH } from '../../common/pipes/parse-partition.pipe';

export class CreateInventoryDto {
  @ApiProperty({ example: 'warehouse-north' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_INVENTORY_NAME_LENGTH)
  name!: string;
}
