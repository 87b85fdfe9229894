import { Controller, Param, Post, UploadedFiles, UseInterceptors } from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConsumes,
  ApiCreatedResponse,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { ParsePartitionPipe } from '../common/pipes/parse-partition.pipe';
import { ImportsService } from './imports.service';

export const MAX_UPDATE_FILES = 50;

interface ImportUploads {
  base_file?: Express.Multer.File[];
  update_files?: Express.Multer.File[];
}

@ApiTags('Imports')
@ApiParam({ name: 'inventoryName', example: 'default' })
@Controller('inventories/:inventoryName')
export class ImportsController {
  constructor(private readonly service: ImportsService) {}

  @Post('imports')
  @UseInterceptors(
    FileFieldsInterceptor([
      { name: 'base_file', maxCount: 1 },
      { name: 'update_files', maxCount: MAX_UPDATE_FILES },
    ]),
  )
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        base_file: { type: 'string', format: 'binary' },
        update_files: { type: 'array', items: { type: 'string', format: 'binary' } },
      },
    },
  })
  @ApiCreatedResponse({ description: 'Batch imported' })
  @ApiBadRequestResponse({
    description: 'Wrong file type, empty or unreadable file, base rules, or nothing imported',
  })
  async upload(
    @Param('inventoryName', ParsePartitionPipe) inventoryName: string,
    @UploadedFiles() uploads: ImportUploads | undefined,
  ) {
    const result = await this.service.importInventory(inventoryName, {
      baseFile: uploads?.base_file?.[0],
      updateFiles: uploads?.update_files ?? [],
    });
    return { ok: true, ...result };
  }
}
