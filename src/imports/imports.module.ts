import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { PartitionLock } from '../common/concurrency/partition-lock';
import { ImportsController } from './imports.controller';
import { ImportsService } from './imports.service';
import { BaseSnapshotImporter } from './base-snapshot.importer';
import { MovementImporter } from './movement.importer';

@Module({
  imports: [
    // memory storage (no dest): files reach the service as buffers
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        limits: { fileSize: (config.get<number>('IMPORT_MAX_FILE_MB') ?? 25) * 1024 * 1024 },
      }),
    }),
  ],
  controllers: [ImportsController],
  providers: [ImportsService, BaseSnapshotImporter, MovementImporter, PartitionLock],
})
export class ImportsModule {}
