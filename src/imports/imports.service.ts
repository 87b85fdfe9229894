import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InventoryRepository } from '../core/persistence/inventory.repository';
import { PartitionLock } from '../common/concurrency/partition-lock';
import { batchFingerprint, FingerprintInput } from '../batches/fingerprint';
import {
  BASE_SCHEMA,
  BaseColumn,
  ColumnSchema,
  MOVEMENT_SCHEMA,
  MovementColumn,
} from '../spreadsheet/column-schemas';
import { loadSpreadsheet, UnreadableSpreadsheetError } from '../spreadsheet/spreadsheet-reader';
import type { CanonicalTable } from '../spreadsheet/spreadsheet.types';
import { BaseImportOutcome, BaseSnapshotImporter } from './base-snapshot.importer';
import { MovementImporter, MovementImportOutcome } from './movement.importer';
import type { RowFailure } from './bulk-insert';
import { assertSpreadsheetUpload, UploadedSpreadsheet } from './upload-validation';

export interface ImportFiles {
  baseFile?: UploadedSpreadsheet;
  updateFiles?: UploadedSpreadsheet[];
}

export interface FileImportReport {
  fileName: string;
  role: 'base' | 'update';
  strategy: string;
  headerRow: number;
  rowsRead: number;
  imported: number;
  duplicates: number;
  skipped: number;
  errors: number;
}

export interface ImportResult {
  inventoryName: string;
  batchId: string;
  checksum: string;
  replacedBatchId: string | null;
  baseRecordCount: number;
  warehouseDetailCount: number;
  updateRecordCount: number;
  stubProductCount: number;
  duplicateCount: number;
  skippedRowCount: number;
  rowErrorCount: number;
  files: FileImportReport[];
  failures: RowFailure[];
}

interface ParsedFile<K extends string> {
  file: UploadedSpreadsheet;
  table: CanonicalTable<K>;
}

function baseReport(parsed: ParsedFile<BaseColumn>, outcome: BaseImportOutcome): FileImportReport {
  return {
    fileName: parsed.file.originalname,
    role: 'base',
    strategy: parsed.table.strategy,
    headerRow: parsed.table.headerRow,
    rowsRead: outcome.rowsRead,
    imported: outcome.productsCreated,
    duplicates: outcome.existingCodes,
    skipped: outcome.skippedRows,
    errors: outcome.failures.length,
  };
}

function movementReport(
  parsed: ParsedFile<MovementColumn>,
  outcome: MovementImportOutcome,
): FileImportReport {
  return {
    fileName: parsed.file.originalname,
    role: 'update',
    strategy: parsed.table.strategy,
    headerRow: parsed.table.headerRow,
    rowsRead: outcome.rowsRead,
    imported: outcome.created,
    duplicates: outcome.duplicates,
    skipped: outcome.skipped + outcome.zeroMovement,
    errors: outcome.errors,
  };
}

/**
 * Runs an upload end to end: validates the request, parses every file, then
 * writes the batch and its rows in one transaction under the partition lock.
 */
@Injectable()
export class ImportsService {
  private readonly logger = new Logger(ImportsService.name);

  constructor(
    private readonly repository: InventoryRepository,
    private readonly baseImporter: BaseSnapshotImporter,
    private readonly movementImporter: MovementImporter,
    private readonly lock: PartitionLock,
  ) {}

  async importInventory(inventoryName: string, files: ImportFiles): Promise<ImportResult> {
    const { baseFile } = files;
    const updateFiles = files.updateFiles ?? [];

    if (!baseFile && updateFiles.length === 0) {
      throw new BadRequestException('No file supplied: send base_file and/or update_files');
    }
    if (baseFile) assertSpreadsheetUpload(baseFile, 'base_file');
    for (const file of updateFiles) assertSpreadsheetUpload(file, 'update_files');

    const hasBase = await this.repository.hasProducts(inventoryName);
    if (baseFile && hasBase) {
      throw new BadRequestException(`The base file of inventory "${inventoryName}" is already loaded`);
    }
    if (updateFiles.length > 0 && !hasBase) {
      throw new BadRequestException(
        `Inventory "${inventoryName}" has no base file yet; upload the base file before updates`,
      );
    }

    const base = baseFile ? this.parse(baseFile, BASE_SCHEMA) : null;
    const updates = updateFiles.map((file) => this.parse(file, MOVEMENT_SCHEMA));

    const fingerprintInputs: FingerprintInput[] = [
      ...(baseFile ? [{ role: 'base' as const, content: baseFile.buffer }] : []),
      ...updateFiles.map((f) => ({ role: 'update' as const, content: f.buffer })),
    ];
    const checksum = batchFingerprint(fingerprintInputs);
    const fileNames = [
      ...(baseFile ? [baseFile.originalname] : []),
      ...updateFiles.map((f) => f.originalname),
    ];

    return this.lock.run(inventoryName, () =>
      this.repository.withTransaction(async (session) => {
        if (base && (await this.repository.hasProducts(inventoryName, session))) {
          throw new BadRequestException(
            `The base file of inventory "${inventoryName}" is already loaded`,
          );
        }

        let replacedBatchId: string | null = null;
        const previous = await this.repository.findBatchByChecksum(inventoryName, checksum, session);
        if (previous) {
          const removed = await this.repository.deleteBatch(inventoryName, previous.id, session);
          replacedBatchId = previous.id;
          this.logger.log(
            `Replacing batch ${previous.id} of "${inventoryName}" (${removed} ledger rows removed)`,
          );
        }

        const batch = await this.repository.createBatch(
          {
            inventoryName,
            fileNames,
            checksum,
            startedAt: new Date(),
            processedAt: null,
            rowsTotal: 0,
            rowsImported: 0,
          },
          session,
        );

        const reports: FileImportReport[] = [];
        const failures: RowFailure[] = [];
        let baseRecordCount = 0;
        let warehouseDetailCount = 0;
        let skippedRowCount = 0;
        let duplicateCount = 0;
        let rowErrorCount = 0;
        let stubProductCount = 0;
        let updateRecordCount = 0;

        if (base) {
          const outcome = await this.baseImporter.import(
            inventoryName,
            base.file.originalname,
            base.table,
            session,
          );
          reports.push(baseReport(base, outcome));
          failures.push(...outcome.failures);
          baseRecordCount = outcome.productsCreated;
          warehouseDetailCount = outcome.warehouseDetailsCreated;
          skippedRowCount += outcome.skippedRows;
          rowErrorCount += outcome.failures.length;
        }

        for (const update of updates) {
          const outcome = await this.movementImporter.import(
            inventoryName,
            batch.id,
            update.file.originalname,
            update.table,
            session,
          );
          reports.push(movementReport(update, outcome));
          failures.push(...outcome.failures);
          updateRecordCount += outcome.created;
          duplicateCount += outcome.duplicates;
          skippedRowCount += outcome.skipped + outcome.zeroMovement;
          rowErrorCount += outcome.errors;
          stubProductCount += outcome.stubProducts;
        }

        const rowsImported = baseRecordCount + updateRecordCount;
        if (rowsImported === 0) {
          // Throwing rolls back the batch and anything it replaced.
          throw new BadRequestException({
            message: 'No records were imported; nothing was saved',
            error: 'Bad Request',
            errors: { files: reports, failures },
          });
        }

        await this.repository.completeBatch(
          inventoryName,
          batch.id,
          {
            processedAt: new Date(),
            rowsTotal: reports.reduce((acc, r) => acc + r.rowsRead, 0),
            rowsImported,
          },
          session,
        );

        this.logger.log(
          `Imported batch ${batch.id} into "${inventoryName}": ${baseRecordCount} products, ` +
            `${updateRecordCount} movements, ${duplicateCount} duplicates, ${rowErrorCount} row errors`,
        );

        return {
          inventoryName,
          batchId: batch.id,
          checksum,
          replacedBatchId,
          baseRecordCount,
          warehouseDetailCount,
          updateRecordCount,
          stubProductCount,
          duplicateCount,
          skippedRowCount,
          rowErrorCount,
          files: reports,
          failures,
        };
      }),
    );
  }

  private parse<K extends string>(
    file: UploadedSpreadsheet,
    schema: ColumnSchema<K>,
  ): ParsedFile<K> {
    try {
      return { file, table: loadSpreadsheet(file.originalname, file.buffer, schema) };
    } catch (err: unknown) {
      if (err instanceof UnreadableSpreadsheetError) {
        this.logger.warn(`${err.message}: ${err.attempts.join('; ')}`);
        throw new BadRequestException({
          message: `${err.message} as a ${schema.name} file`,
          error: 'Bad Request',
          errors: err.attempts,
        });
      }
      throw err;
    }
  }
}
