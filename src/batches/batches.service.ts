import { Injectable } from '@nestjs/common';
import { ImportBatchRow, InventoryRepository } from '../core/persistence/inventory.repository';

export interface BatchView {
  id: string;
  fileNames: string[];
  checksum: string;
  startedAt: string;
  processedAt: string | null;
  rowsTotal: number;
  rowsImported: number;
}

export interface LastUpdateView {
  inventoryName: string;
  lastUpdate: string | null;
  batchId: string | null;
  fileNames: string[];
}

function toView(batch: ImportBatchRow): BatchView {
  return {
    id: batch.id,
    fileNames: batch.fileNames,
    checksum: batch.checksum,
    startedAt: batch.startedAt.toISOString(),
    processedAt: batch.processedAt ? batch.processedAt.toISOString() : null,
    rowsTotal: batch.rowsTotal,
    rowsImported: batch.rowsImported,
  };
}

@Injectable()
export class BatchesService {
  constructor(private readonly repository: InventoryRepository) {}

  async listBatches(inventoryName: string): Promise<BatchView[]> {
    const batches = await this.repository.listBatches(inventoryName);
    return batches.map(toView);
  }

  async getLastUpdate(inventoryName: string): Promise<LastUpdateView> {
    const batches = await this.repository.listBatches(inventoryName);
    let latest: ImportBatchRow | null = null;
    for (const batch of batches) {
      if (!batch.processedAt) continue;
      if (!latest?.processedAt || batch.processedAt > latest.processedAt) latest = batch;
    }
    return {
      inventoryName,
      lastUpdate: latest?.processedAt ? latest.processedAt.toISOString() : null,
      batchId: latest?.id ?? null,
      fileNames: latest?.fileNames ?? [],
    };
  }
}
