import type { ClientSession } from 'mongoose';

/**
 * Opaque transaction handle. The Mongo implementation passes a driver
 * session; other implementations may pass null.
 */
export type StoreSession = ClientSession | null;

export interface ProductRow {
  id: string;
  inventoryName: string;
  code: string;
  description: string;
  group: string;
  initialBalance: number;
  initialUnitCost: number;
}
export type NewProduct = Omit<ProductRow, 'id'>;

export interface WarehouseDetailRow {
  id: string;
  inventoryName: string;
  productId: string;
  warehouse: string;
  initialQuantity: number;
  initialValue: number;
}
export type NewWarehouseDetail = Omit<WarehouseDetailRow, 'id'>;

export interface ImportBatchRow {
  id: string;
  inventoryName: string;
  fileNames: string[];
  checksum: string;
  startedAt: Date;
  processedAt: Date | null;
  rowsTotal: number;
  rowsImported: number;
}
export type NewImportBatch = Omit<ImportBatchRow, 'id'>;

export interface BatchCompletion {
  processedAt: Date;
  rowsTotal: number;
  rowsImported: number;
}

export interface LedgerEntryRow {
  id: string;
  inventoryName: string;
  batchId: string;
  productId: string;
  warehouse: string;
  /** Calendar day, `YYYY-MM-DD`. */
  date: string;
  documentType: string | null;
  documentNumber: string | null;
  quantity: number;
  unitCost: number;
  total: number;
  category: string;
  lot: string;
  finalQuantity: number | null;
  costCenter: string | null;
}
export type NewLedgerEntry = Omit<LedgerEntryRow, 'id'>;

/** The columns duplicate detection looks at. */
export type LedgerKey = Pick<
  LedgerEntryRow,
  'batchId' | 'productId' | 'documentType' | 'documentNumber' | 'costCenter' | 'date' | 'warehouse'
>;

export interface ProductFilter {
  ids?: string[];
  codes?: string[];
  /** Case-insensitive substring of code or description. */
  search?: string;
  /** Case-insensitive substring of group. */
  group?: string;
}

export interface LedgerFilter {
  productIds?: string[];
  /** Case-insensitive substring. */
  warehouse?: string;
  /** Case-insensitive substring. */
  category?: string;
  /** Inclusive bounds, `YYYY-MM-DD`. */
  dateFrom?: string;
  dateTo?: string;
}

export interface LedgerQueryOptions {
  order?: 'asc' | 'desc';
  limit?: number;
}

/**
 * Persistence port for one deployment. Every call is scoped to an inventory
 * partition; no method reads or writes across partitions except
 * {@link listPartitions}. Ledger queries return rows ordered by date, ties
 * broken by insertion order.
 */
export abstract class InventoryRepository {
  /** Runs `work` atomically: it all commits or nothing does. */
  abstract withTransaction<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;

  abstract listPartitions(): Promise<string[]>;

  abstract hasProducts(inventoryName: string, session?: StoreSession): Promise<boolean>;
  abstract findProducts(
    inventoryName: string,
    filter?: ProductFilter,
    session?: StoreSession,
  ): Promise<ProductRow[]>;
  abstract findProductByCode(inventoryName: string, code: string): Promise<ProductRow | null>;
  abstract insertProducts(rows: NewProduct[], session?: StoreSession): Promise<ProductRow[]>;
  abstract insertProduct(row: NewProduct, session?: StoreSession): Promise<ProductRow>;

  abstract insertWarehouseDetails(
    rows: NewWarehouseDetail[],
    session?: StoreSession,
  ): Promise<WarehouseDetailRow[]>;
  abstract insertWarehouseDetail(
    row: NewWarehouseDetail,
    session?: StoreSession,
  ): Promise<WarehouseDetailRow>;
  abstract findWarehouseDetails(
    inventoryName: string,
    filter?: { productIds?: string[]; warehouse?: string },
  ): Promise<WarehouseDetailRow[]>;

  abstract findBatchByChecksum(
    inventoryName: string,
    checksum: string,
    session?: StoreSession,
  ): Promise<ImportBatchRow | null>;
  abstract createBatch(row: NewImportBatch, session?: StoreSession): Promise<ImportBatchRow>;
  abstract completeBatch(
    inventoryName: string,
    batchId: string,
    completion: BatchCompletion,
    session?: StoreSession,
  ): Promise<void>;
  /** Deletes a batch with its ledger rows; returns how many ledger rows went. */
  abstract deleteBatch(
    inventoryName: string,
    batchId: string,
    session?: StoreSession,
  ): Promise<number>;
  /** Newest first. */
  abstract listBatches(inventoryName: string): Promise<ImportBatchRow[]>;

  abstract findLedgerKeys(
    inventoryName: string,
    productIds: string[],
    session?: StoreSession,
  ): Promise<LedgerKey[]>;
  abstract insertLedgerEntries(
    rows: NewLedgerEntry[],
    session?: StoreSession,
  ): Promise<LedgerEntryRow[]>;
  abstract insertLedgerEntry(row: NewLedgerEntry, session?: StoreSession): Promise<LedgerEntryRow>;
  abstract findLedgerEntries(
    inventoryName: string,
    filter?: LedgerFilter,
    options?: LedgerQueryOptions,
  ): Promise<LedgerEntryRow[]>;
  abstract countLedgerEntries(inventoryName: string): Promise<number>;
}
