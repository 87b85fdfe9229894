import { Injectable, NotFoundException } from '@nestjs/common';
import {
  InventoryRepository,
  LedgerEntryRow,
  ProductRow,
} from '../core/persistence/inventory.repository';
import { fromThousandths, toThousandths } from '../common/decimal/decimal.util';
import { normalizeCode } from '../spreadsheet/value-normalizer';
import { QueryRecordsDto } from './dto/query-records.dto';

export interface LedgerRecordView {
  id: string;
  batchId: string;
  productCode: string;
  productDescription: string;
  warehouse: string;
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

export interface HistoryMovementView extends LedgerRecordView {
  /** Running stock after this movement. */
  balance: number;
}

function toRecordView(entry: LedgerEntryRow, product: ProductRow | undefined): LedgerRecordView {
  return {
    id: entry.id,
    batchId: entry.batchId,
    productCode: product?.code ?? '',
    productDescription: product?.description ?? '',
    warehouse: entry.warehouse,
    date: entry.date,
    documentType: entry.documentType,
    documentNumber: entry.documentNumber,
    quantity: entry.quantity,
    unitCost: entry.unitCost,
    total: entry.total,
    category: entry.category,
    lot: entry.lot,
    finalQuantity: entry.finalQuantity,
    costCenter: entry.costCenter,
  };
}

@Injectable()
export class LedgerService {
  constructor(private readonly repository: InventoryRepository) {}

  /** Newest movements first. */
  async listRecords(inventoryName: string, query: QueryRecordsDto = {}): Promise<LedgerRecordView[]> {
    let productIds: string[] | undefined;
    const search = query.search?.trim();
    if (search) {
      const matches = await this.repository.findProducts(inventoryName, { search });
      if (matches.length === 0) return [];
      productIds = matches.map((p) => p.id);
    }

    const entries = await this.repository.findLedgerEntries(
      inventoryName,
      {
        productIds,
        warehouse: query.warehouse?.trim() || undefined,
        category: query.category?.trim() || undefined,
        dateFrom: query.dateFrom,
        dateTo: query.dateTo,
      },
      { order: 'desc', limit: query.limit ?? 1000 },
    );
    if (entries.length === 0) return [];

    const ids = [...new Set(entries.map((e) => e.productId))];
    const products = await this.repository.findProducts(inventoryName, { ids });
    const byId = new Map(products.map((p) => [p.id, p]));
    return entries.map((e) => toRecordView(e, byId.get(e.productId)));
  }

  /**
   * Movements of one product in date order, each with the stock after it,
   * starting from the product's opening balance.
   */
  async getProductHistory(inventoryName: string, rawCode: string): Promise<HistoryMovementView[]> {
    const code = normalizeCode(rawCode);
    const product = code ? await this.repository.findProductByCode(inventoryName, code) : null;
    if (!product) throw new NotFoundException(`Product "${rawCode}" not found`);

    const entries = await this.repository.findLedgerEntries(
      inventoryName,
      { productIds: [product.id] },
      { order: 'asc' },
    );
    let balance = toThousandths(product.initialBalance);
    return entries.map((e) => {
      balance += toThousandths(e.quantity);
      return { ...toRecordView(e, product), balance: fromThousandths(balance) };
    });
  }
}
