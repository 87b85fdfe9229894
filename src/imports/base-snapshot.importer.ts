import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  InventoryRepository,
  NewProduct,
  NewWarehouseDetail,
  StoreSession,
} from '../core/persistence/inventory.repository';
import {
  Cents,
  fromCents,
  fromThousandths,
  quantityOf,
  roundMoney,
  roundQty,
  sumMoney,
  sumQty,
  Thousandths,
  toCents,
  toThousandths,
  unitCostOf,
} from '../common/decimal/decimal.util';
import type { BaseColumn } from '../spreadsheet/column-schemas';
import type { CanonicalTable } from '../spreadsheet/spreadsheet.types';
import {
  normalizeCode,
  normalizeLabel,
  parseAmount,
  parseQuantity,
} from '../spreadsheet/value-normalizer';
import { insertWithFallback, PendingInsert, RowFailure } from './bulk-insert';

export interface BaseRow {
  rowNumber: number;
  code: string;
  description: string;
  group: string;
  warehouse: string;
  quantity: number;
  unitCost: number;
  totalValue: number;
}

export interface BaseProductAggregate {
  code: string;
  description: string;
  group: string;
  firstRow: number;
  quantity: number;
  totalValue: number;
  unitCost: number;
  warehouses: string[];
}

export interface BaseImportOutcome {
  rowsRead: number;
  productsCreated: number;
  warehouseDetailsCreated: number;
  skippedRows: number;
  existingCodes: number;
  failures: RowFailure[];
}

export function readBaseRows(table: CanonicalTable<BaseColumn>): { rows: BaseRow[]; skipped: number } {
  const rows: BaseRow[] = [];
  let skipped = 0;
  for (const { rowNumber, cells } of table.rows) {
    const code = normalizeCode(cells.code);
    const description = normalizeLabel(cells.description);
    if (!code || !description) {
      skipped++;
      continue;
    }
    rows.push({
      rowNumber,
      code,
      description,
      group: normalizeLabel(cells.group),
      warehouse: normalizeLabel(cells.warehouse),
      quantity: parseQuantity(cells.quantity),
      unitCost: parseAmount(cells.unitCost),
      totalValue: parseAmount(cells.totalValue),
    });
  }
  return { rows, skipped };
}

/**
 * Sets a quantity for lines that carry value but no quantity: derived from the
 * cost when one is known, otherwise the value is taken as units at cost 1.
 */
export function repairZeroQuantity(agg: BaseProductAggregate): BaseProductAggregate {
  if (agg.quantity !== 0 || agg.totalValue <= 0) return agg;
  if (agg.unitCost > 0) return { ...agg, quantity: quantityOf(agg.totalValue, agg.unitCost) };
  return { ...agg, quantity: roundQty(agg.totalValue), unitCost: 1 };
}

export function aggregateKey(row: Pick<BaseRow, 'code' | 'description' | 'group'>): string {
  return JSON.stringify([row.code, row.description, row.group]);
}

/**
 * Groups base rows by (code, description, group) in first-appearance order.
 * Unit cost is value-weighted; with zero total quantity the first row's cost
 * stands.
 */
export function aggregateBaseRows(rows: readonly BaseRow[]): BaseProductAggregate[] {
  const groups = new Map<string, { first: BaseRow; members: BaseRow[] }>();
  for (const row of rows) {
    const key = aggregateKey(row);
    const group = groups.get(key);
    if (group) group.members.push(row);
    else groups.set(key, { first: row, members: [row] });
  }

  return [...groups.values()].map(({ first, members }) => {
    const quantity = sumQty(members.map((r) => r.quantity));
    const totalValue = sumMoney(members.map((r) => r.totalValue));
    const warehouses = [...new Set(members.map((r) => r.warehouse).filter(Boolean))].sort();
    return repairZeroQuantity({
      code: first.code,
      description: first.description,
      group: first.group,
      firstRow: first.rowNumber,
      quantity,
      totalValue,
      unitCost: quantity !== 0 ? unitCostOf(totalValue, quantity) : first.unitCost,
      warehouses,
    });
  });
}

/** Per (code, warehouse) opening quantity and value, in first-appearance order. */
export function warehouseTotals(
  rows: readonly BaseRow[],
): Map<string, Map<string, { quantity: number; value: number }>> {
  const byCode = new Map<string, Map<string, { quantity: Thousandths; value: Cents }>>();
  for (const row of rows) {
    if (!row.warehouse) continue;
    let byWarehouse = byCode.get(row.code);
    if (!byWarehouse) {
      byWarehouse = new Map();
      byCode.set(row.code, byWarehouse);
    }
    const totals = byWarehouse.get(row.warehouse) ?? { quantity: 0n, value: 0n };
    totals.quantity += toThousandths(row.quantity);
    totals.value += toCents(row.totalValue);
    byWarehouse.set(row.warehouse, totals);
  }
  return new Map(
    [...byCode].map(([code, byWarehouse]) => [
      code,
      new Map(
        [...byWarehouse].map(([warehouse, t]) => [
          warehouse,
          { quantity: fromThousandths(t.quantity), value: fromCents(t.value) },
        ]),
      ),
    ]),
  );
}

@Injectable()
export class BaseSnapshotImporter {
  private readonly logger = new Logger(BaseSnapshotImporter.name);

  constructor(
    private readonly repository: InventoryRepository,
    private readonly config: ConfigService,
  ) {}

  private get chunkSize(): number {
    return this.config.get<number>('IMPORT_CHUNK_SIZE') ?? 500;
  }

  async import(
    inventoryName: string,
    fileName: string,
    table: CanonicalTable<BaseColumn>,
    session: StoreSession,
  ): Promise<BaseImportOutcome> {
    const { rows, skipped } = readBaseRows(table);
    const aggregates = aggregateBaseRows(rows);

    const existing = await this.repository.findProducts(
      inventoryName,
      { codes: [...new Set(aggregates.map((a) => a.code))] },
      session,
    );
    const taken = new Set(existing.map((p) => p.code));

    let existingCodes = 0;
    const pending: PendingInsert<NewProduct>[] = [];
    for (const agg of aggregates) {
      if (taken.has(agg.code)) {
        existingCodes++;
        continue;
      }
      taken.add(agg.code);
      pending.push({
        rowNumber: agg.firstRow,
        key: agg.code,
        item: {
          inventoryName,
          code: agg.code,
          description: agg.description,
          group: agg.group,
          initialBalance: roundQty(agg.quantity),
          initialUnitCost: roundMoney(agg.unitCost),
        },
      });
    }

    const products = await insertWithFallback(
      fileName,
      pending,
      {
        bulk: (items) => this.repository.insertProducts(items, session),
        single: (item) => this.repository.insertProduct(item, session),
      },
      this.chunkSize,
      this.logger,
    );

    // Only rows of the aggregates that became products feed warehouse details.
    const created = new Map(products.inserted.map(({ row }) => [row.code, row.id]));
    const createdKeys = new Set(products.inserted.map(({ row }) => aggregateKey(row)));
    const details: PendingInsert<NewWarehouseDetail>[] = [];
    const detailRows = rows.filter((r) => createdKeys.has(aggregateKey(r)));
    for (const [code, byWarehouse] of warehouseTotals(detailRows)) {
      const productId = created.get(code);
      if (!productId) continue;
      for (const [warehouse, totals] of byWarehouse) {
        details.push({
          rowNumber: null,
          key: `${code}@${warehouse}`,
          item: {
            inventoryName,
            productId,
            warehouse,
            initialQuantity: totals.quantity,
            initialValue: totals.value,
          },
        });
      }
    }

    const detailOutcome = await insertWithFallback(
      fileName,
      details,
      {
        bulk: (items) => this.repository.insertWarehouseDetails(items, session),
        single: (item) => this.repository.insertWarehouseDetail(item, session),
      },
      this.chunkSize,
      this.logger,
    );

    const outcome: BaseImportOutcome = {
      rowsRead: table.rows.length,
      productsCreated: products.inserted.length,
      warehouseDetailsCreated: detailOutcome.inserted.length,
      skippedRows: skipped,
      existingCodes,
      failures: [...products.failures, ...detailOutcome.failures],
    };
    this.logger.log(
      `${fileName}: ${outcome.productsCreated} products, ${outcome.warehouseDetailsCreated} warehouse details` +
        ` (${existingCodes} existing codes, ${skipped} rows without code or description)`,
    );
    return outcome;
  }
}
