import { Injectable } from '@nestjs/common';
import {
  InventoryRepository,
  LedgerEntryRow,
  ProductRow,
} from '../core/persistence/inventory.repository';
import {
  fromThousandths,
  mulQtyCost,
  sumMoney,
  sumQty,
  Thousandths,
  toThousandths,
} from '../common/decimal/decimal.util';
import { assessRotation, Rotation, YesNo, yesNo } from './rotation';
import { QueryAnalysisDto } from './dto/query-analysis.dto';
import { QueryMonthlyMovementsDto } from './dto/query-monthly-movements.dto';

export interface ProductAnalysis {
  productId: string;
  code: string;
  description: string;
  group: string;
  warehouses: string[];
  initialBalance: number;
  currentQuantity: number;
  unitCost: number;
  currentValue: number;
  consumed: YesNo;
  stagnant: YesNo;
  rotation: Rotation;
  highRotation: YesNo;
  balancePreYear: number;
  monthlyBalances: number[];
  lastMovementDate: string | null;
}

export interface MonthlyMovement {
  /** `YYYY-MM` */
  month: string;
  totalEntries: number;
  totalExits: number;
  closingBalance: number;
}

export interface InventorySummary {
  inventoryName: string;
  totalProducts: number;
  totalRecords: number;
  totalBatches: number;
  totalQuantity: number;
  totalValue: number;
  lastUpdate: string | null;
}

function monthKey(year: number, monthIndex: number): string {
  const d = new Date(Date.UTC(year, monthIndex, 1));
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}`;
}

function groupByProduct(entries: readonly LedgerEntryRow[]): Map<string, LedgerEntryRow[]> {
  const byProduct = new Map<string, LedgerEntryRow[]>();
  for (const entry of entries) {
    const list = byProduct.get(entry.productId);
    if (list) list.push(entry);
    else byProduct.set(entry.productId, [entry]);
  }
  return byProduct;
}

/**
 * Unit cost of the latest movement that carries one; entries are in ledger
 * order so the last non-zero cost wins.
 */
export function currentUnitCost(product: ProductRow, entries: readonly LedgerEntryRow[]): number {
  for (let i = entries.length - 1; i >= 0; i--) {
    if (entries[i].unitCost !== 0) return entries[i].unitCost;
  }
  return product.initialUnitCost;
}

export function currentStock(product: ProductRow, entries: readonly LedgerEntryRow[]): number {
  return sumQty([product.initialBalance, ...entries.map((e) => e.quantity)]);
}

function trimmed(value: string | undefined): string | undefined {
  const t = value?.trim();
  return t ? t : undefined;
}

@Injectable()
export class AnalyticsService {
  constructor(private readonly repository: InventoryRepository) {}

  async getAnalysis(
    inventoryName: string,
    query: QueryAnalysisDto = {},
    now: Date = new Date(),
  ): Promise<ProductAnalysis[]> {
    const search = trimmed(query.search);
    const category = trimmed(query.category);
    const warehouse = trimmed(query.warehouse);

    let products = await this.repository.findProducts(inventoryName, { search, group: category });

    if (warehouse) {
      const [details, moves] = await Promise.all([
        this.repository.findWarehouseDetails(inventoryName, { warehouse }),
        this.repository.findLedgerEntries(inventoryName, { warehouse }),
      ]);
      const present = new Set([...details.map((d) => d.productId), ...moves.map((m) => m.productId)]);
      products = products.filter((p) => present.has(p.id));
    }

    const narrowed = !!(search || category || warehouse);
    const productIds = products.map((p) => p.id);
    const [entries, details] = await Promise.all([
      this.repository.findLedgerEntries(inventoryName, narrowed ? { productIds } : {}),
      this.repository.findWarehouseDetails(inventoryName, narrowed ? { productIds } : {}),
    ]);
    const entriesByProduct = groupByProduct(entries);
    const detailWarehouses = new Map<string, Set<string>>();
    for (const d of details) {
      const set = detailWarehouses.get(d.productId) ?? new Set<string>();
      set.add(d.warehouse);
      detailWarehouses.set(d.productId, set);
    }

    const { dateFrom, dateTo } = query;
    if (dateFrom || dateTo) {
      products = products.filter((p) =>
        (entriesByProduct.get(p.id) ?? []).some(
          (e) => (!dateFrom || e.date >= dateFrom) && (!dateTo || e.date <= dateTo),
        ),
      );
    }

    const year = now.getFullYear();
    let rows = products.map((product) => {
      const own = entriesByProduct.get(product.id) ?? [];
      const quantity = currentStock(product, own);
      const unitCost = currentUnitCost(product, own);
      const assessment = assessRotation(product.initialBalance, own, year);
      const warehouses = new Set(detailWarehouses.get(product.id) ?? []);
      for (const e of own) if (e.warehouse) warehouses.add(e.warehouse);

      const row: ProductAnalysis = {
        productId: product.id,
        code: product.code,
        description: product.description,
        group: product.group,
        warehouses: [...warehouses].sort(),
        initialBalance: product.initialBalance,
        currentQuantity: quantity,
        unitCost,
        currentValue: mulQtyCost(quantity, unitCost),
        consumed: yesNo(quantity <= 0),
        stagnant: yesNo(assessment.stagnant),
        rotation: assessment.rotation,
        highRotation: yesNo(assessment.highRotation),
        balancePreYear: assessment.balancePreYear,
        monthlyBalances: assessment.monthlyBalances,
        lastMovementDate: own.length > 0 ? own[own.length - 1].date : null,
      };
      return row;
    });

    if (query.rotation) rows = rows.filter((r) => r.rotation === query.rotation);
    if (query.stagnant !== undefined) {
      rows = rows.filter((r) => r.stagnant === yesNo(query.stagnant === true));
    }
    if (query.highRotation !== undefined) {
      rows = rows.filter((r) => r.highRotation === yesNo(query.highRotation === true));
    }
    return query.limit ? rows.slice(0, query.limit) : rows;
  }

  /**
   * Entries, exits and closing balance for the twelve calendar months ending
   * with the month of `now`.
   */
  async getMonthlyMovements(
    inventoryName: string,
    query: QueryMonthlyMovementsDto = {},
    now: Date = new Date(),
  ): Promise<MonthlyMovement[]> {
    const search = trimmed(query.search);
    const category = trimmed(query.category);
    const warehouse = trimmed(query.warehouse);

    const products = await this.repository.findProducts(inventoryName, { search, group: category });
    const productIds = search || category ? products.map((p) => p.id) : undefined;

    let opening: Thousandths = 0n;
    if (warehouse) {
      const details = await this.repository.findWarehouseDetails(inventoryName, {
        productIds,
        warehouse,
      });
      for (const d of details) opening += toThousandths(d.initialQuantity);
    } else {
      for (const p of products) opening += toThousandths(p.initialBalance);
    }

    const entries = await this.repository.findLedgerEntries(inventoryName, { productIds, warehouse });

    const months = Array.from({ length: 12 }, (_, i) =>
      monthKey(now.getFullYear(), now.getMonth() - 11 + i),
    );
    const windowStart = `${months[0]}-01`;
    const byMonth = new Map(months.map((m) => [m, { entries: 0n, exits: 0n }]));
    for (const e of entries) {
      const quantity = toThousandths(e.quantity);
      if (e.date < windowStart) {
        opening += quantity;
        continue;
      }
      const bucket = byMonth.get(e.date.slice(0, 7));
      if (!bucket) continue;
      if (quantity > 0n) bucket.entries += quantity;
      else bucket.exits -= quantity;
    }

    let running = opening;
    return months.map((month) => {
      const bucket = byMonth.get(month) ?? { entries: 0n, exits: 0n };
      running += bucket.entries - bucket.exits;
      return {
        month,
        totalEntries: fromThousandths(bucket.entries),
        totalExits: fromThousandths(bucket.exits),
        closingBalance: fromThousandths(running),
      };
    });
  }

  async getSummary(inventoryName: string, now: Date = new Date()): Promise<InventorySummary> {
    const [rows, totalRecords, batches] = await Promise.all([
      this.getAnalysis(inventoryName, {}, now),
      this.repository.countLedgerEntries(inventoryName),
      this.repository.listBatches(inventoryName),
    ]);
    const processed = batches
      .map((b) => b.processedAt)
      .filter((d): d is Date => d !== null)
      .sort((a, b) => b.getTime() - a.getTime());

    return {
      inventoryName,
      totalProducts: rows.length,
      totalRecords,
      totalBatches: batches.length,
      totalQuantity: sumQty(rows.map((r) => Math.max(r.currentQuantity, 0))),
      totalValue: sumMoney(rows.map((r) => r.currentValue)),
      lastUpdate: processed.length > 0 ? processed[0].toISOString() : null,
    };
  }
}
