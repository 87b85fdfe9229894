import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  InventoryRepository,
  LedgerKey,
  NewLedgerEntry,
  NewProduct,
  ProductRow,
  StoreSession,
} from '../core/persistence/inventory.repository';
import {
  divRound,
  fromThousandths,
  mulQtyCost,
  QTY_SCALE,
  scaledToString,
  unitCostOf,
} from '../common/decimal/decimal.util';
import type { MovementColumn } from '../spreadsheet/column-schemas';
import type { CanonicalRow, CanonicalTable } from '../spreadsheet/spreadsheet.types';
import {
  coerceNumeric,
  normalizeCode,
  normalizeLabel,
  optionalText,
  parseAmount,
  parseDocument,
  parseLedgerDate,
} from '../spreadsheet/value-normalizer';
import { insertWithFallback, PendingInsert, RowFailure } from './bulk-insert';

export interface MovementImportOutcome {
  rowsRead: number;
  created: number;
  duplicates: number;
  zeroMovement: number;
  /** Rows without code, date or document. */
  skipped: number;
  /** Rows rejected for bad data or failed inserts. */
  errors: number;
  stubProducts: number;
  failures: RowFailure[];
}

type KeyParts = Pick<LedgerKey, 'productId' | 'documentType' | 'documentNumber' | 'costCenter'>;

/** Identity of a movement across batches. */
export function movementKey(k: KeyParts & Pick<LedgerKey, 'date' | 'warehouse'>): string {
  return JSON.stringify([k.documentType, k.documentNumber, k.productId, k.costCenter, k.date, k.warehouse]);
}

/** Identity enforced by the unique index within one batch. */
export function batchKey(batchId: string, k: KeyParts): string {
  return JSON.stringify([batchId, k.documentType, k.documentNumber, k.productId, k.costCenter]);
}

/** Net cells are compared at six decimals before rounding to the ledger's three. */
const NET_SCALE = 6;

export type MovementAmounts =
  | { kind: 'zero' }
  | { kind: 'belowPrecision'; net: string }
  | { kind: 'movement'; quantity: number; unitCost: number; total: number };

/**
 * Signed quantity and costs of one movement row. Exits count negative; a
 * missing total is |quantity| x unit cost and a missing unit cost is
 * total / |quantity|. A net that is not zero but rounds to 0.000 is reported
 * apart from zero movements.
 */
export function movementAmounts(cells: CanonicalRow<MovementColumn>['cells']): MovementAmounts {
  const net = coerceNumeric(cells.entries, NET_SCALE) - coerceNumeric(cells.exits, NET_SCALE);
  if (net === 0n) return { kind: 'zero' };
  const thousandths = divRound(net, 10n ** BigInt(NET_SCALE - QTY_SCALE));
  if (thousandths === 0n) return { kind: 'belowPrecision', net: scaledToString(net, NET_SCALE) };

  const quantity = fromThousandths(thousandths);
  const magnitude = Math.abs(quantity);
  let unitCost = parseAmount(cells.unitCost);
  let total = parseAmount(cells.total);
  if (total === 0) total = mulQtyCost(magnitude, unitCost);
  if (unitCost === 0 && total !== 0) unitCost = unitCostOf(total, magnitude);
  return { kind: 'movement', quantity, unitCost, total };
}

function hasValue(cell: unknown): boolean {
  return cell != null && String(cell).trim() !== '';
}

@Injectable()
export class MovementImporter {
  private readonly logger = new Logger(MovementImporter.name);

  constructor(
    private readonly repository: InventoryRepository,
    private readonly config: ConfigService,
  ) {}

  private get chunkSize(): number {
    return this.config.get<number>('IMPORT_CHUNK_SIZE') ?? 500;
  }

  async import(
    inventoryName: string,
    batchId: string,
    fileName: string,
    table: CanonicalTable<MovementColumn>,
    session: StoreSession,
  ): Promise<MovementImportOutcome> {
    const outcome: MovementImportOutcome = {
      rowsRead: table.rows.length,
      created: 0,
      duplicates: 0,
      zeroMovement: 0,
      skipped: 0,
      errors: 0,
      stubProducts: 0,
      failures: [],
    };

    const rows: { row: CanonicalRow<MovementColumn>; code: string }[] = [];
    for (const row of table.rows) {
      const code = normalizeCode(row.cells.item);
      if (!code || !hasValue(row.cells.date) || !hasValue(row.cells.document)) {
        outcome.skipped++;
        continue;
      }
      rows.push({ row, code });
    }

    const products = await this.resolveProducts(inventoryName, fileName, rows, session, outcome);

    const known = await this.repository.findLedgerKeys(
      inventoryName,
      [...new Set([...products.values()].map((p) => p.id))],
      session,
    );
    const seenMovements = new Set(known.map(movementKey));
    const seenInBatch = new Set(
      known.filter((k) => k.batchId === batchId).map((k) => batchKey(batchId, k)),
    );

    const pending: PendingInsert<NewLedgerEntry>[] = [];
    for (const { row, code } of rows) {
      const product = products.get(code);
      if (!product) continue;
      const { cells, rowNumber } = row;

      const amounts = movementAmounts(cells);
      if (amounts.kind === 'zero') {
        outcome.zeroMovement++;
        continue;
      }
      if (amounts.kind === 'belowPrecision') {
        outcome.errors++;
        outcome.failures.push({
          fileName,
          rowNumber,
          key: code,
          reason: `Net quantity ${amounts.net} is below the ledger precision of 0.001`,
        });
        continue;
      }
      const { quantity, unitCost, total } = amounts;

      const date = parseLedgerDate(cells.date);
      if (!date.ok) {
        outcome.errors++;
        outcome.failures.push({ fileName, rowNumber, key: code, reason: date.reason });
        continue;
      }

      const document = parseDocument(cells.document);
      const entry: NewLedgerEntry = {
        inventoryName,
        batchId,
        productId: product.id,
        warehouse: normalizeLabel(cells.location),
        date: date.date,
        documentType: document.type,
        documentNumber: document.number,
        quantity,
        unitCost,
        total,
        category: normalizeLabel(cells.category),
        lot: normalizeLabel(cells.lot),
        finalQuantity: hasValue(cells.quantity)
          ? fromThousandths(coerceNumeric(cells.quantity, QTY_SCALE))
          : null,
        costCenter: optionalText(cells.costCenter),
      };

      const movement = movementKey(entry);
      const inBatch = batchKey(batchId, entry);
      if (seenMovements.has(movement) || seenInBatch.has(inBatch)) {
        outcome.duplicates++;
        continue;
      }
      seenMovements.add(movement);
      seenInBatch.add(inBatch);
      pending.push({
        rowNumber,
        key: `${code} ${document.type ?? ''}${document.number ?? ''}`.trim(),
        item: entry,
      });
    }

    const inserted = await insertWithFallback(
      fileName,
      pending,
      {
        bulk: (items) => this.repository.insertLedgerEntries(items, session),
        single: (item) => this.repository.insertLedgerEntry(item, session),
      },
      this.chunkSize,
      this.logger,
    );
    outcome.created = inserted.inserted.length;
    outcome.errors += inserted.failures.length;
    outcome.failures.push(...inserted.failures);

    this.logger.log(
      `${fileName}: ${outcome.created} movements, ${outcome.duplicates} duplicates,` +
        ` ${outcome.zeroMovement} zero-quantity, ${outcome.errors} errors, ${outcome.stubProducts} new products`,
    );
    return outcome;
  }

  /**
   * Looks up every code of the file at once and creates zero-balance products
   * for the ones the partition has never seen. Rows of codes whose product
   * cannot be created are counted as errors.
   */
  private async resolveProducts(
    inventoryName: string,
    fileName: string,
    rows: { row: CanonicalRow<MovementColumn>; code: string }[],
    session: StoreSession,
    outcome: MovementImportOutcome,
  ): Promise<Map<string, ProductRow>> {
    const codes = [...new Set(rows.map((r) => r.code))];
    const existing = await this.repository.findProducts(inventoryName, { codes }, session);
    const products = new Map(existing.map((p) => [p.code, p]));

    const stubs: PendingInsert<NewProduct>[] = [];
    const queued = new Set<string>();
    for (const { row, code } of rows) {
      if (products.has(code) || queued.has(code)) continue;
      queued.add(code);
      stubs.push({
        rowNumber: row.rowNumber,
        key: code,
        item: {
          inventoryName,
          code,
          description: normalizeLabel(row.cells.description) || `Product ${code}`,
          group: normalizeLabel(row.cells.category),
          initialBalance: 0,
          initialUnitCost: 0,
        },
      });
    }
    if (stubs.length === 0) return products;

    const created = await insertWithFallback(
      fileName,
      stubs,
      {
        bulk: (items) => this.repository.insertProducts(items, session),
        single: (item) => this.repository.insertProduct(item, session),
      },
      this.chunkSize,
      this.logger,
    );
    for (const { row } of created.inserted) products.set(row.code, row);
    outcome.stubProducts = created.inserted.length;

    for (const failure of created.failures) {
      const dropped = rows.filter((r) => r.code === failure.key).length;
      outcome.errors += dropped;
      outcome.failures.push({
        ...failure,
        reason: `product could not be created, ${dropped} rows dropped: ${failure.reason}`,
      });
    }
    return products;
  }
}
