import type { Logger } from '@nestjs/common';

export interface RowFailure {
  fileName: string;
  /** 1-based sheet row, null when the failure is not tied to one row. */
  rowNumber: number | null;
  key: string;
  reason: string;
}

export interface PendingInsert<T> {
  item: T;
  rowNumber: number | null;
  key: string;
}

export interface InsertOutcome<T, R> {
  inserted: { pending: PendingInsert<T>; row: R }[];
  failures: RowFailure[];
}

export interface InsertOperations<T, R> {
  bulk(items: T[]): Promise<R[]>;
  single(item: T): Promise<R>;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += step) out.push(items.slice(i, i + step));
  return out;
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Inserts in chunks. A chunk whose bulk insert fails is retried one row at a
 * time; rows that still fail are returned as failures instead of aborting.
 */
export async function insertWithFallback<T, R>(
  fileName: string,
  pending: readonly PendingInsert<T>[],
  ops: InsertOperations<T, R>,
  chunkSize: number,
  logger: Logger,
): Promise<InsertOutcome<T, R>> {
  const outcome: InsertOutcome<T, R> = { inserted: [], failures: [] };

  for (const part of chunk(pending, chunkSize)) {
    try {
      const rows = await ops.bulk(part.map((p) => p.item));
      rows.forEach((row, i) => outcome.inserted.push({ pending: part[i], row }));
      continue;
    } catch (err: unknown) {
      logger.warn(
        `${fileName}: bulk insert of ${part.length} rows failed (${reasonOf(err)}), retrying one by one`,
      );
    }

    for (const p of part) {
      try {
        outcome.inserted.push({ pending: p, row: await ops.single(p.item) });
      } catch (err: unknown) {
        const reason = reasonOf(err);
        logger.warn(`${fileName}: row ${p.rowNumber ?? '-'} (${p.key}) rejected: ${reason}`);
        outcome.failures.push({ fileName, rowNumber: p.rowNumber, key: p.key, reason });
      }
    }
  }
  return outcome;
}
