import { ColumnSchema, schemaColumns } from './column-schemas';
import type {
  CanonicalRow,
  CanonicalTable,
  CellValue,
  RawRow,
  RawSheet,
} from './spreadsheet.types';

export const HEADER_ROW_CANDIDATES = [1, 2, 3, 4, 5] as const;

export type ResolveResult<K extends string> =
  | { ok: true; table: CanonicalTable<K> }
  | { ok: false; strategy: string; missing: K[] };

export type ResolveStrategy<K extends string> = (rows: RawRow[]) => ResolveResult<K>;

export type ColumnResolution<K extends string> =
  | { ok: true; table: CanonicalTable<K>; engine: RawSheet['engine'] }
  | { ok: false; attempts: string[] };

export function normalizeHeader(cell: CellValue | undefined): string {
  if (cell == null) return '';
  return String(cell).trim().toLowerCase().replace(/\s+/g, '_');
}

function isBlank(cell: CellValue | undefined): boolean {
  return cell == null || (typeof cell === 'string' && cell.trim() === '');
}

function lastFilledIndex(row: RawRow | undefined): number {
  if (!row) return -1;
  for (let i = row.length - 1; i >= 0; i--) {
    if (!isBlank(row[i])) return i;
  }
  return -1;
}

/**
 * Maps each canonical column to a header index. A header equal to the
 * canonical name wins, then synonyms in table order. A header index is
 * claimed at most once.
 */
export function matchHeaders<K extends string>(
  schema: ColumnSchema<K>,
  header: RawRow,
): { indexes: Partial<Record<K, number>>; missing: K[] } {
  const normalized = header.map(normalizeHeader);
  const claimed = new Set<number>();
  const indexes: Partial<Record<K, number>> = {};

  const claim = (name: string): number | undefined => {
    for (let i = 0; i < normalized.length; i++) {
      if (normalized[i] === name && !claimed.has(i)) return i;
    }
    return undefined;
  };

  for (const column of schemaColumns(schema)) {
    let index = claim(column.toLowerCase());
    for (const synonym of schema.synonyms[column]) {
      if (index !== undefined) break;
      index = claim(normalizeHeader(synonym));
    }
    if (index !== undefined) {
      claimed.add(index);
      indexes[column] = index;
    }
  }

  const missing = schema.required.filter((c) => indexes[c] === undefined);
  return { indexes, missing };
}

function buildTable<K extends string>(
  schema: ColumnSchema<K>,
  rows: RawRow[],
  headerRow: number,
  indexes: Partial<Record<K, number>>,
  strategy: string,
): CanonicalTable<K> {
  const columns = schemaColumns(schema);
  const out: CanonicalRow<K>[] = [];
  for (let r = headerRow; r < rows.length; r++) {
    const raw = rows[r] ?? [];
    if (raw.every(isBlank)) continue;
    const cells: Partial<Record<K, CellValue>> = {};
    for (const column of columns) {
      const index = indexes[column];
      cells[column] = index === undefined ? null : raw[index] ?? null;
    }
    out.push({ rowNumber: r + 1, cells });
  }
  return {
    columns: columns.filter((c) => indexes[c] !== undefined),
    headerRow,
    strategy,
    rows: out,
  };
}

export function synonymStrategy<K extends string>(
  schema: ColumnSchema<K>,
  headerRow: number,
): ResolveStrategy<K> {
  const strategy = `synonyms@row${headerRow}`;
  return (rows) => {
    const header = rows[headerRow - 1];
    if (!header) {
      return { ok: false, strategy, missing: [...schema.required] };
    }
    const { indexes, missing } = matchHeaders(schema, header);
    if (missing.length > 0) return { ok: false, strategy, missing };
    return { ok: true, table: buildTable(schema, rows, headerRow, indexes, strategy) };
  };
}

/**
 * Uses hard-coded column positions. The header row is the first candidate
 * row whose filled cells reach the right-most required position.
 */
export function positionalStrategy<K extends string>(
  schema: ColumnSchema<K>,
): ResolveStrategy<K> {
  const strategy = 'positions';
  const requiredPositions = schema.required.map((c) => schema.positions[c]);
  return (rows) => {
    const unmapped = schema.required.filter((c) => schema.positions[c] === undefined);
    if (unmapped.length > 0) return { ok: false, strategy, missing: unmapped };

    const widest = Math.max(...requiredPositions.map((p) => p ?? 0));
    const headerRow = HEADER_ROW_CANDIDATES.find(
      (r) => lastFilledIndex(rows[r - 1]) >= widest,
    );
    if (headerRow === undefined) {
      return { ok: false, strategy, missing: [...schema.required] };
    }
    return {
      ok: true,
      table: buildTable(schema, rows, headerRow, schema.positions, strategy),
    };
  };
}

export function headerRowOrder<K extends string>(schema: ColumnSchema<K>): number[] {
  return [...new Set<number>([schema.preferredHeaderRow, ...HEADER_ROW_CANDIDATES])];
}

/**
 * Runs the fallback ladder: synonym matching at every candidate header row
 * for each parsed sheet, then the positional layout for each parsed sheet.
 * The first success wins.
 */
export function resolveColumns<K extends string>(
  schema: ColumnSchema<K>,
  sheets: readonly RawSheet[],
): ColumnResolution<K> {
  const attempts: string[] = [];
  const ladder: ResolveStrategy<K>[] = headerRowOrder(schema).map((row) =>
    synonymStrategy(schema, row),
  );

  for (const sheet of sheets) {
    for (const strategy of ladder) {
      const result = strategy(sheet.rows);
      if (result.ok) return { ok: true, table: result.table, engine: sheet.engine };
      attempts.push(`${sheet.engine}/${result.strategy}: missing ${result.missing.join(', ')}`);
    }
  }

  const positional = positionalStrategy(schema);
  for (const sheet of sheets) {
    const result = positional(sheet.rows);
    if (result.ok) return { ok: true, table: result.table, engine: sheet.engine };
    attempts.push(`${sheet.engine}/${result.strategy}: no header row wide enough`);
  }

  return { ok: false, attempts };
}
