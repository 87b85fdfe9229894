import * as XLSX from 'xlsx';
import type { ColumnSchema } from './column-schemas';
import { resolveColumns } from './column-resolver';
import type {
  CanonicalTable,
  CellValue,
  ParsingEngine,
  RawRow,
  RawSheet,
} from './spreadsheet.types';

export type SniffedFormat = 'zip' | 'ole' | 'html' | 'unknown';

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);
const HTML_MARKERS = ['<html', '<table', '<!doctype html'];

export class UnreadableSpreadsheetError extends Error {
  constructor(
    readonly fileName: string,
    readonly attempts: string[],
  ) {
    super(`Could not read columns from "${fileName}"`);
    this.name = 'UnreadableSpreadsheetError';
  }
}

export function sniffFormat(content: Buffer): SniffedFormat {
  if (content.subarray(0, 4).equals(ZIP_MAGIC)) return 'zip';
  if (content.subarray(0, 4).equals(OLE_MAGIC)) return 'ole';
  const head = content.subarray(0, 1024).toString('utf8').trimStart().toLowerCase();
  if (HTML_MARKERS.some((m) => head.includes(m))) return 'html';
  return 'unknown';
}

/** Engines to try, most plausible first. */
export function enginesFor(format: SniffedFormat): ParsingEngine[] {
  return format === 'html' ? ['html', 'workbook'] : ['workbook'];
}

function dateCode(serial: number, date1904: boolean): string | null {
  // SSF works on the serial's calendar parts; no Date and no timezone involved.
  const code: unknown = XLSX.SSF.parse_date_code(serial, { date1904 });
  if (typeof code !== 'object' || code === null) return null;
  if (!('y' in code && 'm' in code && 'd' in code)) return null;
  const { y, m, d } = code;
  if (typeof y !== 'number' || typeof m !== 'number' || typeof d !== 'number') return null;
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(y, 4)}-${pad(m, 2)}-${pad(d, 2)}`;
}

function isDateFormat(format: unknown): boolean {
  return typeof format === 'string' && XLSX.SSF.is_date(format) === true;
}

/**
 * Cell value as the importers see it. Date-formatted serials become
 * `YYYY-MM-DD` text.
 */
export function readCell(cell: unknown, date1904 = false): CellValue {
  if (typeof cell !== 'object' || cell === null || !('t' in cell) || !('v' in cell)) return null;
  const { t, v } = cell;
  if (t === 'e' || t === 'z' || v == null) return null;
  if (typeof v === 'number') {
    if (t === 'n' && 'z' in cell && isDateFormat(cell.z)) return dateCode(v, date1904) ?? v;
    return v;
  }
  if (typeof v === 'string' || typeof v === 'boolean') return v;
  return String(v);
}

function parseWorkbook(content: Buffer, engine: ParsingEngine): XLSX.WorkBook {
  if (engine === 'html') {
    // Table text stays text; codes keep their zeros and dates are not guessed.
    return XLSX.read(content.toString('utf8'), { type: 'string', raw: true });
  }
  return XLSX.read(content, { type: 'buffer', cellDates: false, cellNF: true });
}

/** First worksheet as a grid anchored at A1, so positions stay absolute. */
export function sheetRows(workbook: XLSX.WorkBook): RawRow[] {
  const firstName = workbook.SheetNames[0];
  const sheet = firstName === undefined ? undefined : workbook.Sheets[firstName];
  const ref = sheet?.['!ref'];
  if (!sheet || !ref) return [];

  const date1904 = workbook.Workbook?.WBProps?.date1904 === true;
  const { e } = XLSX.utils.decode_range(ref);
  const rows: RawRow[] = [];
  for (let r = 0; r <= e.r; r++) {
    const row: CellValue[] = [];
    for (let c = 0; c <= e.c; c++) {
      const cell: unknown = sheet[XLSX.utils.encode_cell({ r, c })];
      row.push(readCell(cell, date1904));
    }
    rows.push(row);
  }
  return rows;
}

export function readSheets(content: Buffer): { sheets: RawSheet[]; failures: string[] } {
  const sheets: RawSheet[] = [];
  const failures: string[] = [];
  for (const engine of enginesFor(sniffFormat(content))) {
    try {
      const rows = sheetRows(parseWorkbook(content, engine));
      if (rows.length === 0) {
        failures.push(`${engine}: no worksheet data`);
      } else {
        sheets.push({ engine, rows });
      }
    } catch (err: unknown) {
      failures.push(`${engine}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return { sheets, failures };
}

/**
 * Parses an uploaded spreadsheet and maps it onto the schema's canonical
 * columns. Throws {@link UnreadableSpreadsheetError} when no engine and
 * strategy combination yields every required column.
 */
export function loadSpreadsheet<K extends string>(
  fileName: string,
  content: Buffer,
  schema: ColumnSchema<K>,
): CanonicalTable<K> {
  const { sheets, failures } = readSheets(content);
  const resolution = resolveColumns(schema, sheets);
  if (!resolution.ok) {
    throw new UnreadableSpreadsheetError(fileName, [...failures, ...resolution.attempts]);
  }
  return resolution.table;
}
