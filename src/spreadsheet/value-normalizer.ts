import {
  fromCents,
  fromThousandths,
  MONEY_SCALE,
  parseScaled,
  QTY_SCALE,
} from '../common/decimal/decimal.util';
import type { CellValue } from './spreadsheet.types';

const NULL_MARKERS = new Set(['', 'nan', 'none', 'null', 'n/a', '-']);
const PLAIN_DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const DOCUMENT_CODE = /(SA|EA)/;

export interface ParsedDocument {
  /** Usually `EA` (inward) or `SA` (outward). */
  type: string | null;
  number: string | null;
}

export type ParsedDate =
  | { ok: true; date: string }
  | { ok: false; reason: string };

function isNullLike(raw: CellValue | undefined): boolean {
  if (raw == null) return true;
  if (typeof raw === 'number') return Number.isNaN(raw);
  if (typeof raw === 'string') return NULL_MARKERS.has(raw.trim().toLowerCase());
  return false;
}

function cellText(raw: CellValue | undefined): string {
  return raw == null ? '' : String(raw);
}

/** Plain decimal text of a cell (comma decimals accepted), or null. */
function decimalText(raw: CellValue | undefined): string | null {
  if (isNullLike(raw) || typeof raw === 'boolean' || raw == null) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? String(raw) : null;
  const text = raw.trim().replace(/,/g, '.');
  if (!PLAIN_DECIMAL.test(text) || !Number.isFinite(Number(text))) return null;
  return text;
}

/** Quantity cell text with everything but digits, dots and minus signs dropped. */
function numericText(raw: CellValue | undefined): string | null {
  if (typeof raw !== 'string') return decimalText(raw);
  if (isNullLike(raw)) return null;
  const cleaned = raw.replace(/,/g, '.').replace(/[^0-9.-]/g, '');
  return cleaned === '' ? null : decimalText(cleaned);
}

function scaledOrZero(text: string | null, scale: number): bigint {
  return text === null ? 0n : parseScaled(text, scale) ?? 0n;
}

/**
 * Lenient decimal parse to an integer with `scale` implied decimals, rounded
 * half away from zero. Blanks, null-like markers and junk are 0; never throws.
 */
export function parseDecimal(raw: CellValue | undefined, scale: number): bigint {
  return scaledOrZero(decimalText(raw), scale);
}

export function parseQuantity(raw: CellValue | undefined): number {
  return fromThousandths(parseDecimal(raw, QTY_SCALE));
}

export function parseAmount(raw: CellValue | undefined): number {
  return fromCents(parseDecimal(raw, MONEY_SCALE));
}

/**
 * Cleans a movement quantity cell: commas become dots and every character
 * other than digits, dots and minus signs is dropped before coercion.
 */
export function coerceNumeric(raw: CellValue | undefined, scale: number): bigint {
  return scaledOrZero(numericText(raw), scale);
}

/**
 * Splits a document reference such as `"Doc: EA 00123"` into its two-letter
 * type and the remaining number. Leading noise before the first EA/SA code is
 * discarded.
 */
export function parseDocument(raw: CellValue | undefined): ParsedDocument {
  const text = cellText(raw).trim().toUpperCase();
  if (text.length < 2) return { type: null, number: null };

  const found = DOCUMENT_CODE.exec(text);
  const doc = found ? text.slice(found.index) : text;
  if (doc.length < 2) return { type: null, number: null };

  const number = doc.slice(2).trim();
  return { type: doc.slice(0, 2), number: number.length > 0 ? number : null };
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const calendar = new Date(Date.UTC(year, month - 1, day));
  return (
    calendar.getUTCFullYear() === year &&
    calendar.getUTCMonth() === month - 1 &&
    calendar.getUTCDate() === day
  );
}

/**
 * Accepts `YYYYMMDD` (text or number) and `YYYY-MM-DD`, the form the reader
 * gives date-formatted cells. Returns the calendar day as `YYYY-MM-DD`.
 */
export function parseLedgerDate(raw: CellValue | undefined): ParsedDate {
  if (isNullLike(raw)) return { ok: false, reason: 'Missing date' };

  const text = cellText(raw).trim();
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  const parts = compact ?? iso;
  if (!parts) return { ok: false, reason: `Unrecognized date "${text}"` };

  const year = Number(parts[1]);
  const month = Number(parts[2]);
  const day = Number(parts[3]);
  if (!isCalendarDate(year, month, day)) {
    return { ok: false, reason: `Invalid calendar date "${text}"` };
  }
  return { ok: true, date: `${parts[1]}-${parts[2]}-${parts[3]}` };
}

/** Product codes: trimmed, leading zeros stripped. `"000123"` → `"123"`. */
export function normalizeCode(raw: CellValue | undefined): string {
  if (isNullLike(raw)) return '';
  return cellText(raw).trim().replace(/^0+/, '');
}

/** Trimmed cell text; inner spacing is kept as written. */
export function normalizeLabel(raw: CellValue | undefined): string {
  if (isNullLike(raw)) return '';
  return cellText(raw).trim();
}

/** Trimmed text, or null for blank and null-like cells. */
export function optionalText(raw: CellValue | undefined): string | null {
  const label = normalizeLabel(raw);
  return label.length > 0 ? label : null;
}
