export type CellValue = string | number | boolean | null;

export type RawRow = CellValue[];

export type ParsingEngine = 'workbook' | 'html';

export interface RawSheet {
  engine: ParsingEngine;
  rows: RawRow[];
}

export interface CanonicalRow<K extends string> {
  /** 1-based row number in the source sheet. */
  rowNumber: number;
  /** Columns the table did not resolve are null. */
  cells: Partial<Record<K, CellValue>>;
}

export interface CanonicalTable<K extends string> {
  columns: K[];
  headerRow: number;
  strategy: string;
  rows: CanonicalRow<K>[];
}
