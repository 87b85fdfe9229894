import {
  headerRowOrder,
  matchHeaders,
  normalizeHeader,
  positionalStrategy,
  resolveColumns,
} from '../../src/spreadsheet/column-resolver';
import {
  BASE_SCHEMA,
  ColumnSchema,
  MOVEMENT_SCHEMA,
} from '../../src/spreadsheet/column-schemas';
import type { RawRow } from '../../src/spreadsheet/spreadsheet.types';

const BASE_HEADER: RawRow = [
  'Fecha Corte',
  'Mes',
  'Almacen',
  'Grupo',
  'Codigo',
  'Descripcion',
  'Cantidad',
  'Unidad Medida',
  'Costo Unitario',
  'Valor Total',
];

const MOVEMENT_HEADER: RawRow = [
  'Item',
  'Desc Item',
  'Localizacion',
  'Categoria',
  'Fecha',
  'Documento',
  'Entradas',
  'Salidas',
  'Unitario',
  'Total',
  'Cantidad',
];

describe('column resolver (unit)', () => {
  it('normalizes header cells', () => {
    expect(normalizeHeader('  Unit   Cost ')).toBe('unit_cost');
    expect(normalizeHeader(null)).toBe('');
    expect(normalizeHeader(42)).toBe('42');
  });

  it('prefers a header equal to the canonical name over a synonym', () => {
    const { indexes, missing } = matchHeaders(BASE_SCHEMA, ['codigo', 'Code', 'Description']);
    expect(indexes.code).toBe(1);
    expect(indexes.description).toBe(2);
    expect(missing).toEqual([
      'cutoffDate',
      'month',
      'warehouse',
      'group',
      'quantity',
      'unit',
      'unitCost',
      'totalValue',
    ]);
  });

  it('claims each header cell for one column only', () => {
    const schema: ColumnSchema<'first' | 'second'> = {
      name: 'pair',
      required: ['first', 'second'],
      optional: [],
      synonyms: { first: ['shared'], second: ['shared'] },
      preferredHeaderRow: 1,
      positions: {},
    };
    expect(matchHeaders(schema, ['shared'])).toEqual({ indexes: { first: 0 }, missing: ['second'] });
    expect(matchHeaders(schema, ['shared', 'Shared'])).toEqual({
      indexes: { first: 0, second: 1 },
      missing: [],
    });
  });

  it('tries the preferred header row first', () => {
    expect(headerRowOrder(BASE_SCHEMA)).toEqual([1, 2, 3, 4, 5]);
    expect(headerRowOrder(MOVEMENT_SCHEMA)).toEqual([4, 1, 2, 3, 5]);
  });

  it('finds a movement header below title rows and skips blank data rows', () => {
    const rows: RawRow[] = [
      ['Kardex report'],
      [null],
      [],
      MOVEMENT_HEADER,
      ['001', 'Bolt', 'W1', 'Hardware', '20240105', 'EA 1', 10, 0, 2, 20, 10],
      [null, '', null],
      ['002', 'Nut', 'W1', 'Hardware', '20240106', 'SA 2', 0, 3, 1, 3, 7],
    ];
    const result = resolveColumns(MOVEMENT_SCHEMA, [{ engine: 'workbook', rows }]);
    if (!result.ok) throw new Error(result.attempts.join('\n'));

    expect(result.engine).toBe('workbook');
    expect(result.table.strategy).toBe('synonyms@row4');
    expect(result.table.headerRow).toBe(4);
    expect(result.table.rows.map((r) => r.rowNumber)).toEqual([5, 7]);
    expect(result.table.rows[1].cells).toEqual({
      item: '002',
      description: 'Nut',
      location: 'W1',
      category: 'Hardware',
      date: '20240106',
      document: 'SA 2',
      entries: 0,
      exits: 3,
      unitCost: 1,
      total: 3,
      quantity: 7,
      costCenter: null,
      lot: null,
    });
    expect(result.table.columns).not.toContain('costCenter');
  });

  it('falls back to another header row when the preferred one does not match', () => {
    const rows: RawRow[] = [MOVEMENT_HEADER, ['5', 'Washer', 'W2', 'Hardware', '20240201', 'EA 9', 1, 0, 1, 1, 1]];
    const result = resolveColumns(MOVEMENT_SCHEMA, [{ engine: 'workbook', rows }]);
    if (!result.ok) throw new Error(result.attempts.join('\n'));
    expect(result.table.strategy).toBe('synonyms@row1');
    expect(result.table.rows).toHaveLength(1);
    expect(result.table.rows[0].rowNumber).toBe(2);
  });

  it('uses a later engine when the first one yields no usable header', () => {
    const result = resolveColumns(BASE_SCHEMA, [
      { engine: 'html', rows: [['garbage']] },
      { engine: 'workbook', rows: [BASE_HEADER, ['2024-01-31', 1, 'W1', 'G1', '001', 'Bolt', 4, 'UN', 2, 8]] },
    ]);
    if (!result.ok) throw new Error(result.attempts.join('\n'));
    expect(result.engine).toBe('workbook');
    expect(result.table.strategy).toBe('synonyms@row1');
    expect(result.table.rows[0].cells.code).toBe('001');
  });

  it('falls back to fixed positions when no header row matches', () => {
    const rows: RawRow[] = [
      ['c0', 'c1', 'c2', 'c3', 'c4', 'c5', 'c6', 'c7', 'c8', 'c9'],
      ['2024-01-31', 1, 'W1', 'G1', '001', 'Bolt', 4, 'UN', 2, 8],
    ];
    const result = resolveColumns(BASE_SCHEMA, [{ engine: 'workbook', rows }]);
    if (!result.ok) throw new Error(result.attempts.join('\n'));
    expect(result.table.strategy).toBe('positions');
    expect(result.table.headerRow).toBe(1);
    expect(result.table.rows).toEqual([
      {
        rowNumber: 2,
        cells: {
          cutoffDate: '2024-01-31',
          month: 1,
          warehouse: 'W1',
          group: 'G1',
          code: '001',
          description: 'Bolt',
          quantity: 4,
          unit: 'UN',
          unitCost: 2,
          totalValue: 8,
        },
      },
    ]);
  });

  it('positional layout needs a row as wide as the right-most required column', () => {
    const strategy = positionalStrategy(BASE_SCHEMA);
    expect(strategy([['a', 'b', 'c']])).toEqual({
      ok: false,
      strategy: 'positions',
      missing: [...BASE_SCHEMA.required],
    });
  });

  it('lists every failed attempt', () => {
    const result = resolveColumns(BASE_SCHEMA, [{ engine: 'workbook', rows: [['a', 'b']] }]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.attempts).toHaveLength(6);
    expect(result.attempts[0]).toBe(
      'workbook/synonyms@row1: missing cutoffDate, month, warehouse, group, code, description, quantity, unit, unitCost, totalValue',
    );
    expect(result.attempts[5]).toBe('workbook/positions: no header row wide enough');
  });
});
