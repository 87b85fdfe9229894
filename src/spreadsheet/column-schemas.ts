import synonyms from './column-synonyms.json';

export interface ColumnSchema<K extends string> {
  name: string;
  required: readonly K[];
  optional: readonly K[];
  synonyms: Readonly<Record<K, readonly string[]>>;
  /** 1-based row tried first by the synonym strategy. */
  preferredHeaderRow: number;
  /** Zero-based column indexes used when no header row resolves. */
  positions: Readonly<Partial<Record<K, number>>>;
}

export const BASE_COLUMNS = [
  'cutoffDate',
  'month',
  'warehouse',
  'group',
  'code',
  'description',
  'quantity',
  'unit',
  'unitCost',
  'totalValue',
] as const;
export type BaseColumn = (typeof BASE_COLUMNS)[number];

export const MOVEMENT_REQUIRED_COLUMNS = [
  'item',
  'description',
  'location',
  'category',
  'date',
  'document',
  'entries',
  'exits',
  'unitCost',
  'total',
  'quantity',
] as const;
export const MOVEMENT_OPTIONAL_COLUMNS = ['costCenter', 'lot'] as const;
export type MovementColumn =
  | (typeof MOVEMENT_REQUIRED_COLUMNS)[number]
  | (typeof MOVEMENT_OPTIONAL_COLUMNS)[number];

export const BASE_SCHEMA: ColumnSchema<BaseColumn> = {
  name: 'base snapshot',
  required: BASE_COLUMNS,
  optional: [],
  synonyms: synonyms.base,
  preferredHeaderRow: 1,
  positions: {
    cutoffDate: 0,
    month: 1,
    warehouse: 2,
    group: 3,
    code: 4,
    description: 5,
    quantity: 6,
    unit: 7,
    unitCost: 8,
    totalValue: 9,
  },
};

export const MOVEMENT_SCHEMA: ColumnSchema<MovementColumn> = {
  name: 'movement',
  required: MOVEMENT_REQUIRED_COLUMNS,
  optional: MOVEMENT_OPTIONAL_COLUMNS,
  synonyms: synonyms.movement,
  preferredHeaderRow: 4,
  positions: {
    item: 0,
    description: 2,
    location: 3,
    category: 4,
    date: 13,
    document: 14,
    entries: 17,
    exits: 18,
    unitCost: 19,
    total: 20,
    quantity: 21,
    costCenter: 22,
  },
};

export function schemaColumns<K extends string>(schema: ColumnSchema<K>): K[] {
  return [...schema.required, ...schema.optional];
}
