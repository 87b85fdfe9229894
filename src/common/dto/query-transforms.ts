import type { TransformFnParams } from 'class-transformer';

const TRUTHY = new Set(['true', '1', 'yes', 'si', 'sí']);
const FALSY = new Set(['false', '0', 'no']);

/** Query-string flag: `true`/`false`, `1`/`0`, `yes`/`no`, `sí`/`no`. */
export function toBooleanFlag({ value }: TransformFnParams): unknown {
  if (typeof value === 'boolean') return value;
  const text = String(value).trim().toLowerCase();
  if (TRUTHY.has(text)) return true;
  if (FALSY.has(text)) return false;
  return value;
}
