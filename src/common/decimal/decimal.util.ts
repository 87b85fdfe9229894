import { Types } from 'mongoose';

// Decimal helpers operating on scaled integers to avoid FP errors.
// - Quantities are represented as thousandths (scale 3) using BigInt
// - Money is represented as cents (scale 2) using BigInt
// Values travel as numbers in the domain, are computed here and stored as
// Decimal128.

export type Thousandths = bigint; // scale 3
export type Cents = bigint; // scale 2

export const QTY_SCALE = 3;
export const MONEY_SCALE = 2;

const DECIMAL_TEXT = /^([+-]?)(\d*)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

/** `numerator / denominator`, rounded half away from zero. */
export function divRound(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw new RangeError('Division by zero');
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  let q = n / d;
  if ((n % d) * 2n >= d) q += 1n;
  return negative ? -q : q;
}

/**
 * Decimal text (`-12.5`, `.25`, `1e3`) or a finite number as an integer with
 * `scale` implied decimals, rounded half away from zero. Null when the input
 * is not a plain decimal.
 */
export function parseScaled(value: string | number, scale: number): bigint | null {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    text = String(value);
  } else {
    text = value.trim();
  }
  const match = DECIMAL_TEXT.exec(text);
  if (!match) return null;
  const [, sign, intPart, fracPart = '', expPart] = match;
  if (!intPart && !fracPart) return null;

  const digits = BigInt(`${intPart}${fracPart}` || '0');
  const shift = (expPart ? Number(expPart) : 0) - fracPart.length + scale;
  const scaled = shift >= 0 ? digits * 10n ** BigInt(shift) : divRound(digits, 10n ** BigInt(-shift));
  return sign === '-' ? -scaled : scaled;
}

export function scaledToString(value: bigint, scale: number): string {
  const negative = value < 0n;
  const digits = (negative ? -value : value).toString().padStart(scale + 1, '0');
  const intPart = digits.slice(0, digits.length - scale);
  const fracPart = digits.slice(digits.length - scale);
  return `${negative ? '-' : ''}${intPart}${scale > 0 ? `.${fracPart}` : ''}`;
}

function scaledToNumber(value: bigint, scale: number): number {
  const n = Number(scaledToString(value, scale));
  // avoid -0 leaking into responses
  return n === 0 ? 0 : n;
}

export function toThousandths(value: number): Thousandths {
  return parseScaled(value, QTY_SCALE) ?? 0n;
}

export function fromThousandths(value: Thousandths): number {
  return scaledToNumber(value, QTY_SCALE);
}

export function toCents(value: number): Cents {
  return parseScaled(value, MONEY_SCALE) ?? 0n;
}

export function fromCents(value: Cents): number {
  return scaledToNumber(value, MONEY_SCALE);
}

export function roundQty(value: number): number {
  return fromThousandths(toThousandths(value));
}

export function roundMoney(value: number): number {
  return fromCents(toCents(value));
}

/** Exact sum of quantities at scale 3. */
export function sumQty(values: Iterable<number>): number {
  let total: Thousandths = 0n;
  for (const v of values) total += toThousandths(v);
  return fromThousandths(total);
}

/** Exact sum of amounts at scale 2. */
export function sumMoney(values: Iterable<number>): number {
  let total: Cents = 0n;
  for (const v of values) total += toCents(v);
  return fromCents(total);
}

/** quantity x unit cost, in cents rounded half away from zero. */
export function mulQtyCost(quantity: number, unitCost: number): number {
  return fromCents(divRound(toThousandths(quantity) * toCents(unitCost), 1000n));
}

/** Unit cost of `value` spread over `quantity` units; 0 for a zero quantity. */
export function unitCostOf(value: number, quantity: number): number {
  const qty = toThousandths(quantity);
  if (qty === 0n) return 0;
  return fromCents(divRound(toCents(value) * 1000n, qty));
}

/** Units that `value` buys at `unitCost`; 0 for a zero cost. */
export function quantityOf(value: number, unitCost: number): number {
  const cost = toCents(unitCost);
  if (cost === 0n) return 0;
  return fromThousandths(divRound(toCents(value) * 1000n, cost));
}

export function toDecimal128(value: number, scale: number): Types.Decimal128 {
  return Types.Decimal128.fromString(scaledToString(parseScaled(value, scale) ?? 0n, scale));
}

export function fromDecimal128(
  value: Types.Decimal128 | number | string | null | undefined,
): number {
  if (value == null) return 0;
  const n = typeof value === 'number' ? value : Number(value.toString());
  return Number.isFinite(n) ? n : 0;
}
