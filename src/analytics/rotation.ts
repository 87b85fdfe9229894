import { fromThousandths, Thousandths, toThousandths } from '../common/decimal/decimal.util';

export const ROTATIONS = ['Activo', 'Estancado', 'Obsoleto'] as const;
export type Rotation = (typeof ROTATIONS)[number];

export type YesNo = 'Sí' | 'No';

export function yesNo(flag: boolean): YesNo {
  return flag ? 'Sí' : 'No';
}

export interface DatedQuantity {
  /** `YYYY-MM-DD` */
  date: string;
  quantity: number;
}

export interface RotationAssessment {
  balancePreYear: number;
  /** Closing balance of January..December of the reference year. */
  monthlyBalances: number[];
  rotation: Rotation;
  stagnant: boolean;
  highRotation: boolean;
}

export function monthlyBalances(
  initialBalance: number,
  movements: readonly DatedQuantity[],
  year: number,
): { balancePreYear: number; balances: number[] } {
  const yearStart = `${String(year).padStart(4, '0')}-01-01`;
  const prefix = `${String(year).padStart(4, '0')}-`;
  let balancePreYear: Thousandths = toThousandths(initialBalance);
  const net = new Array<Thousandths>(12).fill(0n);
  for (const m of movements) {
    if (m.date < yearStart) {
      balancePreYear += toThousandths(m.quantity);
    } else if (m.date.startsWith(prefix)) {
      net[Number(m.date.slice(5, 7)) - 1] += toThousandths(m.quantity);
    }
  }

  let running = balancePreYear;
  const balances = net.map((q) => {
    running += q;
    return fromThousandths(running);
  });
  return { balancePreYear: fromThousandths(balancePreYear), balances };
}

/** First matching rule wins. */
export function classifyRotation(balancePreYear: number, balances: readonly number[]): Rotation {
  const first = balances[0];
  const allSame = balances.every((b) => b === first);
  if (allSame && first === 0) return balancePreYear > 0 ? 'Obsoleto' : 'Activo';
  if (allSame && first > 0) return 'Obsoleto';

  const lastThree = balances.slice(-3);
  if (lastThree.length === 3 && lastThree.every((b) => b === lastThree[0]) && lastThree[0] > 0) {
    return 'Estancado';
  }
  return 'Activo';
}

export function countBalanceChanges(balances: readonly number[]): number {
  let changes = 0;
  for (let i = 1; i < balances.length; i++) {
    if (balances[i] !== balances[i - 1]) changes++;
  }
  return changes;
}

export function assessRotation(
  initialBalance: number,
  movements: readonly DatedQuantity[],
  year: number,
): RotationAssessment {
  const { balancePreYear, balances } = monthlyBalances(initialBalance, movements, year);
  const rotation = classifyRotation(balancePreYear, balances);
  return {
    balancePreYear,
    monthlyBalances: balances,
    rotation,
    stagnant: rotation === 'Estancado' || rotation === 'Obsoleto',
    highRotation: countBalanceChanges(balances) >= 2,
  };
}
