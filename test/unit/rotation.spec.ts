import {
  assessRotation,
  classifyRotation,
  countBalanceChanges,
  monthlyBalances,
  yesNo,
} from '../../src/analytics/rotation';

const twelve = (value: number) => new Array<number>(12).fill(value);

describe('rotation (unit)', () => {
  it('builds month-end balances for the reference year', () => {
    const result = monthlyBalances(
      10,
      [
        { date: '2023-12-10', quantity: 5 },
        { date: '2024-02-03', quantity: -3 },
        { date: '2024-02-20', quantity: -2 },
        { date: '2025-01-01', quantity: 100 },
      ],
      2024,
    );
    expect(result.balancePreYear).toBe(15);
    expect(result.balances).toEqual([15, 10, 10, 10, 10, 10, 10, 10, 10, 10, 10, 10]);
  });

  it('accumulates fractional movements without drift', () => {
    const tenths = Array.from({ length: 10 }, (_, i) => ({
      date: `2023-05-${String(i + 10)}`,
      quantity: 0.1,
    }));
    const result = monthlyBalances(
      0,
      [...tenths, { date: '2024-01-02', quantity: 0.1 }, { date: '2024-01-03', quantity: 0.2 }, { date: '2024-02-01', quantity: -1.3 }],
      2024,
    );
    expect(result.balancePreYear).toBe(1);
    expect(result.balances).toEqual([1.3, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('classifies a product that never moved', () => {
    expect(classifyRotation(0, twelve(0))).toBe('Activo');
    expect(classifyRotation(4, twelve(0))).toBe('Obsoleto');
    expect(classifyRotation(8, twelve(8))).toBe('Obsoleto');
    expect(classifyRotation(-2, twelve(-2))).toBe('Activo');
  });

  it('flags stock that has not changed over the last three months', () => {
    const balances = [15, 10, 10, 10, 10, 10, 10, 10, 10, 10, 10, 10];
    expect(classifyRotation(15, balances)).toBe('Estancado');
  });

  it('keeps products with recent movement active', () => {
    const balances = [5, 5, 5, 5, 5, 5, 5, 5, 5, 5, 4, 3];
    expect(classifyRotation(5, balances)).toBe('Activo');
  });

  it('counts month to month changes', () => {
    expect(countBalanceChanges([1, 1, 2, 2, 3])).toBe(2);
    expect(countBalanceChanges(twelve(1))).toBe(0);
  });

  it('assesses stagnation and high rotation together', () => {
    const idle = assessRotation(8, [], 2024);
    expect(idle.rotation).toBe('Obsoleto');
    expect(idle.stagnant).toBe(true);
    expect(idle.highRotation).toBe(false);

    const busy = assessRotation(
      0,
      [
        { date: '2024-10-05', quantity: 10 },
        { date: '2024-11-05', quantity: -4 },
        { date: '2024-12-05', quantity: -6 },
      ],
      2024,
    );
    expect(busy.monthlyBalances).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 10, 6, 0]);
    expect(busy.rotation).toBe('Activo');
    expect(busy.stagnant).toBe(false);
    expect(busy.highRotation).toBe(true);
  });

  it('renders flags as Sí/No', () => {
    expect(yesNo(true)).toBe('Sí');
    expect(yesNo(false)).toBe('No');
  });
});
