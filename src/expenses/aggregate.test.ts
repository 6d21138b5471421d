import { describe, expect, it } from 'vitest';
import { categoryTotals, monthlyTotals, toDashboard } from './aggregate.js';
import { type Expense } from './types.js';

let nextId = 1;
const expense = (date: string, amount: number, category = 'Food'): Expense => ({
  id: nextId++,
  description: `item ${nextId}`,
  amount,
  date,
  category,
  userId: 1
});

describe('categoryTotals', () => {
  it('sums per category with case-sensitive labels', () => {
    const totals = categoryTotals([
      expense('2024-01-01', 5, 'Food'),
      expense('2024-01-02', 7, 'Rent'),
      expense('2024-01-03', 2.5, 'Food'),
      expense('2024-01-04', 1, 'food')
    ]);
    expect(totals).toEqual([
      { category: 'Food', total: 7.5 },
      { category: 'Rent', total: 7 },
      { category: 'food', total: 1 }
    ]);
  });

  it('omits categories that have no expenses', () => {
    expect(categoryTotals([])).toEqual([]);
  });
});

describe('monthlyTotals', () => {
  it('buckets by month across years', () => {
    const totals = monthlyTotals([expense('2023-03-01', 10), expense('2024-03-10', 20)]);
    expect(totals).toHaveLength(12);
    expect(totals[2]).toEqual({ month: 3, label: 'Mar', total: 30 });
    expect(totals.filter(entry => entry.month !== 3).every(entry => entry.total === 0)).toBe(true);
  });

  it('reports all twelve months in calendar order even when empty', () => {
    const totals = monthlyTotals([]);
    expect(totals.map(entry => entry.label)).toEqual(['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']);
    expect(totals.map(entry => entry.total)).toEqual(Array.from({ length: 12 }, () => 0));
  });

  it('adds up to the same grand total as categoryTotals', () => {
    const items = [
      expense('2022-12-31', 12.25, 'Gifts'),
      expense('2024-01-15', 3.5, 'Food'),
      expense('2024-07-04', 40, 'Travel'),
      expense('2023-07-19', 8, 'Food')
    ];
    const byMonth = monthlyTotals(items).reduce((sum, entry) => sum + entry.total, 0);
    const byCategory = categoryTotals(items).reduce((sum, entry) => sum + entry.total, 0);
    expect(byMonth).toBeCloseTo(63.75, 10);
    expect(byCategory).toBeCloseTo(63.75, 10);
  });
});

describe('toDashboard', () => {
  it('shapes totals as chart series', () => {
    const items = [expense('2024-02-01', 4, 'Food')];
    const data = toDashboard(categoryTotals(items), monthlyTotals(items));
    expect(data.labels).toEqual(['Food']);
    expect(data.values).toEqual([4]);
    expect(data.monthlyLabels[1]).toBe('Feb');
    expect(data.monthlyData).toEqual([0, 4, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
