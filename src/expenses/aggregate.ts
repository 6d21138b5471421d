import { type CategoryTotal, type DashboardData, type Expense, type MonthlyTotal } from './types.js';

export const MONTH_LABELS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

/** Exact, case-sensitive grouping; categories appear in first-seen order. */
export const categoryTotals = (items: Expense[]): CategoryTotal[] => {
  const totals = new Map<string, number>();
  for (const item of items) {
    totals.set(item.category, (totals.get(item.category) ?? 0) + item.amount);
  }
  return [...totals.entries()].map(([category, total]) => ({ category, total }));
};

/**
 * Always twelve buckets, January first. Only the month of each date counts,
 * so March 2023 and March 2024 land in the same bucket.
 */
export const monthlyTotals = (items: Expense[]): MonthlyTotal[] => {
  const sums = new Array<number>(12).fill(0);
  for (const item of items) {
    const month = Number(item.date.slice(5, 7));
    sums[month - 1] += item.amount;
  }
  return MONTH_LABELS.map((label, index) => ({ month: index + 1, label, total: sums[index] }));
};

export const toDashboard = (byCategory: CategoryTotal[], byMonth: MonthlyTotal[]): DashboardData => ({
  labels: byCategory.map(entry => entry.category),
  values: byCategory.map(entry => entry.total),
  monthlyLabels: byMonth.map(entry => entry.label),
  monthlyData: byMonth.map(entry => entry.total)
});
