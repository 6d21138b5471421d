import { type User } from '../auth/types.js';
import { AppError } from '../errors.js';
import { type Logger } from '../logger.js';
import { expenseFormSchema, expensePatchSchema, isCalendarDate, parseInput } from '../schemas/common.js';
import { categoryTotals, monthlyTotals, toDashboard } from './aggregate.js';
import { type ExpenseStore } from './store.js';
import {
  type CategoryTotal,
  type DashboardData,
  type DateRange,
  type Expense,
  type ExpenseListing,
  type MonthlyTotal
} from './types.js';

export type ExpenseAction = 'view' | 'edit' | 'delete';

export const canAccess = (user: User, expense: Expense): boolean => expense.userId === user.id;

const boundOrWarning = (value: string | undefined, label: 'start' | 'end', warnings: string[]): string | undefined => {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') return undefined;
  if (isCalendarDate(trimmed)) return trimmed;
  warnings.push(`Invalid ${label} date format. Use YYYY-MM-DD.`);
  return undefined;
};

export class ExpenseService {
  constructor (
    private readonly store: ExpenseStore,
    private readonly log: Logger
  ) {}

  addExpense (owner: User, input: unknown): Expense {
    const fields = parseInput(expenseFormSchema, input);
    const created = this.store.insert(owner.id, fields);
    this.log.info('Expense added', { userId: owner.id, expenseId: created.id });
    return created;
  }

  getExpense (expenseId: number, owner: User, action: ExpenseAction = 'view'): Expense {
    return this.authorize(this.store, expenseId, owner, action);
  }

  /** Checks run in order: existence, ownership, then field validation. */
  editExpense (expenseId: number, owner: User, input: unknown): Expense {
    const updated = this.store.transaction(tx => {
      const existing = this.authorize(tx, expenseId, owner, 'edit');
      const patch = parseInput(expensePatchSchema, input);
      if (Object.values(patch).every(value => value === undefined)) return existing;
      return tx.update(existing.id, patch) ?? existing;
    });
    this.log.info('Expense updated', { userId: owner.id, expenseId });
    return updated;
  }

  deleteExpense (expenseId: number, owner: User): void {
    this.store.transaction(tx => {
      const existing = this.authorize(tx, expenseId, owner, 'delete');
      tx.remove(existing.id);
    });
    this.log.info('Expense deleted', { userId: owner.id, expenseId });
  }

  /** Invalid bounds are dropped and reported in `warnings`; the query still runs. */
  listExpenses (owner: User, range: DateRange = {}): ExpenseListing {
    const warnings: string[] = [];
    const filters: DateRange = {};
    const startDate = boundOrWarning(range.startDate, 'start', warnings);
    const endDate = boundOrWarning(range.endDate, 'end', warnings);
    if (startDate !== undefined) filters.startDate = startDate;
    if (endDate !== undefined) filters.endDate = endDate;

    if (warnings.length > 0) {
      this.log.warn('Ignoring invalid date filter', { userId: owner.id, warnings });
    }
    return { expenses: this.store.listByOwner(owner.id, filters), filters, warnings };
  }

  categoryTotals (owner: User): CategoryTotal[] {
    return categoryTotals(this.store.listByOwner(owner.id));
  }

  monthlyTotals (owner: User): MonthlyTotal[] {
    return monthlyTotals(this.store.listByOwner(owner.id));
  }

  dashboard (owner: User): DashboardData {
    const items = this.store.listByOwner(owner.id);
    return toDashboard(categoryTotals(items), monthlyTotals(items));
  }

  private authorize (store: ExpenseStore, expenseId: number, owner: User, action: ExpenseAction): Expense {
    const expense = store.findById(expenseId);
    if (expense === undefined) {
      throw new AppError('NOT_FOUND', 'Expense not found', { expenseId });
    }
    if (!canAccess(owner, expense)) {
      this.log.warn('Expense access denied', { userId: owner.id, expenseId, action });
      throw new AppError('FORBIDDEN', `You are not authorized to ${action} this expense.`, { expenseId, action });
    }
    return expense;
  }
}
