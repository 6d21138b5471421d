import { and, desc, eq, gte, lte } from 'drizzle-orm';
import { type AppDatabase } from '../db/client.js';
import { expenses } from '../db/schema.js';
import { toStorageError } from '../errors.js';
import { type ExpenseInput, type ExpensePatch } from '../schemas/common.js';
import { type DateRange, type Expense } from './types.js';

export class ExpenseStore {
  constructor (private readonly db: AppDatabase) {}

  /** Runs `work` in one SQLite transaction; a throw rolls every write back. */
  transaction<T>(work: (store: ExpenseStore) => T): T {
    try {
      return this.db.transaction(tx => work(new ExpenseStore(tx)));
    } catch (error) {
      throw toStorageError('transaction', error);
    }
  }

  insert (userId: number, input: ExpenseInput): Expense {
    try {
      return this.db.insert(expenses).values({ ...input, userId }).returning().get();
    } catch (error) {
      throw toStorageError('expense insert', error);
    }
  }

  findById (id: number): Expense | undefined {
    try {
      return this.db.select().from(expenses).where(eq(expenses.id, id)).get();
    } catch (error) {
      throw toStorageError('expense lookup', error);
    }
  }

  update (id: number, patch: ExpensePatch): Expense | undefined {
    try {
      return this.db.update(expenses)
        .set({
          description: patch.description,
          amount: patch.amount,
          date: patch.date,
          category: patch.category
        })
        .where(eq(expenses.id, id))
        .returning()
        .get();
    } catch (error) {
      throw toStorageError('expense update', error);
    }
  }

  remove (id: number): boolean {
    try {
      return this.db.delete(expenses).where(eq(expenses.id, id)).run().changes > 0;
    } catch (error) {
      throw toStorageError('expense delete', error);
    }
  }

  /** Newest first; both bounds inclusive. */
  listByOwner (userId: number, range: DateRange = {}): Expense[] {
    try {
      return this.db.select()
        .from(expenses)
        .where(and(
          eq(expenses.userId, userId),
          range.startDate !== undefined ? gte(expenses.date, range.startDate) : undefined,
          range.endDate !== undefined ? lte(expenses.date, range.endDate) : undefined
        ))
        .orderBy(desc(expenses.date), desc(expenses.id))
        .all();
    } catch (error) {
      throw toStorageError('expense list', error);
    }
  }
}
