import { type User } from '../auth/types.js';
import { type Logger } from '../logger.js';
import { type ExpenseStore } from './store.js';
import { type CsvDocument, type Expense } from './types.js';

const HEADER = ['Date', 'Description', 'Category', 'Amount'];

const csvEscape = (value: string): string => {
  if (/[\n\r,"]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
};

const toLine = (fields: string[]): string => `${fields.map(csvEscape).join(',')}\n`;

/** Rows keep the order they are given in; callers pass them newest first. */
export const expensesToCsv = (items: Expense[]): string =>
  [HEADER, ...items.map(item => [item.date, item.description, item.category, String(item.amount)])]
    .map(toLine)
    .join('');

export const toCsvDocument = (items: Expense[]): CsvDocument => ({
  filename: 'expenses.csv',
  contentType: 'text/csv',
  body: expensesToCsv(items)
});

export class ExportService {
  constructor (
    private readonly store: ExpenseStore,
    private readonly log: Logger
  ) {}

  exportCsv (owner: User): CsvDocument {
    const rows = this.store.listByOwner(owner.id);
    this.log.debug('Exporting expenses', { userId: owner.id, rows: rows.length });
    return toCsvDocument(rows);
  }
}
