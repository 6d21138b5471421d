import { describe, expect, it } from 'vitest';
import { expensesToCsv, toCsvDocument } from './export.js';
import { type Expense } from './types.js';

const coffee: Expense = { id: 1, description: 'Coffee', amount: 3.5, date: '2024-01-15', category: 'Food', userId: 1 };

describe('expensesToCsv', () => {
  it('writes a header and one row per expense', () => {
    expect(expensesToCsv([coffee])).toBe('Date,Description,Category,Amount\n2024-01-15,Coffee,Food,3.5\n');
  });

  it('writes only the header when there is nothing to export', () => {
    expect(expensesToCsv([])).toBe('Date,Description,Category,Amount\n');
  });

  it('quotes fields holding commas or quotes', () => {
    const beans: Expense = { ...coffee, id: 2, description: 'Beans, "bulk"', amount: 12 };
    expect(expensesToCsv([beans])).toBe('Date,Description,Category,Amount\n2024-01-15,"Beans, ""bulk""",Food,12\n');
  });
});

describe('toCsvDocument', () => {
  it('names the download and its media type', () => {
    const document = toCsvDocument([coffee]);
    expect(document.filename).toBe('expenses.csv');
    expect(document.contentType).toBe('text/csv');
  });
});
