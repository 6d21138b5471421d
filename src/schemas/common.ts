import * as z from 'zod/v4';
import { AppError } from '../errors.js';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** True for a real calendar day written as YYYY-MM-DD (rejects 2023-02-30). */
export const isCalendarDate = (value: string): boolean => {
  const match = DATE_PATTERN.exec(value);
  if (match === null) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const probe = new Date(0);
  probe.setUTCFullYear(year, month - 1, day);
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
};

const requiredText = (label: string, max: number): z.ZodString =>
  z.string({ message: `${label} is required` })
    .trim()
    .min(1, { message: `${label} is required` })
    .max(max, { message: `${label} must be at most ${max} characters` });

export const dateSchema = z.string({ message: 'Date is required' })
  .trim()
  .refine(isCalendarDate, { message: 'Date must be a valid date in YYYY-MM-DD format' });

export const amountSchema = z.union([
  z.number({ message: 'Amount must be a number' }),
  z.string({ message: 'Amount is required' }).trim().min(1, { message: 'Amount is required' })
], { message: 'Amount is required' })
  .transform(value => typeof value === 'number' || DECIMAL_PATTERN.test(value) ? Number(value) : Number.NaN)
  .refine(value => Number.isFinite(value), { message: 'Amount must be a number' });

export const expenseFormSchema = z.object({
  description: requiredText('Description', 200),
  amount: amountSchema,
  date: dateSchema,
  category: requiredText('Category', 100)
});

export const expensePatchSchema = expenseFormSchema.partial();

export type ExpenseInput = z.output<typeof expenseFormSchema>;
export type ExpensePatch = z.output<typeof expensePatchSchema>;

export const credentialsSchema = z.object({
  username: requiredText('Username', 150),
  // never trimmed: whitespace is part of the secret
  password: z.string({ message: 'Password is required' }).min(1, { message: 'Password is required' })
});

export const expenseIdSchema = z.string()
  .regex(/^\d+$/)
  .transform(value => Number(value))
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

/** Joins issue messages into one human-readable sentence. */
export const describeIssues = <T>(error: z.ZodError<T>): string =>
  error.issues.map(issue => issue.message).join('; ');

export const parseInput = <S extends z.ZodType>(schema: S, input: unknown): z.output<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new AppError('VALIDATION_ERROR', describeIssues(result.error), {
      fields: result.error.issues.map(issue => issue.path.join('.'))
    });
  }
  return result.data;
};
