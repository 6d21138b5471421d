import { index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  username: text('username', { length: 150 }).notNull().unique(),
  passwordHash: text('password_hash').notNull()
});

export const expenses = sqliteTable('expenses', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  description: text('description', { length: 200 }).notNull(),
  amount: real('amount').notNull(),
  // YYYY-MM-DD, so lexical order is calendar order
  date: text('date').notNull(),
  category: text('category', { length: 100 }).notNull(),
  userId: integer('user_id').notNull().references(() => users.id)
}, table => [
  index('expenses_user_date_idx').on(table.userId, table.date)
]);
