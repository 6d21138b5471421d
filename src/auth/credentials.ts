import { eq } from 'drizzle-orm';
import { type AppDatabase } from '../db/client.js';
import { users } from '../db/schema.js';
import { AppError, isUniqueViolation, toStorageError } from '../errors.js';
import { type User } from './types.js';

export interface StoredCredential extends User {
  passwordHash: string
}

export class CredentialStore {
  constructor (private readonly db: AppDatabase) {}

  findByUsername (username: string): StoredCredential | undefined {
    try {
      return this.db.select().from(users).where(eq(users.username, username)).get();
    } catch (error) {
      throw toStorageError('user lookup', error);
    }
  }

  findById (id: number): User | undefined {
    try {
      return this.db
        .select({ id: users.id, username: users.username })
        .from(users)
        .where(eq(users.id, id))
        .get();
    } catch (error) {
      throw toStorageError('user lookup', error);
    }
  }

  /** Fails with DUPLICATE_USERNAME without touching the existing row. */
  create (username: string, passwordHash: string): User {
    try {
      return this.db
        .insert(users)
        .values({ username, passwordHash })
        .returning({ id: users.id, username: users.username })
        .get();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError('DUPLICATE_USERNAME', 'Username already exists!', { username });
      }
      throw toStorageError('user insert', error);
    }
  }
}
