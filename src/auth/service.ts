import { AppError } from '../errors.js';
import { type Logger } from '../logger.js';
import { credentialsSchema, parseInput } from '../schemas/common.js';
import { type CredentialStore } from './credentials.js';
import { hashPassword, verifyPassword } from './password.js';
import { type AuthSession, type User } from './types.js';

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid username or password!';

// Verified against when the username is unknown so both failure paths cost one scrypt.
const DECOY_HASH_PASSWORD = 'decoy-password';

export class AuthService {
  private decoyHash?: Promise<string>;

  constructor (
    private readonly credentials: CredentialStore,
    private readonly log: Logger
  ) {}

  async register (input: unknown): Promise<User> {
    const { username, password } = parseInput(credentialsSchema, input);
    if (this.credentials.findByUsername(username) !== undefined) {
      throw new AppError('DUPLICATE_USERNAME', 'Username already exists!', { username });
    }
    const passwordHash = await hashPassword(password);
    const user = this.credentials.create(username, passwordHash);
    this.log.info('User registered', { userId: user.id, username });
    return user;
  }

  async login (session: AuthSession, input: unknown): Promise<User> {
    const parsed = credentialsSchema.safeParse(input);
    if (!parsed.success) {
      throw new AppError('INVALID_CREDENTIALS', INVALID_CREDENTIALS_MESSAGE);
    }
    const { username, password } = parsed.data;
    const stored = this.credentials.findByUsername(username);
    const matches = stored === undefined
      ? await verifyPassword(password, await this.decoy()).then(() => false)
      : await verifyPassword(password, stored.passwordHash);

    if (stored === undefined || !matches) {
      this.log.warn('Login rejected', { username });
      throw new AppError('INVALID_CREDENTIALS', INVALID_CREDENTIALS_MESSAGE);
    }

    await session.bind(stored.id);
    this.log.info('User logged in', { userId: stored.id });
    return { id: stored.id, username: stored.username };
  }

  async logout (session: AuthSession): Promise<void> {
    const userId = session.userId();
    await session.clear();
    if (userId !== undefined) {
      this.log.info('User logged out', { userId });
    }
  }

  currentUser (session: AuthSession): User {
    const userId = session.userId();
    const user = userId === undefined ? undefined : this.credentials.findById(userId);
    if (user === undefined) {
      throw new AppError('UNAUTHENTICATED', 'Please log in to access this page.');
    }
    return user;
  }

  private async decoy (): Promise<string> {
    this.decoyHash ??= hashPassword(DECOY_HASH_PASSWORD);
    return await this.decoyHash;
  }
}
