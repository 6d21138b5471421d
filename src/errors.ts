export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DUPLICATE_USERNAME'
  | 'INVALID_CREDENTIALS'
  | 'UNAUTHENTICATED'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'STORAGE_ERROR';

const statusByCode: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  DUPLICATE_USERNAME: 409,
  INVALID_CREDENTIALS: 401,
  UNAUTHENTICATED: 401,
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  STORAGE_ERROR: 500
};

export class AppError extends Error {
  readonly status: number;

  constructor (
    readonly code: ErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    this.status = statusByCode[code];
  }
}

export const isAppError = (error: unknown, code?: ErrorCode): error is AppError =>
  error instanceof AppError && (code === undefined || error.code === code);

export const toStorageError = (operation: string, error: unknown): AppError => {
  if (error instanceof AppError) return error;
  return new AppError('STORAGE_ERROR', `Storage failure during ${operation}`, {
    operation,
    reason: error instanceof Error ? error.message : String(error)
  }, { cause: error });
};

/** Walks the `cause` chain looking for a SQLite unique-constraint failure. */
export const isUniqueViolation = (error: unknown): boolean => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== null && typeof current === 'object'; depth++) {
    if ('code' in current && current.code === 'SQLITE_CONSTRAINT_UNIQUE') return true;
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
};
