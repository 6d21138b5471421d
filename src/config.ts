import * as z from 'zod/v4';
import { type LogLevel } from './logger.js';

const DEV_SESSION_SECRET = 'dev-only-session-secret';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATABASE_PATH: z.string().trim().min(1).default('./expenses.db'),
  SESSION_SECRET: z.string().optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info')
});

export interface AppConfig {
  nodeEnv: string
  production: boolean
  port: number
  databasePath: string
  sessionSecret: string
  usingDevSecret: boolean
  logLevel: LogLevel
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const reasons = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration. ${reasons.join('; ')}`);
  }

  const values = parsed.data;
  const production = values.NODE_ENV === 'production';
  const secret = values.SESSION_SECRET?.trim() ?? '';
  if (secret === '' && production) {
    throw new Error('SESSION_SECRET is required when NODE_ENV=production.');
  }

  return {
    nodeEnv: values.NODE_ENV,
    production,
    port: values.PORT,
    databasePath: values.DATABASE_PATH,
    sessionSecret: secret === '' ? DEV_SESSION_SECRET : secret,
    usingDevSecret: secret === '',
    logLevel: values.LOG_LEVEL
  };
};
