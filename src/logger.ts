export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

const REDACTED_KEYS = new Set(['password', 'passwordHash', 'secret', 'cookie']);

export const isLogLevel = (value: string): value is LogLevel => value in levelOrder;

const resolveLevel = (value: string | undefined): LogLevel => {
  const normalized = (value ?? 'info').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
};

const redact = (meta: LogMeta): LogMeta => {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = REDACTED_KEYS.has(key) ? '[redacted]' : value;
  }
  return out;
};

export interface LogSink {
  write: (level: LogLevel, line: string) => void
}

const consoleSink: LogSink = {
  write: (level, line) => {
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
};

export interface Logger {
  trace: (msg: string, meta?: LogMeta) => void
  debug: (msg: string, meta?: LogMeta) => void
  info: (msg: string, meta?: LogMeta) => void
  warn: (msg: string, meta?: LogMeta) => void
  error: (msg: string, meta?: LogMeta) => void
  child: (bindings: LogMeta) => Logger
}

export interface LoggerOptions {
  level?: string
  bindings?: LogMeta
  sink?: LogSink
}

/**
 * One JSON object per line: `level`, `time`, `msg`, then bindings and meta.
 * Keys that may carry credentials are replaced with `[redacted]`.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const currentLevel = resolveLevel(options.level);
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (levelOrder[level] < levelOrder[currentLevel]) return;
    const payload = {
      level,
      time: new Date().toISOString(),
      msg: message,
      ...redact({ ...bindings, ...meta })
    };
    sink.write(level, JSON.stringify(payload));
  };

  return {
    trace: (msg, meta) => { log('trace', msg, meta); },
    debug: (msg, meta) => { log('debug', msg, meta); },
    info: (msg, meta) => { log('info', msg, meta); },
    warn: (msg, meta) => { log('warn', msg, meta); },
    error: (msg, meta) => { log('error', msg, meta); },
    child: (extra) => createLogger({ level: currentLevel, bindings: { ...bindings, ...extra }, sink })
  };
};
