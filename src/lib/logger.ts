// Structured JSON logger with timestamp, level and optional requestId.
// Respects LOG_LEVEL env (debug | info | warn | error | silent).

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
type Level = (typeof LEVELS)[number];
type LogLevel = Exclude<Level, 'silent'>;

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

const configuredLevel: Level = (() => {
  const raw = (process.env.LOG_LEVEL || '').trim().toLowerCase();
  return isLevel(raw) ? raw : 'info';
})();

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(configuredLevel);
}

function format(level: LogLevel, message: string, meta?: LogMeta): string {
  const base = { timestamp: new Date().toISOString(), level, message };
  return JSON.stringify(meta ? { ...base, ...meta } : base);
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return;
  const out = format(level, message, meta);
  if (level === 'error') {
    console.error(out);
  } else if (level === 'warn') {
    console.warn(out);
  } else {
    console.log(out);
  }
}

export const logger: Logger = {
  debug: (msg, meta) => log('debug', msg, meta),
  info: (msg, meta) => log('info', msg, meta),
  warn: (msg, meta) => log('warn', msg, meta),
  error: (msg, meta) => log('error', msg, meta),
};

/** Child logger that always includes requestId. */
export function withRequestId(requestId: string): Logger {
  return {
    debug: (msg, meta) => logger.debug(msg, { ...meta, requestId }),
    info: (msg, meta) => logger.info(msg, { ...meta, requestId }),
    warn: (msg, meta) => logger.warn(msg, { ...meta, requestId }),
    error: (msg, meta) => logger.error(msg, { ...meta, requestId }),
  };
}

export function errorMeta(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}
