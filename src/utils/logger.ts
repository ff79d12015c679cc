import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Error instances stringify to {}; flatten them before serialising
function flatten(meta: LogMeta): LogMeta {
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) =>
      value instanceof Error ? [key, { name: value.name, message: value.message }] : [key, value],
    ),
  );
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const fields = meta ? flatten(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${message}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  /** Logger that adds `context` to every entry. */
  child(context: LogMeta): Logger;
}

function createLogger(context?: LogMeta): Logger {
  const merge = (meta?: LogMeta) => (context ? { ...context, ...meta } : meta);
  return {
    debug: (msg, meta) => log('debug', msg, merge(meta)),
    info:  (msg, meta) => log('info',  msg, merge(meta)),
    warn:  (msg, meta) => log('warn',  msg, merge(meta)),
    error: (msg, meta) => log('error', msg, merge(meta)),
    child: (extra) => createLogger({ ...context, ...extra }),
  };
}

export const logger = createLogger();
