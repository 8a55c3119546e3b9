/**
 * Structured logging utility for production observability
 * Outputs JSON logs compatible with log aggregation services
 *
 * SECURITY: Implements automatic redaction of sensitive fields
 */

import { getRequestContext } from './request-context';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  service: string;
  environment: string;
  version?: string;
  route?: string;
  method?: string;
  [key: string]: unknown;
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SERVICE_NAME = 'directory-search';

// Fields to redact from logs (case-insensitive matching)
const REDACTED_FIELDS = new Set([
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
  'accesstoken',
  'refreshtoken',
  'credential',
  'connectionstring',
  'database_url',
  'databaseurl',
]);

// Patterns to redact from string values
const REDACT_PATTERNS: Array<[RegExp, string]> = [
  [/Bearer\s+[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/gi, '[REDACTED]'], // JWT tokens
  [/[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g, '[REDACTED]'], // Email addresses
  [/(postgres(?:ql)?:\/\/[^:\s/]+:)[^@\s]+@/gi, '$1[REDACTED]@'], // Connection string passwords
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Minimum level: LOG_LEVEL when set, otherwise info in production and debug elsewhere.
 * Read on every call so tests and long-running processes pick up changes.
 */
function getMinLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Redact sensitive information from log metadata
 */
function redactSensitive(obj: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    let result = obj;
    for (const [pattern, replacement] of REDACT_PATTERNS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redactSensitive(item, depth + 1));
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: redactSensitive(obj.message, depth + 1) };
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (REDACTED_FIELDS.has(lowerKey)) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSensitive(value, depth + 1);
      }
    }
    return redacted;
  }

  return obj;
}

function redactMeta(meta: LogMeta): LogMeta {
  const redacted: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    redacted[key] = REDACTED_FIELDS.has(key.toLowerCase())
      ? '[REDACTED]'
      : redactSensitive(value, 1);
  }
  return redacted;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getMinLogLevel()];
}

function formatLogEntry(level: LogLevel, message: string, meta?: LogMeta): LogEntry {
  const context = getRequestContext();
  const safeMeta = meta ? redactMeta(meta) : undefined;

  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    requestId: context?.requestId,
    service: SERVICE_NAME,
    environment: process.env.NODE_ENV || 'development',
    version: process.env.APP_VERSION,
    route: context?.path,
    method: context?.method,
    ...safeMeta,
  };
}

function write(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return;

  const entry = formatLogEntry(level, message, meta);

  // In production, output JSON for log aggregation
  // In development, use human-readable format
  if (process.env.NODE_ENV === 'production') {
    const output = JSON.stringify(entry);
    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
    return;
  }

  const prefix = `[${entry.timestamp}] [${level.toUpperCase()}]`;
  const contextInfo = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
  const safeMeta = meta ? redactMeta(meta) : '';

  switch (level) {
    case 'error':
      console.error(`${prefix}${contextInfo}`, message, safeMeta);
      break;
    case 'warn':
      console.warn(`${prefix}${contextInfo}`, message, safeMeta);
      break;
    case 'debug':
      console.debug(`${prefix}${contextInfo}`, message, safeMeta);
      break;
    default:
      console.log(`${prefix}${contextInfo}`, message, safeMeta);
  }
}

function createLogger(defaultMeta?: LogMeta): Logger {
  const merge = (meta?: LogMeta): LogMeta | undefined =>
    defaultMeta ? { ...defaultMeta, ...meta } : meta;

  return {
    debug: (message, meta) => write('debug', message, merge(meta)),
    info: (message, meta) => write('info', message, merge(meta)),
    warn: (message, meta) => write('warn', message, merge(meta)),
    error: (message, meta) => write('error', message, merge(meta)),
    log: (level, message, meta) => write(level, message, merge(meta)),
    child: (childMeta) => createLogger({ ...defaultMeta, ...childMeta }),
  };
}

/**
 * Structured logger with request context correlation
 *
 * @example
 * ```ts
 * logger.info('Search executed', { total: 12 });
 *
 * // Child logger with preset context
 * const registryLogger = logger.child({ component: 'filter-registry' });
 * registryLogger.warn('Duplicate filter name', { name: 'price' });
 * ```
 */
export const logger: Logger = createLogger();

/**
 * Export redaction utility for use in other modules
 */
export { redactSensitive };
