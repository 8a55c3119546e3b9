/**
 * Typed failures from the listing store.
 *
 * `pg` errors carry a five-character SQLSTATE in `code`; socket failures
 * carry a Node errno code instead. Both are read before falling back to the
 * message, which is all that pool-level failures ("timeout exceeded when
 * trying to connect") provide.
 */

import { logger } from "../logger";

export interface DataErrorOptions {
  code: string;
  retryable?: boolean;
  cause?: Error;
  /** SQLSTATE reported by the server, when there was one */
  sqlState?: string;
}

export class DataError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly sqlState?: string;
  public declare readonly cause?: Error;

  constructor(message: string, options: DataErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "DataError";
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.sqlState = options.sqlState;
  }

  log(context?: Record<string, unknown>): void {
    logger.error(this.message, {
      errorCode: this.code,
      errorName: this.name,
      retryable: this.retryable,
      sqlState: this.sqlState,
      cause: this.cause?.message,
      stack: this.stack,
      ...context,
    });
  }
}

/** The statement reached the server and failed there. */
export class QueryError extends DataError {
  constructor(operation: string, cause?: Error, options: { retryable?: boolean; sqlState?: string } = {}) {
    super(`Database query failed: ${operation}`, {
      code: "QUERY_ERROR",
      retryable: options.retryable ?? true,
      cause,
      sqlState: options.sqlState,
    });
    this.name = "QueryError";
  }
}

/** No usable connection, or the statement was cancelled by its timeout. */
export class ConnectionError extends DataError {
  constructor(cause?: Error, sqlState?: string) {
    super("Database connection failed", {
      code: "CONNECTION_ERROR",
      retryable: true,
      cause,
      sqlState,
    });
    this.name = "ConnectionError";
  }
}

/** A row or count came back in a shape the listing mapper can't read. */
export class DataTransformError extends DataError {
  constructor(operation: string, cause?: Error) {
    super(`Data transformation failed: ${operation}`, {
      code: "TRANSFORM_ERROR",
      retryable: false,
      cause,
    });
    this.name = "DataTransformError";
  }
}

export function isDataError(error: unknown): error is DataError {
  return error instanceof DataError;
}

const SQLSTATE = /^[0-9A-Z]{5}$/;

// 08: connection exception, 53: insufficient resources (too many connections)
const CONNECTION_SQLSTATE_CLASSES = new Set(["08", "53"]);
// query_canceled (statement_timeout), admin/crash shutdown, cannot_connect_now
const CONNECTION_SQLSTATES = new Set(["57014", "57P01", "57P02", "57P03"]);
// 22: data exception, 23: integrity violation, 42: syntax error or access rule
const PERMANENT_SQLSTATE_CLASSES = new Set(["22", "23", "42"]);

const CONNECTION_ERRNO_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "ENOTFOUND"]);
const CONNECTION_MESSAGE = /connection|timeout|timed out|socket|pool|econnrefused|econnreset|etimedout/;

function readCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/**
 * Classify any thrown value from the store. DataErrors pass through as-is.
 */
export function wrapDatabaseError(error: unknown, operation: string): DataError {
  if (isDataError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const code = readCode(cause);

  if (code && CONNECTION_ERRNO_CODES.has(code)) {
    return new ConnectionError(cause);
  }

  if (code && SQLSTATE.test(code)) {
    const sqlClass = code.slice(0, 2);
    if (CONNECTION_SQLSTATE_CLASSES.has(sqlClass) || CONNECTION_SQLSTATES.has(code)) {
      return new ConnectionError(cause, code);
    }
    return new QueryError(operation, cause, {
      retryable: !PERMANENT_SQLSTATE_CLASSES.has(sqlClass),
      sqlState: code,
    });
  }

  if (CONNECTION_MESSAGE.test(cause.message.toLowerCase())) {
    return new ConnectionError(cause);
  }

  return new QueryError(operation, cause);
}
