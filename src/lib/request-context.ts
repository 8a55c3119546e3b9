/**
 * Search request context on AsyncLocalStorage.
 *
 * The logger reads the current context to stamp every line of one search
 * with the same request ID, and the search service reads the start time to
 * report duration.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';

export interface RequestContext {
  requestId: string;
  startTime: number;
  /** Operation being served, e.g. "searchListings" */
  path?: string;
  method?: string;
}

const REQUEST_ID_HEADER = 'x-request-id';
const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Reuse an upstream ID when it is a plain token; anything else (empty, too
 * long, spaces or control characters that would break log lines) gets a UUID.
 */
export function generateRequestId(existingId?: string): string {
  const trimmed = existingId?.trim();
  if (trimmed && trimmed.length <= MAX_REQUEST_ID_LENGTH && REQUEST_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }
  return randomUUID();
}

/**
 * Upstream request ID from Node (`req.headers`) or fetch-style headers.
 */
export function getRequestIdFromHeaders(headers: IncomingHttpHeaders | Headers): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(REQUEST_ID_HEADER) ?? undefined;
  }
  const value = headers[REQUEST_ID_HEADER];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Run `fn` with a fresh context; nested calls get their own context.
 *
 * @example
 * ```ts
 * const result = await runWithRequestContext({ path: '/listings', method: 'GET' }, () =>
 *   searchListings(engine, request, executor),
 * );
 * ```
 */
export function runWithRequestContext<T>(
  context: Partial<RequestContext>,
  fn: () => T
): T {
  const fullContext: RequestContext = {
    requestId: generateRequestId(context.requestId),
    startTime: context.startTime || Date.now(),
    path: context.path,
    method: context.method,
  };

  return requestContextStorage.run(fullContext, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/** 'unknown' outside a context */
export function getRequestId(): string {
  return getRequestContext()?.requestId || 'unknown';
}

/** Milliseconds since the context started; 0 outside a context */
export function getRequestDuration(): number {
  const context = getRequestContext();
  return context ? Date.now() - context.startTime : 0;
}
