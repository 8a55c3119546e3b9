// Mock implementations for testing

import type { Logger } from '@/lib/logger';
import type {
  ListingConnectionPool,
  ListingQueryClient,
} from '@/lib/search/listing-executor';

export interface MockLogger extends Logger {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
  log: jest.Mock;
  child: jest.Mock;
}

/**
 * Logger whose child() returns itself, so assertions see every call
 */
export function createMockLogger(): MockLogger {
  const mock: MockLogger = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    log: jest.fn(),
    child: jest.fn(),
  };
  mock.child.mockReturnValue(mock);
  return mock;
}

export type QueryHandler = (text: string, values?: unknown[]) => { rows: unknown[] } | Error;

export interface FakePool extends ListingConnectionPool {
  client: ListingQueryClient & { query: jest.Mock; release: jest.Mock };
  connect: jest.Mock;
}

/**
 * In-process stand-in for a pg Pool: one client whose query() answers from
 * `handler`. Returning an Error rejects that query.
 */
export function createFakePool(handler: QueryHandler): FakePool {
  const client = {
    query: jest.fn(async (text: string, values?: unknown[]) => {
      const result = handler(text, values);
      if (result instanceof Error) throw result;
      return result;
    }),
    release: jest.fn(),
  };
  return {
    client,
    connect: jest.fn(async () => client),
  };
}
