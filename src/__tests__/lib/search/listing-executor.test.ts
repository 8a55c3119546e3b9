jest.mock('@/lib/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(),
  },
}));

import { ConnectionError, DataTransformError, QueryError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { PgListingExecutor } from '@/lib/search/listing-executor';
import { QueryBuilder } from '@/lib/search/query-builder';
import { createFakePool, type QueryHandler } from '../../utils/mocks';

const ROW = {
  id: '1',
  title: 'Sunny Loft Downtown',
  excerpt: 'Bright loft near the park',
  createdAt: new Date('2026-01-10T09:00:00.000Z'),
};

function respond(overrides: { list?: unknown[] | Error; count?: unknown[] | Error; rollback?: Error } = {}): QueryHandler {
  return (text) => {
    if (text.startsWith('SELECT COUNT')) {
      const count = overrides.count ?? [{ total: '3' }];
      return count instanceof Error ? count : { rows: count };
    }
    if (text.startsWith('SELECT l.id')) {
      const list = overrides.list ?? [ROW];
      return list instanceof Error ? list : { rows: list };
    }
    if (text === 'ROLLBACK' && overrides.rollback) return overrides.rollback;
    return { rows: [] };
  };
}

const snapshot = () => new QueryBuilder({ perPage: 2 }).snapshot();

describe('PgListingExecutor', () => {
  it('runs both queries in a transaction with a statement timeout', async () => {
    const pool = createFakePool(respond());
    const executor = new PgListingExecutor(pool);

    const result = await executor.execute(snapshot());

    const statements = pool.client.query.mock.calls.map((call) => call[0]);
    expect(statements[0]).toBe('BEGIN');
    expect(statements[1]).toBe('SET LOCAL statement_timeout = 5000');
    expect(statements[2]).toMatch(/^SELECT l\.id::text AS id/);
    expect(statements[3]).toMatch(/^SELECT COUNT/);
    expect(statements[4]).toBe('COMMIT');
    expect(pool.client.release).toHaveBeenCalledTimes(1);

    expect(result).toEqual({
      items: [
        {
          id: '1',
          title: 'Sunny Loft Downtown',
          excerpt: 'Bright loft near the park',
          createdAt: '2026-01-10T09:00:00.000Z',
        },
      ],
      total: 3,
      page: 1,
      perPage: 2,
      totalPages: 2,
    });
  });

  it('uses the configured timeout', async () => {
    const pool = createFakePool(respond());
    await new PgListingExecutor(pool, { timeoutMs: 250 }).execute(snapshot());

    expect(pool.client.query).toHaveBeenCalledWith('SET LOCAL statement_timeout = 250');
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects timeoutMs %p', (timeoutMs) => {
    expect(() => new PgListingExecutor(createFakePool(respond()), { timeoutMs })).toThrow(RangeError);
  });

  it('rolls back and wraps a timeout as ConnectionError', async () => {
    const pool = createFakePool(
      respond({ list: new Error('canceling statement due to statement timeout') }),
    );

    await expect(new PgListingExecutor(pool).execute(snapshot())).rejects.toBeInstanceOf(ConnectionError);

    expect(pool.client.query).toHaveBeenCalledWith('ROLLBACK');
    expect(pool.client.query).not.toHaveBeenCalledWith('COMMIT');
    expect(pool.client.release).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Database connection failed',
      expect.objectContaining({ errorCode: 'CONNECTION_ERROR', parameterCount: 3 }),
    );
  });

  it('wraps other failures as QueryError', async () => {
    const pool = createFakePool(respond({ count: new Error('relation "listings" does not exist') }));

    const error = await new PgListingExecutor(pool).execute(snapshot()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toHaveProperty('message', 'Database query failed: listing search');
    expect(error).toHaveProperty('retryable', true);
  });

  it('still throws the query error when rollback fails', async () => {
    const pool = createFakePool(
      respond({ list: new Error('syntax error'), rollback: new Error('connection lost') }),
    );

    await expect(new PgListingExecutor(pool).execute(snapshot())).rejects.toBeInstanceOf(QueryError);

    expect(logger.warn).toHaveBeenCalledWith('Listing search rollback failed', { error: 'connection lost' });
    expect(pool.client.release).toHaveBeenCalledTimes(1);
  });

  it('does not roll back or release when no connection was acquired', async () => {
    const pool = createFakePool(respond());
    pool.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

    await expect(new PgListingExecutor(pool).execute(snapshot())).rejects.toBeInstanceOf(ConnectionError);

    expect(pool.client.query).not.toHaveBeenCalled();
    expect(pool.client.release).not.toHaveBeenCalled();
  });

  it('rejects a malformed listing row', async () => {
    const pool = createFakePool(respond({ list: [{ id: 1, title: 'No excerpt' }] }));

    const error = await new PgListingExecutor(pool).execute(snapshot()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataTransformError);
    expect(error).toHaveProperty('message', 'Data transformation failed: listing row');
    expect(error).toHaveProperty('cause.name', 'ZodError');
  });

  it('rejects a missing count row', async () => {
    const pool = createFakePool(respond({ count: [] }));

    await expect(new PgListingExecutor(pool).execute(snapshot())).rejects.toBeInstanceOf(DataTransformError);
    await expect(new PgListingExecutor(pool).execute(snapshot())).rejects.toThrow(
      'Data transformation failed: listing count',
    );
  });

  it('passes string timestamps through unchanged', async () => {
    const pool = createFakePool(respond({ list: [{ ...ROW, createdAt: '2026-01-10 09:00:00+00' }] }));

    const result = await new PgListingExecutor(pool).execute(snapshot());

    expect(result.items[0].createdAt).toBe('2026-01-10 09:00:00+00');
  });
});
