/**
 * Listing query execution boundary.
 *
 * The orchestrator produces a QuerySnapshot; an executor turns it into rows.
 * PgListingExecutor is the production implementation; tests use an
 * in-process store behind the same interface.
 */

import { z } from "zod";
import { serverEnv } from "../env";
import { DataTransformError, wrapDatabaseError } from "../errors";
import { logger } from "../logger";
import type { ListingSummary } from "../../types/listing";
import { getTotalPages, type PaginatedResult } from "../../types/pagination";
import { compileListingCountQuery, compileListingQuery, type CompiledQuery } from "./listing-sql";
import type { QuerySnapshot } from "./query-builder";

export type ListingQueryResult = PaginatedResult<ListingSummary>;

export interface ListingQueryExecutor {
  execute(query: QuerySnapshot): Promise<ListingQueryResult>;
}

/**
 * The slice of a `pg` Pool the executor uses; a `Pool` satisfies it as-is.
 */
export interface ListingQueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

export interface ListingConnectionPool {
  connect(): Promise<ListingQueryClient>;
}

const listingRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  excerpt: z.string(),
  createdAt: z.union([z.date(), z.string()]).transform((value) =>
    value instanceof Date ? value.toISOString() : value,
  ),
});

const countRowSchema = z.object({
  total: z.coerce.number().int().nonnegative(),
});

export interface PgListingExecutorOptions {
  /** Statement timeout applied with SET LOCAL inside the query's transaction; defaults to SEARCH_QUERY_TIMEOUT_MS */
  timeoutMs?: number;
}

export class PgListingExecutor implements ListingQueryExecutor {
  private readonly timeoutMs: number;

  constructor(
    private readonly pool: ListingConnectionPool,
    options: PgListingExecutorOptions = {},
  ) {
    const timeoutMs = options.timeoutMs ?? serverEnv.SEARCH_QUERY_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive integer, got ${timeoutMs}`);
    }
    this.timeoutMs = timeoutMs;
  }

  async execute(query: QuerySnapshot): Promise<ListingQueryResult> {
    const listQuery = compileListingQuery(query);
    const countQuery = compileListingCountQuery(query);

    const [rows, countRows] = await this.withTimeout(async (client) => {
      const list = await client.query(listQuery.text, listQuery.values);
      const count = await client.query(countQuery.text, countQuery.values);
      return [list.rows, count.rows] as const;
    }, listQuery);

    const items = this.parseRows(rows);
    const parsedCount = countRowSchema.safeParse(countRows[0]);
    if (!parsedCount.success) {
      throw new DataTransformError("listing count", parsedCount.error);
    }

    const { page, perPage } = query.pagination;
    const total = parsedCount.data.total;
    return {
      items,
      total,
      page,
      perPage,
      totalPages: getTotalPages(total, perPage),
    };
  }

  /**
   * Runs `fn` in a transaction with a statement timeout so a runaway
   * search can't hold a connection. The timeout is a validated integer,
   * never request input.
   */
  private async withTimeout<T>(
    fn: (client: ListingQueryClient) => Promise<T>,
    context: CompiledQuery,
  ): Promise<T> {
    let client: ListingQueryClient | undefined;
    try {
      client = await this.pool.connect();
      await client.query("BEGIN");
      await client.query(`SET LOCAL statement_timeout = ${this.timeoutMs}`);
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      if (client) {
        await client.query("ROLLBACK").catch((rollbackError: unknown) => {
          logger.warn("Listing search rollback failed", {
            error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
          });
        });
      }
      const wrapped = wrapDatabaseError(error, "listing search");
      wrapped.log({ parameterCount: context.values.length });
      throw wrapped;
    } finally {
      client?.release();
    }
  }

  private parseRows(rows: readonly unknown[]): ListingSummary[] {
    return rows.map((row) => {
      const parsed = listingRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new DataTransformError("listing row", parsed.error);
      }
      return parsed.data;
    });
  }
}
