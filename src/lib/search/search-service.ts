/**
 * Filter Listings - shared server function
 *
 * The search endpoint's body, callable directly from a route handler or a
 * server-rendered page: resolve the request, run the filtered query, and
 * return the page of results with the markup to swap into the results area.
 */

import { isDataError, wrapDatabaseError } from "../errors";
import { logger } from "../logger";
import { getRequestDuration, runWithRequestContext } from "../request-context";
import type { ListingSummary } from "../../types/listing";
import type { ListingQueryExecutor, ListingQueryResult } from "./listing-executor";
import type { SearchEngine } from "./search-engine";
import type { SearchRequest } from "./search-request";

export interface SearchListingsOptions {
  /** Overrides the engine's page size (still capped at MAX_PAGE_SIZE) */
  perPage?: number;
  /** Upstream request ID, e.g. from an x-request-id header */
  requestId?: string;
}

export interface ActiveFilterSummary {
  label: string;
  /** Display value, e.g. "$100 - $500" */
  value: string;
}

export interface SearchListingsResult {
  items: ListingSummary[];
  total: number;
  totalPages: number;
  page: number;
  perPage: number;
  activeFilters: Record<string, ActiveFilterSummary>;
  /** Result list markup, or the no-results message when the page is empty */
  html: string;
}

/**
 * Execute a filtered listing search.
 *
 * Executor failures are re-thrown as DataError subclasses; errors that
 * aren't DataErrors yet are wrapped and logged here.
 */
export async function searchListings(
  engine: SearchEngine,
  request: SearchRequest,
  executor: ListingQueryExecutor,
  options: SearchListingsOptions = {},
): Promise<SearchListingsResult> {
  return runWithRequestContext({ requestId: options.requestId, path: "searchListings" }, async () => {
    const { orchestrator, registry, renderer } = engine;
    const query = orchestrator.buildFilteredQuery(request, {
      perPage: options.perPage ?? engine.perPage,
    });

    let result: ListingQueryResult;
    try {
      result = await executor.execute(query.snapshot());
    } catch (error) {
      if (isDataError(error)) throw error;
      const wrapped = wrapDatabaseError(error, "listing search");
      wrapped.log({ filters: request.keys() });
      throw wrapped;
    }

    const activeFilters: Record<string, ActiveFilterSummary> = {};
    for (const [name, { filter, value }] of registry.resolveActive(request)) {
      activeFilters[name] = { label: filter.label, value: filter.getDisplayValue(value) };
    }

    const html =
      result.items.length > 0
        ? renderer.renderResults(result.items)
        : renderer.renderNoResults(request);

    logger.info("Listing search completed", {
      total: result.total,
      page: result.page,
      activeFilters: Object.keys(activeFilters),
      durationMs: getRequestDuration(),
    });

    return {
      items: result.items,
      total: result.total,
      totalPages: result.totalPages,
      page: result.page,
      perPage: result.perPage,
      activeFilters,
      html,
    };
  });
}
