export * from "./lib/constants";
export * from "./lib/errors";
export { logger, redactSensitive, type Logger, type LogLevel, type LogMeta } from "./lib/logger";
export {
  runWithRequestContext,
  getRequestContext,
  getRequestId,
  getRequestIdFromHeaders,
  type RequestContext,
} from "./lib/request-context";
export { validateServerEnv, type ServerEnv } from "./lib/env";
export { createPool, type PoolOptions } from "./lib/db";

export * from "./lib/search/filters";
export { SearchRequest, type SearchRequestInit } from "./lib/search/search-request";
export * from "./lib/search/query-builder";
export { SearchHooks, type OrderbyOption, type RenderSurface, type SearchHookEvents, type SearchHookValues } from "./lib/search/hooks";
export { FilterRegistry, type ListFiltersOptions } from "./lib/search/filter-registry";
export { StaticFieldRegistry, type ContentField, type ContentFieldRegistry } from "./lib/search/field-registry";
export { sanitizeKey, getMetaKey, buildMetaKeyAllowlist } from "./lib/search/meta-keys";
export { SearchQueryOrchestrator, type OrderbyKey, type ResolvedSort, type SearchQueryOptions } from "./lib/search/search-query";
export { FilterRenderer, type FilterChipData, type SearchFormOptions } from "./lib/search/filter-renderer";
export { compileListingQuery, compileListingCountQuery, escapeLikePattern, type CompiledQuery } from "./lib/search/listing-sql";
export {
  PgListingExecutor,
  type ListingConnectionPool,
  type ListingQueryClient,
  type ListingQueryExecutor,
  type ListingQueryResult,
  type PgListingExecutorOptions,
} from "./lib/search/listing-executor";
export { createSearchEngine, createDefaultFilters, type SearchEngine, type SearchEngineOptions } from "./lib/search/search-engine";
export { searchListings, type SearchListingsOptions, type SearchListingsResult } from "./lib/search/search-service";
export type { ListingSummary } from "./types/listing";
export type { PaginatedResult } from "./types/pagination";
