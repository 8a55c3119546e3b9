/**
 * SearchQueryOrchestrator
 *
 * Turns a SearchRequest into mutations on a QueryBuilder:
 *
 * 1. scope check (listing collection, its archive, or one of its taxonomies)
 * 2. active filters, in registry order, AND-ed together
 * 3. sort, from a fixed allowlist with date/desc fallbacks
 * 4. keyword search over title, content, excerpt and searchable fields
 *
 * Two entry points share steps 2-4: `modifyPrimaryQuery` for the request's
 * main archive query, and `buildFilteredQuery` for embedded searches that
 * never run as the main query.
 */

import {
  DEFAULT_ORDER,
  DEFAULT_ORDERBY,
  DEFAULT_PAGE_SIZE,
  LISTING_COLLECTION,
  LISTING_TAXONOMIES,
  MAX_SAFE_PAGE,
  ORDERBY_PARAM,
  ORDER_PARAM,
  PAGE_PARAM,
  VALID_ORDERBY_KEYS,
  VALID_ORDER_DIRECTIONS,
  VIEWS_FIELD,
} from "../constants";
import { logger, type Logger } from "../logger";
import { safeParseEnum, safeParseInt } from "../search-params";
import type { ContentFieldRegistry } from "./field-registry";
import type { ListingQueryExecutor, ListingQueryResult } from "./listing-executor";
import type { FilterRegistry } from "./filter-registry";
import { KeywordFilter } from "./filters/keyword-filter";
import type { ActiveFilterMap, AnyFilter } from "./filters/types";
import type { OrderbyOption, SearchHooks } from "./hooks";
import { buildMetaKeyAllowlist, getMetaKey } from "./meta-keys";
import {
  QueryBuilder,
  type QueryBuilderInit,
  type SortDirection,
  type SortSpec,
} from "./query-builder";
import type { SearchRequest } from "./search-request";

export type OrderbyKey = (typeof VALID_ORDERBY_KEYS)[number];

export interface ResolvedSort {
  orderby: OrderbyKey;
  order: SortDirection;
  spec: SortSpec;
}

export interface SearchQueryOptions {
  registry: FilterRegistry;
  hooks?: SearchHooks;
  fields?: ContentFieldRegistry;
  /** Page size for queries built by buildFilteredQuery */
  perPage?: number;
  logger?: Logger;
}

const ORDERBY_LABELS: Record<OrderbyKey, string> = {
  date: "Newest First",
  title: "Title A-Z",
  views: "Most Viewed",
  random: "Random",
};

export class SearchQueryOrchestrator {
  private readonly registry: FilterRegistry;
  private readonly hooks?: SearchHooks;
  private readonly fields?: ContentFieldRegistry;
  private readonly perPage: number;
  private readonly log: Logger;
  private readonly fallbackKeywordFilter = new KeywordFilter();

  constructor(options: SearchQueryOptions) {
    this.registry = options.registry;
    this.hooks = options.hooks;
    this.fields = options.fields;
    this.perPage = options.perPage ?? DEFAULT_PAGE_SIZE;
    this.log = (options.logger ?? logger).child({ component: "search-query" });
  }

  isListingQuery(query: QueryBuilder): boolean {
    const target = query.getTarget();
    if (target.collection === LISTING_COLLECTION) return true;
    if (target.archiveOf === LISTING_COLLECTION) return true;
    return target.taxonomy !== undefined && LISTING_TAXONOMIES.includes(target.taxonomy);
  }

  /**
   * Hook for the request's main query. Leaves non-primary and out-of-scope
   * queries untouched; returns whether the query was modified.
   */
  modifyPrimaryQuery(query: QueryBuilder, request: SearchRequest): boolean {
    if (!query.getTarget().isPrimary || !this.isListingQuery(query)) {
      return false;
    }

    query.setPagination(this.resolvePage(request));
    this.applyFilters(query, request);
    this.applySort(query, request);
    this.applyKeywordSearch(query, request);
    return true;
  }

  /**
   * Fully resolved listing query for an embedded or API search. Nothing is
   * executed; hand `query.snapshot()` to an executor.
   */
  buildFilteredQuery(request: SearchRequest, init: QueryBuilderInit = {}): QueryBuilder {
    const base = new QueryBuilder({
      ...init,
      target: { collection: LISTING_COLLECTION, ...init.target },
      page: init.page ?? this.resolvePage(request),
      perPage: init.perPage ?? this.perPage,
    });
    const query = this.hooks ? this.hooks.applyValueHooks("filteredQueryArgs", base) : base;

    this.applyFilters(query, request);
    this.applySort(query, request);
    this.applyKeywordSearch(query, request);
    return query;
  }

  /**
   * Builds the filtered query and runs it. Executor errors propagate.
   */
  async getFilteredListings(
    request: SearchRequest,
    executor: ListingQueryExecutor,
    init: QueryBuilderInit = {},
  ): Promise<ListingQueryResult> {
    const query = this.buildFilteredQuery(request, init);
    return executor.execute(query.snapshot());
  }

  applyFilters(query: QueryBuilder, request: SearchRequest): ActiveFilterMap {
    this.hooks?.emit("beforeQueryModified", query, request);

    const active = this.registry.resolveActive(request);
    for (const { filter, value } of active.values()) {
      filter.modifyQuery(query, value);
    }

    this.log.debug("Applied search filters", { active: [...active.keys()] });
    this.hooks?.emit("queryModified", query, active);
    return active;
  }

  applySort(query: QueryBuilder, request: SearchRequest): ResolvedSort {
    const sort = this.resolveSort(request);
    query.setSort(sort.spec);
    return sort;
  }

  /**
   * Key and direction are resolved independently: an unknown or missing
   * `orderby` falls back to date but keeps a valid `order`.
   */
  resolveSort(request: SearchRequest): ResolvedSort {
    const orderby = this.getCurrentOrderby(request);
    const order = this.getCurrentOrder(request);

    switch (orderby) {
      case "views":
        return {
          orderby,
          order,
          spec: { kind: "attribute", key: getMetaKey(VIEWS_FIELD), numeric: true, direction: order },
        };
      case "random":
        return { orderby, order, spec: { kind: "random" } };
      case "title":
      case "date":
        return { orderby, order, spec: { kind: "field", field: orderby, direction: order } };
    }
  }

  /**
   * Sets the search term and the searchable attribute keys when the keyword
   * is active. Returns the keyword applied, or null.
   */
  applyKeywordSearch(query: QueryBuilder, request: SearchRequest): string | null {
    const keyword = this.getCurrentKeyword(request);
    if (keyword === "") return null;

    query.setSearchTerm(keyword);
    query.setKeywordMetaKeys(this.getSearchableMetaKeys());
    return keyword;
  }

  /**
   * Storage keys of searchable fields plus any added through the
   * `searchableMetaKeys` hook. Hook-supplied keys are sanitized exactly like
   * registry-derived ones.
   */
  getSearchableMetaKeys(): string[] {
    const fields = this.fields;
    const derived = fields
      ? fields.getSearchableFields().map((field) => fields.getMetaKey(field.name))
      : [];
    const allowlist = buildMetaKeyAllowlist(derived);

    if (!this.hooks) return allowlist;
    return buildMetaKeyAllowlist(this.hooks.applyValueHooks("searchableMetaKeys", allowlist));
  }

  getOrderbyOptions(): OrderbyOption[] {
    const options = VALID_ORDERBY_KEYS.map((value) => ({ value, label: ORDERBY_LABELS[value] }));
    return this.hooks ? this.hooks.applyValueHooks("orderbyOptions", options) : options;
  }

  getCurrentOrderby(request: SearchRequest): OrderbyKey {
    return safeParseEnum(request.get(ORDERBY_PARAM) ?? undefined, VALID_ORDERBY_KEYS, DEFAULT_ORDERBY);
  }

  getCurrentOrder(request: SearchRequest): SortDirection {
    return safeParseEnum(request.get(ORDER_PARAM) ?? undefined, VALID_ORDER_DIRECTIONS, DEFAULT_ORDER);
  }

  /**
   * Active keyword, or "" when missing, shorter than the filter's minimum,
   * or when the registered keyword filter is disabled.
   */
  getCurrentKeyword(request: SearchRequest): string {
    const filter = this.getKeywordFilter();
    if (!filter.definition.active) return "";
    const value = filter.getValueFromRequest(request);
    return typeof value === "string" && filter.isActive(value) ? value : "";
  }

  /** 1-based; non-numeric and non-positive values give 1 */
  resolvePage(request: SearchRequest): number {
    return safeParseInt(request.get(PAGE_PARAM) ?? undefined, 1, MAX_SAFE_PAGE, 1);
  }

  /** The registered keyword filter, disabled or not; the default one only when none is registered */
  private getKeywordFilter(): AnyFilter {
    return this.registry.list({ type: "keyword", activeOnly: false })[0] ?? this.fallbackKeywordFilter;
  }
}
