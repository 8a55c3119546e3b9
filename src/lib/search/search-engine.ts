/**
 * Composition root for a search surface.
 *
 * Wires one hooks bus, registry, orchestrator and renderer together and
 * registers the default keyword, category and tag filters. Nothing here is
 * global; build one engine per surface (or per test).
 */

import { serverEnv } from "../env";
import { logger as rootLogger, type Logger } from "../logger";
import { StaticFieldRegistry, type ContentField, type ContentFieldRegistry } from "./field-registry";
import { FilterRegistry } from "./filter-registry";
import { FilterRenderer } from "./filter-renderer";
import { createCategoryFilter, createFilter, createTagFilter, KeywordFilter, type FilterConfig } from "./filters";
import { StaticTermProvider, type TermProvider } from "./filters/term-provider";
import type { AnyFilter } from "./filters/types";
import { SearchHooks } from "./hooks";
import { SearchQueryOrchestrator } from "./search-query";

export interface SearchEngine {
  hooks: SearchHooks;
  registry: FilterRegistry;
  fields: ContentFieldRegistry;
  orchestrator: SearchQueryOrchestrator;
  renderer: FilterRenderer;
  /** Page size for filtered queries */
  perPage: number;
}

export interface SearchEngineOptions {
  /** Bare collection URL (default SEARCH_ARCHIVE_URL) */
  archiveUrl?: string;
  /** Default SEARCH_PER_PAGE */
  perPage?: number;
  fields?: ContentFieldRegistry | readonly ContentField[];
  /** Terms for the default category and tag filters */
  termProvider?: TermProvider;
  /** Register keyword, category and tag filters first (default true) */
  registerDefaults?: boolean;
  /** Extra filters, as instances or plain definitions */
  filters?: ReadonlyArray<AnyFilter | FilterConfig>;
  hooks?: SearchHooks;
  logger?: Logger;
}

function isFilter(value: AnyFilter | FilterConfig): value is AnyFilter {
  return "modifyQuery" in value;
}

function toFieldRegistry(fields: SearchEngineOptions["fields"]): ContentFieldRegistry {
  if (fields === undefined) return new StaticFieldRegistry();
  return "getSearchableFields" in fields ? fields : new StaticFieldRegistry(fields);
}

export function createDefaultFilters(termProvider: TermProvider): AnyFilter[] {
  return [
    new KeywordFilter({ priority: 1 }),
    createCategoryFilter(termProvider, { priority: 5 }),
    createTagFilter(termProvider, { priority: 10 }),
  ];
}

export function createSearchEngine(options: SearchEngineOptions = {}): SearchEngine {
  const log = options.logger ?? rootLogger;
  const hooks = options.hooks ?? new SearchHooks();
  const fields = toFieldRegistry(options.fields);
  const perPage = options.perPage ?? serverEnv.SEARCH_PER_PAGE;
  const archiveUrl = options.archiveUrl ?? serverEnv.SEARCH_ARCHIVE_URL;

  const registry = new FilterRegistry(hooks, log);
  if (options.registerDefaults ?? true) {
    const termProvider = options.termProvider ?? new StaticTermProvider({});
    for (const filter of createDefaultFilters(termProvider)) {
      registry.register(filter);
    }
  }
  for (const entry of options.filters ?? []) {
    registry.register(isFilter(entry) ? entry : createFilter(entry));
  }

  const orchestrator = new SearchQueryOrchestrator({ registry, hooks, fields, perPage, logger: log });
  const renderer = new FilterRenderer({ registry, orchestrator, hooks, archiveUrl });

  return { hooks, registry, fields, orchestrator, renderer, perPage };
}
