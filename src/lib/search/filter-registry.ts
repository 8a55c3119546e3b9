/**
 * FilterRegistry - catalog of the filters a search surface offers.
 *
 * One instance per engine, built by the composition root and passed to the
 * orchestrator and renderer. There is no global registry.
 */

import { logger, type Logger } from "../logger";
import type { SearchHooks } from "./hooks";
import type { SearchRequest } from "./search-request";
import type { ActiveFilter, ActiveFilterMap, AnyFilter, FilterSource, FilterType, FilterValue } from "./filters/types";

export interface ListFiltersOptions {
  type?: FilterType;
  source?: FilterSource;
  /** Only filters whose definition is enabled (default true) */
  activeOnly?: boolean;
  orderBy?: "priority" | "name";
  order?: "asc" | "desc";
}

export class FilterRegistry {
  // Map iteration order is registration order
  private readonly filters = new Map<string, AnyFilter>();
  private readonly log: Logger;

  constructor(
    private readonly hooks?: SearchHooks,
    log: Logger = logger,
  ) {
    this.log = log.child({ component: "filter-registry" });
  }

  /**
   * Returns false (and warns) for an empty or already-registered name; the
   * existing filter stays in place.
   */
  register(filter: AnyFilter): boolean {
    const name = filter.name;

    if (!name) {
      this.log.warn("Filter registration rejected: empty name", { type: filter.type });
      return false;
    }

    if (this.filters.has(name)) {
      this.log.warn("Filter registration rejected: name already registered", {
        name,
        type: filter.type,
      });
      return false;
    }

    this.filters.set(name, filter);
    this.hooks?.emit("filterRegistered", filter);
    return true;
  }

  unregister(name: string): boolean {
    const filter = this.filters.get(name);
    if (!filter) return false;

    this.filters.delete(name);
    this.hooks?.emit("filterUnregistered", filter);
    return true;
  }

  get(name: string): AnyFilter | null {
    return this.filters.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.filters.has(name);
  }

  count(): number {
    return this.filters.size;
  }

  clear(): void {
    this.filters.clear();
  }

  /**
   * Filters matching the options, sorted by priority (ties keep registration
   * order) or by name.
   */
  list(options: ListFiltersOptions = {}): AnyFilter[] {
    const { type, source, activeOnly = true, orderBy = "priority", order = "asc" } = options;
    const direction = order === "desc" ? -1 : 1;

    const matching = [...this.filters.values()].filter((filter) => {
      const definition = filter.definition;
      if (type !== undefined && filter.type !== type) return false;
      if (source !== undefined && definition.source !== source) return false;
      if (activeOnly && !definition.active) return false;
      return true;
    });

    // Array.prototype.sort is stable, so equal priorities keep registration order
    return matching.sort((a, b) => {
      if (orderBy === "name") {
        return a.name.localeCompare(b.name) * direction;
      }
      return (a.definition.priority - b.definition.priority) * direction;
    });
  }

  getValue(name: string, request: SearchRequest): FilterValue | null {
    const filter = this.filters.get(name);
    return filter ? filter.getValueFromRequest(request) : null;
  }

  /**
   * Enabled filters whose request value is active, keyed by name in list order.
   */
  resolveActive(request: SearchRequest): ActiveFilterMap {
    const active = new Map<string, ActiveFilter>();
    for (const filter of this.list()) {
      const value = filter.getValueFromRequest(request);
      if (filter.isActive(value)) {
        active.set(filter.name, { filter, value });
      }
    }
    return active;
  }
}
