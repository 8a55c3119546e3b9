/**
 * Lifecycle extension points.
 *
 * Each named point holds an ordered list of subscribers invoked synchronously
 * in subscription order. Events notify; value hooks receive the current value
 * and return the (possibly replaced) value for the next subscriber.
 */

import type { ActiveFilterMap, AnyFilter } from "./filters/types";
import type { QueryBuilder } from "./query-builder";
import type { SearchRequest } from "./search-request";

export type RenderSurface = "search-form" | "active-filters" | "no-results";

export interface OrderbyOption {
  value: string;
  label: string;
}

export interface SearchHookEvents {
  filterRegistered: [filter: AnyFilter];
  filterUnregistered: [filter: AnyFilter];
  beforeQueryModified: [query: QueryBuilder, request: SearchRequest];
  queryModified: [query: QueryBuilder, activeFilters: ActiveFilterMap];
  beforeRender: [surface: RenderSurface, request: SearchRequest];
  afterRender: [surface: RenderSurface, request: SearchRequest];
}

export interface SearchHookValues {
  /** Attribute-store keys searched by keyword; re-sanitized after this hook */
  searchableMetaKeys: string[];
  orderbyOptions: OrderbyOption[];
  /** Query built by buildFilteredQuery, before any filter runs */
  filteredQueryArgs: QueryBuilder;
}

export type EventListener<K extends keyof SearchHookEvents> = (
  ...args: SearchHookEvents[K]
) => void;

export type ValueHook<K extends keyof SearchHookValues> = (
  value: SearchHookValues[K],
) => SearchHookValues[K];

type ListenerLists = { [K in keyof SearchHookEvents]: Array<EventListener<K>> };
type ValueHookLists = { [K in keyof SearchHookValues]: Array<ValueHook<K>> };

export class SearchHooks {
  private readonly listeners: ListenerLists = {
    filterRegistered: [],
    filterUnregistered: [],
    beforeQueryModified: [],
    queryModified: [],
    beforeRender: [],
    afterRender: [],
  };

  private readonly valueHooks: ValueHookLists = {
    searchableMetaKeys: [],
    orderbyOptions: [],
    filteredQueryArgs: [],
  };

  /** Returns an unsubscribe function */
  on<K extends keyof SearchHookEvents>(event: K, listener: EventListener<K>): () => void {
    const list: Array<EventListener<K>> = this.listeners[event];
    list.push(listener);
    return () => {
      const index = list.indexOf(listener);
      if (index !== -1) list.splice(index, 1);
    };
  }

  emit<K extends keyof SearchHookEvents>(event: K, ...args: SearchHookEvents[K]): void {
    const list: Array<EventListener<K>> = this.listeners[event];
    // Snapshot so a listener unsubscribing itself doesn't skip the next one
    for (const listener of [...list]) {
      listener(...args);
    }
  }

  /** Returns an unsubscribe function */
  addValueHook<K extends keyof SearchHookValues>(name: K, hook: ValueHook<K>): () => void {
    const list: Array<ValueHook<K>> = this.valueHooks[name];
    list.push(hook);
    return () => {
      const index = list.indexOf(hook);
      if (index !== -1) list.splice(index, 1);
    };
  }

  applyValueHooks<K extends keyof SearchHookValues>(
    name: K,
    value: SearchHookValues[K],
  ): SearchHookValues[K] {
    const list: Array<ValueHook<K>> = this.valueHooks[name];
    let current = value;
    for (const hook of [...list]) {
      current = hook(current);
    }
    return current;
  }

  listenerCount(event: keyof SearchHookEvents): number {
    return this.listeners[event].length;
  }
}
