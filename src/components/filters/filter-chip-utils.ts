/**
 * Filter Chip Utilities
 *
 * Pure functions that turn resolved active filters into displayable chips
 * and build the URLs that remove one filter or all of them.
 */

import { PAGE_PARAM } from "../../lib/constants";
import type { ActiveFilterMap, AnyFilter } from "../../lib/search/filters/types";
import type { SearchRequest } from "../../lib/search/search-request";

/**
 * Represents a single active filter that can be displayed and removed
 */
export interface FilterChipData {
  /** Filter name */
  name: string;
  /** Filter label, e.g. "Price" */
  label: string;
  /** Human-readable value, e.g. "$100,000 or more" */
  displayValue: string;
  /** Request parameters the chip's remove link drops */
  paramKeys: string[];
  /** Current request minus this filter's parameters and the page number */
  removeUrl: string;
}

/**
 * Append a request's parameters to a base URL, keeping their order.
 */
export function buildUrl(baseUrl: string, request: SearchRequest): string {
  const query = request.toQueryString();
  if (!query) return baseUrl;
  return `${baseUrl}${baseUrl.includes("?") ? "&" : "?"}${query}`;
}

/**
 * Drop the filter's own parameter(s) and the page number (the result set
 * changes, so page N may no longer exist). Everything else is preserved.
 */
export function removeFilterFromRequest(
  request: SearchRequest,
  filter: Pick<AnyFilter, "getUrlParams">,
): SearchRequest {
  return request.without([...filter.getUrlParams(), PAGE_PARAM]);
}

export function buildRemoveFilterUrl(
  baseUrl: string,
  filter: Pick<AnyFilter, "getUrlParams">,
  request: SearchRequest,
): string {
  return buildUrl(baseUrl, removeFilterFromRequest(request, filter));
}

/**
 * Convert resolved active filters to chips, in registry order.
 */
export function activeFiltersToChips(
  activeFilters: ActiveFilterMap,
  request: SearchRequest,
  baseUrl: string,
): FilterChipData[] {
  return [...activeFilters.values()].map(({ filter, value }) => ({
    name: filter.name,
    label: filter.label,
    displayValue: filter.getDisplayValue(value),
    paramKeys: filter.getUrlParams(),
    removeUrl: buildRemoveFilterUrl(baseUrl, filter, request),
  }));
}

/**
 * Check if there are any active filter chips
 */
export function hasFilterChips(activeFilters: ActiveFilterMap): boolean {
  return activeFilters.size > 0;
}
