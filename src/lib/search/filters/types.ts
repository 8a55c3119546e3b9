import type { ReactElement } from "react";
import type { QueryBuilder } from "../query-builder";
import type { SearchRequest } from "../search-request";

export type FilterType = "keyword" | "select" | "checkbox" | "range" | "date_range";

/** Where a filter's values live: a taxonomy, a content field, or caller-defined */
export type FilterSource = "taxonomy" | "field" | "custom";

export interface FilterOption {
  value: string;
  label: string;
}

/** `{ min: "", max: "" }` is the absent range */
export interface RangeValue {
  min: string;
  max: string;
}

export type FilterValue = string | readonly string[] | RangeValue;

/**
 * Resolved, validated configuration shared by every filter kind.
 */
export interface FilterDefinition {
  readonly name: string;
  readonly type: FilterType;
  readonly label: string;
  readonly source: FilterSource;
  readonly sourceKey: string;
  readonly options: readonly FilterOption[];
  readonly priority: number;
  readonly active: boolean;
}

export interface Filter<TValue extends FilterValue = FilterValue> {
  readonly name: string;
  readonly type: FilterType;
  readonly label: string;
  readonly definition: FilterDefinition;

  /** Never throws; anything unusable comes back as the absent value */
  sanitize(raw: unknown): TValue;
  getValueFromRequest(request: SearchRequest): TValue;
  isActive(value: TValue): boolean;
  /** No-op when the value is inactive; only touches `query` */
  modifyQuery(query: QueryBuilder, value: TValue): void;
  render(value: TValue): ReactElement;
  getDisplayValue(value: TValue): string;
  /** Primary request parameter */
  getUrlParam(): string;
  /** Every request parameter the filter reads */
  getUrlParams(): string[];
  getOptions(): readonly FilterOption[];
}

export type AnyFilter = Filter<FilterValue>;

export type QueryCallback<TValue extends FilterValue> = (
  query: QueryBuilder,
  value: TValue,
  filter: Filter<TValue>,
) => void;

export interface ActiveFilter {
  filter: AnyFilter;
  value: FilterValue;
}

/** Active filters keyed by name, in registry order */
export type ActiveFilterMap = ReadonlyMap<string, ActiveFilter>;
