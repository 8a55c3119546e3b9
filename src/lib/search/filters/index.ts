import type { CheckboxFilterInit } from "./checkbox-filter";
import { CheckboxFilter } from "./checkbox-filter";
import type { DateRangeFilterConfigInput, KeywordFilterConfigInput, RangeFilterConfigInput } from "../../filter-schema";
import type { FilterInit } from "./base-filter";
import { DateRangeFilter } from "./date-range-filter";
import { KeywordFilter } from "./keyword-filter";
import { RangeFilter } from "./range-filter";
import { SelectFilter, type SelectFilterInit } from "./select-filter";
import type { AnyFilter, RangeValue } from "./types";

export type FilterConfig =
  | ({ type: "keyword" } & FilterInit<KeywordFilterConfigInput, string>)
  | ({ type: "range" } & FilterInit<RangeFilterConfigInput, RangeValue>)
  | ({ type: "date_range" } & FilterInit<DateRangeFilterConfigInput, RangeValue>)
  | ({ type: "select" } & SelectFilterInit)
  | ({ type: "checkbox" } & CheckboxFilterInit);

/**
 * Build a filter from a plain definition, e.g. one loaded from settings.
 * Throws FilterDefinitionError when the definition is invalid.
 */
export function createFilter(config: FilterConfig): AnyFilter {
  switch (config.type) {
    case "keyword":
      return new KeywordFilter(config);
    case "range":
      return new RangeFilter(config);
    case "date_range":
      return new DateRangeFilter(config);
    case "select":
      return new SelectFilter(config);
    case "checkbox":
      return new CheckboxFilter(config);
  }
}

export { BaseFilter, type FilterInit } from "./base-filter";
export { CheckboxFilter, type CheckboxFilterInit } from "./checkbox-filter";
export { DateRangeFilter } from "./date-range-filter";
export { KeywordFilter } from "./keyword-filter";
export { RangeFilter, isRangeValue, EMPTY_RANGE } from "./range-filter";
export { SelectFilter, type SelectFilterInit, type SelectValue } from "./select-filter";
export { createCategoryFilter, createTagFilter } from "./taxonomy-filters";
export { StaticTermProvider, type TermProvider } from "./term-provider";
export type * from "./types";
