import { CATEGORY_TAXONOMY, TAG_TAXONOMY } from "../../constants";
import { CheckboxFilter, type CheckboxFilterInit } from "./checkbox-filter";
import { SelectFilter, type SelectFilterInit } from "./select-filter";
import type { TermProvider } from "./term-provider";

/**
 * Single-select category dropdown backed by the category taxonomy.
 */
export function createCategoryFilter(
  termProvider: TermProvider,
  overrides: Partial<SelectFilterInit> = {},
): SelectFilter {
  return new SelectFilter({
    name: "category",
    label: "Category",
    source: "taxonomy",
    sourceKey: CATEGORY_TAXONOMY,
    emptyOption: "All Categories",
    ...overrides,
    termProvider,
  });
}

/**
 * Tag checkboxes backed by the tag taxonomy; any ticked tag matches.
 */
export function createTagFilter(
  termProvider: TermProvider,
  overrides: Partial<CheckboxFilterInit> = {},
): CheckboxFilter {
  return new CheckboxFilter({
    name: "tag",
    label: "Tags",
    source: "taxonomy",
    sourceKey: TAG_TAXONOMY,
    maxItems: 20,
    ...overrides,
    termProvider,
  });
}
