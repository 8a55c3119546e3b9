import { createElement, type ReactElement } from "react";
import { CheckboxField } from "../../../components/filters/CheckboxField";
import {
  checkboxFilterConfigSchema,
  type CheckboxFilterConfig,
  type CheckboxFilterConfigInput,
} from "../../filter-schema";
import { parseArrayParam, safeParseArray, toParamList } from "../../search-params";
import type { QueryBuilder } from "../query-builder";
import type { SearchRequest } from "../search-request";
import { BaseFilter, type FilterInit } from "./base-filter";
import type { TermProvider } from "./term-provider";
import type { FilterOption } from "./types";

export type CheckboxFilterInit = FilterInit<CheckboxFilterConfigInput, readonly string[]> & {
  /** Supplies options when `source` is "taxonomy" */
  termProvider?: TermProvider;
};

/**
 * Checkbox group: any of the ticked options matches. Accepts repeated
 * (`?tag=a&tag=b`) and comma-separated (`?tag=a,b`) parameters.
 */
export class CheckboxFilter extends BaseFilter<readonly string[], CheckboxFilterConfig> {
  readonly type = "checkbox" as const;

  private readonly termProvider?: TermProvider;

  constructor(init: CheckboxFilterInit) {
    super(checkboxFilterConfigSchema, init);
    this.termProvider = init.termProvider;
  }

  /** At most `maxItems` options are offered */
  getOptions(): readonly FilterOption[] {
    const options =
      this.config.source === "taxonomy" && this.termProvider
        ? this.termProvider.getTerms(this.getTaxonomy())
        : this.config.options;
    return options.slice(0, this.config.maxItems);
  }

  sanitize(raw: unknown): readonly string[] {
    const allowed = this.getOptions().map((option) => option.value);
    return safeParseArray(parseArrayParam(toParamList(raw)), allowed, this.config.maxItems);
  }

  getValueFromRequest(request: SearchRequest): readonly string[] {
    return this.sanitize(request.getAll(this.getUrlParam()));
  }

  isActive(value: readonly string[]): boolean {
    return value.length > 0;
  }

  protected applyToQuery(query: QueryBuilder, value: readonly string[]): void {
    if (this.config.source === "taxonomy") {
      query.addTaxonomyClause({ taxonomy: this.getTaxonomy(), terms: value });
      return;
    }
    query.addAttributeClause({ key: this.getMetaKey(), compare: "IN", value: [...value], type: "CHAR" });
  }

  render(value: readonly string[]): ReactElement {
    return this.renderField(
      value,
      createElement(CheckboxField, {
        id: this.getFieldId(),
        name: this.getUrlParam(),
        values: value,
        options: this.getOptions(),
      }),
    );
  }

  getDisplayValue(value: readonly string[]): string {
    const labels = new Map(this.getOptions().map((option) => [option.value, option.label]));
    return value.map((item) => labels.get(item) ?? item).join(", ");
  }

  private getTaxonomy(): string {
    return this.config.sourceKey || this.config.name;
  }
}
