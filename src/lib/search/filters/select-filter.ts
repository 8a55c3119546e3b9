import { createElement, type ReactElement } from "react";
import { SelectField } from "../../../components/filters/SelectField";
import {
  selectFilterConfigSchema,
  type SelectFilterConfig,
  type SelectFilterConfigInput,
} from "../../filter-schema";
import { parseArrayParam, safeParseArray, safeParseEnum, toParamList, toParamString } from "../../search-params";
import type { QueryBuilder } from "../query-builder";
import type { SearchRequest } from "../search-request";
import { BaseFilter, type FilterInit } from "./base-filter";
import type { TermProvider } from "./term-provider";
import type { FilterOption } from "./types";

export type SelectValue = string | readonly string[];

export type SelectFilterInit = FilterInit<SelectFilterConfigInput, SelectValue> & {
  /** Supplies options when `source` is "taxonomy" */
  termProvider?: TermProvider;
};

/**
 * Dropdown over a fixed option set. Single-select values are a string
 * ("" when absent); multi-select values are a list.
 */
export class SelectFilter extends BaseFilter<SelectValue, SelectFilterConfig> {
  readonly type = "select" as const;

  private readonly termProvider?: TermProvider;

  constructor(init: SelectFilterInit) {
    super(selectFilterConfigSchema, init);
    this.termProvider = init.termProvider;
  }

  getOptions(): readonly FilterOption[] {
    if (this.config.source === "taxonomy" && this.termProvider) {
      return this.termProvider.getTerms(this.getTaxonomy());
    }
    return this.config.options;
  }

  sanitize(raw: unknown): SelectValue {
    const allowed = this.getOptions().map((option) => option.value);
    if (this.config.multiple) {
      return safeParseArray(parseArrayParam(toParamList(raw)), allowed, allowed.length);
    }
    const value = toParamString(raw);
    if (!value) return "";
    return safeParseEnum<string>(value, allowed, "");
  }

  getValueFromRequest(request: SearchRequest): SelectValue {
    const param = this.getUrlParam();
    return this.config.multiple ? this.sanitize(request.getAll(param)) : this.sanitize(request.get(param));
  }

  isActive(value: SelectValue): boolean {
    return typeof value === "string" ? value !== "" : value.length > 0;
  }

  protected applyToQuery(query: QueryBuilder, value: SelectValue): void {
    const values = typeof value === "string" ? [value] : [...value];

    if (this.config.source === "taxonomy") {
      query.addTaxonomyClause({ taxonomy: this.getTaxonomy(), terms: values });
      return;
    }

    const key = this.getMetaKey();
    if (values.length === 1) {
      query.addAttributeClause({ key, compare: "=", value: values[0], type: "CHAR" });
    } else {
      query.addAttributeClause({ key, compare: "IN", value: values, type: "CHAR" });
    }
  }

  render(value: SelectValue): ReactElement {
    const id = this.getFieldId();
    return this.renderField(
      value,
      createElement(SelectField, {
        id,
        name: this.getUrlParam(),
        value,
        options: this.getOptions(),
        multiple: this.config.multiple,
        emptyOption: this.config.emptyOption,
      }),
      id,
    );
  }

  getDisplayValue(value: SelectValue): string {
    const values = typeof value === "string" ? (value ? [value] : []) : value;
    const labels = new Map(this.getOptions().map((option) => [option.value, option.label]));
    return values.map((item) => labels.get(item) ?? item).join(", ");
  }

  private getTaxonomy(): string {
    return this.config.sourceKey || this.config.name;
  }
}
