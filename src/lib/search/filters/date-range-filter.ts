import { createElement, type ReactElement } from "react";
import { RangeField } from "../../../components/filters/RangeField";
import {
  dateRangeFilterConfigSchema,
  type DateRangeFilterConfig,
  type DateRangeFilterConfigInput,
} from "../../filter-schema";
import { safeParseDate, toParamString } from "../../search-params";
import { formatDisplayDate } from "../../utils";
import type { QueryBuilder } from "../query-builder";
import type { SearchRequest } from "../search-request";
import { BaseFilter, type FilterInit } from "./base-filter";
import { EMPTY_RANGE, readRangeInput } from "./range-filter";
import type { RangeValue } from "./types";

/**
 * Calendar-date range over one attribute-store key. Values are YYYY-MM-DD
 * strings, so lexical comparison is chronological.
 */
export class DateRangeFilter extends BaseFilter<RangeValue, DateRangeFilterConfig> {
  readonly type = "date_range" as const;

  constructor(init: FilterInit<DateRangeFilterConfigInput, RangeValue>) {
    super(dateRangeFilterConfigSchema, init);
  }

  getUrlParamMin(): string {
    return `${this.getUrlParam()}_min`;
  }

  getUrlParamMax(): string {
    return `${this.getUrlParam()}_max`;
  }

  getUrlParams(): string[] {
    return [this.getUrlParamMin(), this.getUrlParamMax()];
  }

  sanitize(raw: unknown): RangeValue {
    const input = readRangeInput(raw);
    if (!input) return { ...EMPTY_RANGE };
    return {
      min: this.sanitizeDate(input.min),
      max: this.sanitizeDate(input.max),
    };
  }

  getValueFromRequest(request: SearchRequest): RangeValue {
    return this.sanitize({
      min: request.get(this.getUrlParamMin()),
      max: request.get(this.getUrlParamMax()),
    });
  }

  isActive(value: RangeValue): boolean {
    return value.min !== "" || value.max !== "";
  }

  protected applyToQuery(query: QueryBuilder, value: RangeValue): void {
    const key = this.getMetaKey();
    const { min, max } = value;

    if (min !== "" && max !== "") {
      const [from, to] = min <= max ? [min, max] : [max, min];
      query.addAttributeClause({ key, compare: "BETWEEN", value: [from, to], type: "DATE" });
    } else if (min !== "") {
      query.addAttributeClause({ key, compare: ">=", value: min, type: "DATE" });
    } else if (max !== "") {
      query.addAttributeClause({ key, compare: "<=", value: max, type: "DATE" });
    }
  }

  render(value: RangeValue): ReactElement {
    return this.renderField(
      value,
      createElement(RangeField, {
        id: this.getFieldId(),
        minName: this.getUrlParamMin(),
        maxName: this.getUrlParamMax(),
        minValue: value.min,
        maxValue: value.max,
        minPlaceholder: this.config.minPlaceholder,
        maxPlaceholder: this.config.maxPlaceholder,
        inputType: "date",
        min: this.config.min ?? undefined,
        max: this.config.max ?? undefined,
      }),
    );
  }

  getDisplayValue(value: RangeValue): string {
    const { min, max } = value;
    if (min !== "" && max !== "") {
      return `${formatDisplayDate(min)} - ${formatDisplayDate(max)}`;
    }
    if (min !== "") return `From ${formatDisplayDate(min)}`;
    if (max !== "") return `Until ${formatDisplayDate(max)}`;
    return "";
  }

  private sanitizeDate(raw: unknown): string {
    const date = safeParseDate(toParamString(raw));
    if (date === undefined) return "";
    if (this.config.min !== null && date < this.config.min) return this.config.min;
    if (this.config.max !== null && date > this.config.max) return this.config.max;
    return date;
  }
}
