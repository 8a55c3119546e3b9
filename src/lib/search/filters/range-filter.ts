import { createElement, type ReactElement } from "react";
import { RangeField } from "../../../components/filters/RangeField";
import {
  rangeFilterConfigSchema,
  type RangeFilterConfig,
  type RangeFilterConfigInput,
} from "../../filter-schema";
import { parseNumeric, toParamString } from "../../search-params";
import type { QueryBuilder } from "../query-builder";
import type { SearchRequest } from "../search-request";
import { BaseFilter, type FilterInit } from "./base-filter";
import type { RangeValue } from "./types";

export const EMPTY_RANGE: RangeValue = Object.freeze({ min: "", max: "" });

export function isRangeValue(value: unknown): value is RangeValue {
  return (
    typeof value === "object" &&
    value !== null &&
    "min" in value &&
    "max" in value &&
    typeof value.min === "string" &&
    typeof value.max === "string"
  );
}

export function readRangeInput(raw: unknown): { min: unknown; max: unknown } | undefined {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return undefined;
  return {
    min: "min" in raw ? raw.min : undefined,
    max: "max" in raw ? raw.max : undefined,
  };
}

/**
 * Numeric min/max filter over one attribute-store key, read from
 * `<name>_min` / `<name>_max`.
 */
export class RangeFilter extends BaseFilter<RangeValue, RangeFilterConfig> {
  readonly type = "range" as const;

  constructor(init: FilterInit<RangeFilterConfigInput, RangeValue>) {
    super(rangeFilterConfigSchema, init);
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
      min: this.sanitizeBound(input.min),
      max: this.sanitizeBound(input.max),
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
    const min = value.min === "" ? undefined : Number(value.min);
    const max = value.max === "" ? undefined : Number(value.max);

    if (min !== undefined && max !== undefined) {
      query.addAttributeClause({
        key,
        compare: "BETWEEN",
        value: [Math.min(min, max), Math.max(min, max)],
        type: "NUMERIC",
      });
    } else if (min !== undefined) {
      query.addAttributeClause({ key, compare: ">=", value: min, type: "NUMERIC" });
    } else if (max !== undefined) {
      query.addAttributeClause({ key, compare: "<=", value: max, type: "NUMERIC" });
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
        inputType: "number",
        min: this.config.min ?? undefined,
        max: this.config.max ?? undefined,
        step: this.config.step,
        prefix: this.config.prefix,
        suffix: this.config.suffix,
      }),
    );
  }

  getDisplayValue(value: RangeValue): string {
    const { min, max } = value;
    if (min !== "" && max !== "") {
      return `${this.formatBound(min)} - ${this.formatBound(max)}`;
    }
    if (min !== "") return `${this.formatBound(min)} or more`;
    if (max !== "") return `Up to ${this.formatBound(max)}`;
    return "";
  }

  /** Integer steps (>= 1) keep values whole; fractional steps keep decimals */
  private usesIntegers(): boolean {
    return Number.isInteger(this.config.step) && this.config.step >= 1;
  }

  private sanitizeBound(raw: unknown): string {
    const parsed = parseNumeric(toParamString(raw));
    if (parsed === undefined) return "";

    let number = this.usesIntegers() ? Math.trunc(parsed) : parsed;
    if (this.config.min !== null && number < this.config.min) number = this.config.min;
    if (this.config.max !== null && number > this.config.max) number = this.config.max;

    return String(number);
  }

  private formatBound(bound: string): string {
    const number = Number(bound);
    const formatted = Number.isFinite(number)
      ? number.toLocaleString("en-US", { maximumFractionDigits: 20 })
      : bound;
    return `${this.config.prefix}${formatted}${this.config.suffix}`;
  }
}
