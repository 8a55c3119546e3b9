import { createElement, type ReactElement, type ReactNode } from "react";
import type { z } from "zod";
import { FilterField } from "../../../components/filters/FilterField";
import type { BaseFilterConfig } from "../../filter-schema";
import { FilterDefinitionError } from "../../errors";
import { humanizeName } from "../../utils";
import { getMetaKey } from "../meta-keys";
import type { QueryBuilder } from "../query-builder";
import type { SearchRequest } from "../search-request";
import type {
  Filter,
  FilterDefinition,
  FilterOption,
  FilterType,
  FilterValue,
  QueryCallback,
} from "./types";

export type FilterInit<TInput extends { name?: string }, TValue extends FilterValue> = TInput & {
  /** Runs after the kind's own query mutation; the only mutation for `custom` sources */
  queryCallback?: QueryCallback<TValue>;
};

/**
 * Shared plumbing for the built-in filter kinds: config validation and
 * defaults, label generation, attribute-store key derivation, and the
 * inactive-value guard around query mutation.
 */
export abstract class BaseFilter<TValue extends FilterValue, TConfig extends BaseFilterConfig>
  implements Filter<TValue>
{
  abstract readonly type: FilterType;

  protected readonly config: TConfig;
  private readonly queryCallback?: QueryCallback<TValue>;

  protected constructor(
    schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>,
    init: FilterInit<{ name?: string }, TValue>,
  ) {
    const { queryCallback, ...rest } = init;
    const result = schema.safeParse(rest);
    if (!result.success) {
      throw new FilterDefinitionError(rest.name ?? "", result.error.issues);
    }
    this.config = result.data;
    this.queryCallback = queryCallback;
  }

  get name(): string {
    return this.config.name;
  }

  get label(): string {
    return this.config.label || humanizeName(this.config.name);
  }

  get definition(): FilterDefinition {
    return Object.freeze({
      name: this.name,
      type: this.type,
      label: this.label,
      source: this.config.source,
      sourceKey: this.config.sourceKey,
      options: this.getOptions(),
      priority: this.config.priority,
      active: this.config.active,
    });
  }

  abstract sanitize(raw: unknown): TValue;
  abstract getValueFromRequest(request: SearchRequest): TValue;
  abstract isActive(value: TValue): boolean;
  abstract render(value: TValue): ReactElement;
  abstract getDisplayValue(value: TValue): string;

  /** Kind-specific mutation; only called with an active value */
  protected abstract applyToQuery(query: QueryBuilder, value: TValue): void;

  modifyQuery(query: QueryBuilder, value: TValue): void {
    if (!this.isActive(value)) return;
    if (this.config.source !== "custom") {
      this.applyToQuery(query, value);
    }
    this.queryCallback?.(query, value, this);
  }

  getUrlParam(): string {
    return this.name;
  }

  getUrlParams(): string[] {
    return [this.getUrlParam()];
  }

  getOptions(): readonly FilterOption[] {
    return this.config.options;
  }

  protected getMetaKey(): string {
    return getMetaKey(this.config.sourceKey || this.config.name);
  }

  protected getFieldId(): string {
    return `filter-${this.name}`;
  }

  protected renderField(value: TValue, control: ReactNode, labelTarget?: string): ReactElement {
    return createElement(FilterField, {
      name: this.name,
      type: this.type,
      label: this.label,
      active: this.isActive(value),
      htmlFor: labelTarget,
      className: this.config.className,
      children: control,
    });
  }
}
