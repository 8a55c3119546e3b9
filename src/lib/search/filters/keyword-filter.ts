import { createElement, type ReactElement } from "react";
import { KeywordField } from "../../../components/filters/KeywordField";
import {
  keywordFilterConfigSchema,
  type KeywordFilterConfig,
  type KeywordFilterConfigInput,
} from "../../filter-schema";
import { sanitizeKeyword, toParamString } from "../../search-params";
import type { SearchRequest } from "../search-request";
import { BaseFilter, type FilterInit } from "./base-filter";

/**
 * Free-text search box. Supplies the keyword but never touches the query
 * itself: keyword matching (title, content, excerpt and searchable fields)
 * belongs to the orchestrator.
 */
export class KeywordFilter extends BaseFilter<string, KeywordFilterConfig> {
  readonly type = "keyword" as const;

  constructor(init: FilterInit<KeywordFilterConfigInput, string> = {}) {
    super(keywordFilterConfigSchema, init);
  }

  sanitize(raw: unknown): string {
    const text = toParamString(raw);
    return text === undefined ? "" : sanitizeKeyword(text, this.config.maxLength);
  }

  getValueFromRequest(request: SearchRequest): string {
    return this.sanitize(request.get(this.getUrlParam()));
  }

  isActive(value: string): boolean {
    return value.trim().length >= this.config.minLength;
  }

  protected applyToQuery(): void {
    // Keyword matching is applied by the orchestrator's keyword step
  }

  render(value: string): ReactElement {
    const id = this.getFieldId();
    return this.renderField(
      value,
      createElement(KeywordField, {
        id,
        name: this.getUrlParam(),
        value,
        placeholder: this.config.placeholder,
        maxLength: this.config.maxLength,
      }),
      id,
    );
  }

  getDisplayValue(value: string): string {
    return `"${value}"`;
  }
}
