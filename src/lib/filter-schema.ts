/**
 * Zod schemas for filter definitions.
 *
 * Operator-supplied configuration is validated once, when a filter is built.
 * Defaults live here so every filter kind resolves them the same way.
 */

import { z } from "zod";
import {
  DEFAULT_FILTER_PRIORITY,
  DEFAULT_MAX_CHECKBOX_ITEMS,
  KEYWORD_PARAM,
  MAX_KEYWORD_LENGTH,
  MIN_KEYWORD_LENGTH,
} from "./constants";
import { isValidCalendarDate } from "./search-params";
import type { FilterOption } from "./search/filters/types";

export const filterTypeSchema = z.enum(["keyword", "select", "checkbox", "range", "date_range"]);
export const filterSourceSchema = z.enum(["taxonomy", "field", "custom"]);

const filterOptionSchema = z.object({
  value: z.string(),
  label: z.string(),
});

/**
 * Options as an ordered list, or as a value -> label record.
 */
export const filterOptionsSchema = z
  .union([
    z.array(filterOptionSchema),
    z.record(z.string(), z.string()),
  ])
  .transform((options): FilterOption[] =>
    Array.isArray(options)
      ? options.map((option) => ({ value: option.value, label: option.label }))
      : Object.entries(options).map(([value, label]) => ({ value, label })),
  );

const isoDateSchema = z
  .string()
  .refine(isValidCalendarDate, { message: "Expected a YYYY-MM-DD calendar date" });

export const baseFilterConfigSchema = z.object({
  // Empty names are allowed here; the registry rejects them with a warning
  name: z.string().trim().default(""),
  label: z.string().optional(),
  source: filterSourceSchema.default("field"),
  sourceKey: z.string().default(""),
  options: filterOptionsSchema.default([]),
  priority: z.number().int().default(DEFAULT_FILTER_PRIORITY),
  active: z.boolean().default(true),
  placeholder: z.string().optional(),
  className: z.string().optional(),
});

export const keywordFilterConfigSchema = baseFilterConfigSchema.extend({
  name: z.string().trim().default(KEYWORD_PARAM),
  source: filterSourceSchema.default("custom"),
  minLength: z.number().int().min(1).default(MIN_KEYWORD_LENGTH),
  maxLength: z.number().int().min(1).max(1000).default(MAX_KEYWORD_LENGTH),
  placeholder: z.string().default("Search listings..."),
});

export const rangeFilterConfigSchema = baseFilterConfigSchema
  .extend({
    min: z.number().finite().nullable().default(null),
    max: z.number().finite().nullable().default(null),
    step: z.number().positive().default(1),
    minPlaceholder: z.string().default("Min"),
    maxPlaceholder: z.string().default("Max"),
    prefix: z.string().default(""),
    suffix: z.string().default(""),
  })
  .refine((config) => config.min === null || config.max === null || config.min <= config.max, {
    message: "min must not exceed max",
    path: ["min"],
  });

export const dateRangeFilterConfigSchema = baseFilterConfigSchema
  .extend({
    min: isoDateSchema.nullable().default(null),
    max: isoDateSchema.nullable().default(null),
    minPlaceholder: z.string().default("From"),
    maxPlaceholder: z.string().default("To"),
  })
  .refine((config) => config.min === null || config.max === null || config.min <= config.max, {
    message: "min must not be after max",
    path: ["min"],
  });

export const selectFilterConfigSchema = baseFilterConfigSchema.extend({
  multiple: z.boolean().default(false),
  emptyOption: z.string().default("All"),
});

export const checkboxFilterConfigSchema = baseFilterConfigSchema.extend({
  maxItems: z.number().int().positive().default(DEFAULT_MAX_CHECKBOX_ITEMS),
});

export type BaseFilterConfig = z.output<typeof baseFilterConfigSchema>;
export type KeywordFilterConfig = z.output<typeof keywordFilterConfigSchema>;
export type KeywordFilterConfigInput = z.input<typeof keywordFilterConfigSchema>;
export type RangeFilterConfig = z.output<typeof rangeFilterConfigSchema>;
export type RangeFilterConfigInput = z.input<typeof rangeFilterConfigSchema>;
export type DateRangeFilterConfig = z.output<typeof dateRangeFilterConfigSchema>;
export type DateRangeFilterConfigInput = z.input<typeof dateRangeFilterConfigSchema>;
export type SelectFilterConfig = z.output<typeof selectFilterConfigSchema>;
export type SelectFilterConfigInput = z.input<typeof selectFilterConfigSchema>;
export type CheckboxFilterConfig = z.output<typeof checkboxFilterConfigSchema>;
export type CheckboxFilterConfigInput = z.input<typeof checkboxFilterConfigSchema>;
