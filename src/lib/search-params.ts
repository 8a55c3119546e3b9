/**
 * Request parameter parsing helpers.
 *
 * Every helper is total: malformed input comes back as `undefined` (or an
 * empty list) and never throws, so a bad query string can't fail a search.
 */

import { MAX_KEYWORD_LENGTH } from "./constants";

export type RawParamValue = string | readonly string[] | null | undefined;

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const getFirstValue = (value: RawParamValue): string | undefined => {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string") return value;
  return value[0];
};

/**
 * Split repeated (?tag=a&tag=b) and/or CSV (?tag=a,b) values into one list.
 */
export const parseArrayParam = (value: RawParamValue): string[] => {
  if (value === null || value === undefined) return [];
  const values: readonly string[] = typeof value === "string" ? [value] : value;
  return values
    .flatMap((item) => item.split(","))
    .map((item) => item.trim())
    .filter(Boolean);
};

/**
 * Strict decimal parse. "12abc", "0x10" and "" are not numbers here,
 * unlike parseFloat/Number.
 */
export const parseNumeric = (value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const safeParseInt = (
  value: string | undefined,
  min?: number,
  max?: number,
  defaultVal?: number,
): number => {
  if (!value) return defaultVal ?? 1;
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return defaultVal ?? 1;
  const parsed = parseInt(trimmed, 10);
  if (!Number.isFinite(parsed)) return defaultVal ?? 1;
  let result = parsed;
  if (min !== undefined && result < min) result = min;
  if (max !== undefined && result > max) result = max;
  return result;
};

export const isValidCalendarDate = (value: string): boolean => {
  if (!DATE_PATTERN.test(value)) return false;
  const [year, month, day] = value.split("-").map((part) => parseInt(part, 10));
  if (month < 1 || month > 12) return false;
  if (day < 1 || day > 31) return false;
  const date = new Date(year, month - 1, day);
  return (
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
};

/**
 * Accepts YYYY-MM-DD calendar dates only ("2026-02-30" is rejected).
 */
export const safeParseDate = (value: string | undefined): string | undefined => {
  if (!value) return undefined;
  const trimmed = value.trim();
  return isValidCalendarDate(trimmed) ? trimmed : undefined;
};

/**
 * Case-insensitive match against an allowlist, returning the canonical spelling.
 */
export const safeParseEnum = <T extends string>(
  value: string | undefined,
  allowlist: readonly T[],
  defaultVal: T,
): T => {
  if (!value) return defaultVal;
  const lower = value.trim().toLowerCase();
  return allowlist.find((item) => item.toLowerCase() === lower) ?? defaultVal;
};

/**
 * Keep only allowlisted values (canonical spelling), de-duplicated, capped.
 */
export const safeParseArray = (
  values: readonly string[],
  allowlist: readonly string[],
  maxItems: number,
): string[] => {
  const allowMap = new Map(allowlist.map((item) => [item.toLowerCase(), item]));
  const validated = values
    .map((value) => allowMap.get(value.trim().toLowerCase()))
    .filter((value): value is string => value !== undefined);
  return [...new Set(validated)].slice(0, maxItems);
};

/**
 * Normalize free text typed into a search box: no markup, no control or
 * zero-width characters, single spaces, capped length.
 */
export function sanitizeKeyword(value: string, maxLength: number = MAX_KEYWORD_LENGTH): string {
  // Removals can leave a base character next to its combining mark; NFC runs after them
  return value
    .replace(/<[^>]*>/g, "")
    .replace(/[\u200B-\u200F\u2028-\u202F\uFEFF\u00AD\u2060-\u206F]/g, "")
    .replace(/[\x00-\x1F\x7F]/g, " ")
    .normalize("NFC")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, maxLength)
    .trim();
}

/**
 * Coerce an untyped raw value (request param, form field, JSON body) to a
 * single string; the first element of an array wins.
 */
export function toParamString(raw: unknown): string | undefined {
  if (typeof raw === "string") return raw;
  if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
  if (Array.isArray(raw)) return toParamString(raw[0]);
  return undefined;
}

/**
 * Coerce an untyped raw value to a list of strings (non-strings dropped).
 */
export function toParamList(raw: unknown): string[] {
  if (Array.isArray(raw)) {
    return raw.flatMap((item) => {
      const value = toParamString(item);
      return value === undefined ? [] : [value];
    });
  }
  const value = toParamString(raw);
  return value === undefined ? [] : [value];
}
