/**
 * Attribute-store key derivation.
 *
 * Filters, the keyword-search allowlist and the content field registry all
 * go through `getMetaKey`, so the three can never disagree on key spelling.
 */

import { META_KEY_PREFIX } from "../constants";

/**
 * Lower-case and keep only `[a-z0-9_-]`.
 */
export function sanitizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9_-]/g, "");
}

export function getMetaKey(fieldName: string): string {
  return `${META_KEY_PREFIX}${sanitizeKey(fieldName)}`;
}

/**
 * Sanitize every key, drop the ones that sanitize to nothing, and de-duplicate
 * keeping first-seen order.
 */
export function buildMetaKeyAllowlist(keys: Iterable<string>): string[] {
  const allowlist = new Set<string>();
  for (const key of keys) {
    const sanitized = sanitizeKey(key);
    if (sanitized) allowlist.add(sanitized);
  }
  return [...allowlist];
}
