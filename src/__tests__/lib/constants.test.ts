/**
 * Tests for Search Constants
 *
 * Validates that the search constants agree with each other and with the
 * storage conventions other modules rely on.
 */

import {
  CATEGORY_TAXONOMY,
  DEFAULT_ORDER,
  DEFAULT_ORDERBY,
  DEFAULT_PAGE_SIZE,
  LISTING_TAXONOMIES,
  MAX_KEYWORD_LENGTH,
  MAX_PAGE_SIZE,
  MAX_SAFE_PAGE,
  META_KEY_PREFIX,
  MIN_KEYWORD_LENGTH,
  TAG_TAXONOMY,
  VALID_ORDER_DIRECTIONS,
  VALID_ORDERBY_KEYS,
} from '@/lib/constants';
import { sanitizeKey } from '@/lib/search/meta-keys';

describe('Search Constants', () => {
  describe('Pagination constants', () => {
    it('MAX_SAFE_PAGE is a positive integer', () => {
      expect(Number.isInteger(MAX_SAFE_PAGE)).toBe(true);
      expect(MAX_SAFE_PAGE).toBeGreaterThan(0);
    });

    it('DEFAULT_PAGE_SIZE fits under MAX_PAGE_SIZE', () => {
      expect(Number.isInteger(DEFAULT_PAGE_SIZE)).toBe(true);
      expect(DEFAULT_PAGE_SIZE).toBeGreaterThanOrEqual(1);
      expect(MAX_PAGE_SIZE).toBeGreaterThanOrEqual(DEFAULT_PAGE_SIZE);
    });
  });

  describe('Keyword constants', () => {
    it('MAX_KEYWORD_LENGTH > MIN_KEYWORD_LENGTH', () => {
      expect(MIN_KEYWORD_LENGTH).toBeGreaterThan(0);
      expect(MAX_KEYWORD_LENGTH).toBeGreaterThan(MIN_KEYWORD_LENGTH);
    });
  });

  describe('Sort constants', () => {
    it('defaults are members of their allowlists', () => {
      expect(VALID_ORDERBY_KEYS).toContain(DEFAULT_ORDERBY);
      expect(VALID_ORDER_DIRECTIONS).toContain(DEFAULT_ORDER);
    });
  });

  describe('Storage constants', () => {
    it('META_KEY_PREFIX survives key sanitization', () => {
      expect(sanitizeKey(META_KEY_PREFIX)).toBe(META_KEY_PREFIX);
    });

    it('listing taxonomies include category and tag', () => {
      expect(LISTING_TAXONOMIES).toEqual([CATEGORY_TAXONOMY, TAG_TAXONOMY]);
    });
  });
});
