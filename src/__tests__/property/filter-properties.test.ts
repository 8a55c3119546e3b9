/**
 * Property-Based Tests for the Filter System
 *
 * Uses fast-check to verify invariants hold for ANY input:
 * - sanitizers are total (never throw, always return the kind's shape)
 * - range bounds stay inside the configured window
 * - registry ordering is a stable sort by priority
 * - keyword sanitization is idempotent
 * - meta-key allowlists only contain sanitized, unique keys
 * - page resolution stays within [1, MAX_SAFE_PAGE]
 */

import * as fc from 'fast-check';
import { MAX_SAFE_PAGE } from '@/lib/constants';
import { sanitizeKeyword } from '@/lib/search-params';
import { FilterRegistry } from '@/lib/search/filter-registry';
import {
  CheckboxFilter,
  DateRangeFilter,
  KeywordFilter,
  RangeFilter,
  SelectFilter,
  type AnyFilter,
} from '@/lib/search/filters';
import { buildMetaKeyAllowlist } from '@/lib/search/meta-keys';
import { SearchQueryOrchestrator } from '@/lib/search/search-query';
import { SearchRequest } from '@/lib/search/search-request';
import { createMockLogger } from '../utils/mocks';

// ============================================
// Arbitraries
// ============================================

const boundArb = fc.oneof(
  fc.string(),
  fc.integer(),
  fc.double(),
  fc.constantFrom('', '0', '-0', '1e3', '999.99', '12abc', '0x10', ' 50 '),
);

const rangeInputArb = fc.record({ min: boundArb, max: boundArb });

// ============================================
// Properties
// ============================================

describe('filter invariants', () => {
  const filters: AnyFilter[] = [
    new KeywordFilter(),
    new RangeFilter({ name: 'price', min: 0, max: 1000 }),
    new DateRangeFilter({ name: 'available' }),
    new SelectFilter({ name: 'city', options: { austin: 'Austin' } }),
    new SelectFilter({ name: 'cities', multiple: true, options: { austin: 'Austin', dallas: 'Dallas' } }),
    new CheckboxFilter({ name: 'amenity', options: { wifi: 'WiFi' } }),
  ];

  it('sanitize never throws and its result is always displayable', () => {
    fc.assert(
      fc.property(fc.anything(), (raw) => {
        for (const filter of filters) {
          const value = filter.sanitize(raw);
          expect(typeof filter.isActive(value)).toBe('boolean');
          expect(typeof filter.getDisplayValue(value)).toBe('string');
        }
      }),
    );
  });

  it('range bounds are empty or whole numbers inside the configured window', () => {
    const price = new RangeFilter({ name: 'price', min: 0, max: 1000 });

    fc.assert(
      fc.property(rangeInputArb, (raw) => {
        const value = price.sanitize(raw);
        for (const bound of [value.min, value.max]) {
          if (bound === '') continue;
          const number = Number(bound);
          expect(Number.isInteger(number)).toBe(true);
          expect(number).toBeGreaterThanOrEqual(0);
          expect(number).toBeLessThanOrEqual(1000);
        }
      }),
    );
  });

  it('registry list is a stable sort by priority', () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: -3, max: 3 }), { maxLength: 25 }), (priorities) => {
        const registry = new FilterRegistry(undefined, createMockLogger());
        priorities.forEach((priority, index) => {
          registry.register(new SelectFilter({ name: `f${index}`, priority }));
        });

        const expected = priorities
          .map((priority, index) => ({ priority, name: `f${index}` }))
          .sort((a, b) => a.priority - b.priority)
          .map((entry) => entry.name);

        expect(registry.list().map((filter) => filter.name)).toEqual(expected);
      }),
    );
  });

  it('sanitizeKeyword is idempotent and bounded', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), fc.integer({ min: 1, max: 250 }), (text, maxLength) => {
        const once = sanitizeKeyword(text, maxLength);
        expect(sanitizeKeyword(once, maxLength)).toBe(once);
        expect(once.length).toBeLessThanOrEqual(maxLength);
        expect(once).toBe(once.trim());
        expect(once).not.toMatch(/\s{2,}/);
      }),
    );
  });

  it('meta-key allowlists hold unique sanitized keys', () => {
    fc.assert(
      fc.property(fc.array(fc.string()), (keys) => {
        const allowlist = buildMetaKeyAllowlist(keys);
        expect(new Set(allowlist).size).toBe(allowlist.length);
        for (const key of allowlist) {
          expect(key).toMatch(/^[a-z0-9_-]+$/);
        }
      }),
    );
  });

  it('resolved page is always within bounds', () => {
    const orchestrator = new SearchQueryOrchestrator({
      registry: new FilterRegistry(undefined, createMockLogger()),
      logger: createMockLogger(),
    });

    fc.assert(
      fc.property(fc.oneof(fc.string(), fc.integer().map(String)), (paged) => {
        const page = orchestrator.resolvePage(new SearchRequest({ paged }));
        expect(Number.isInteger(page)).toBe(true);
        expect(page).toBeGreaterThanOrEqual(1);
        expect(page).toBeLessThanOrEqual(MAX_SAFE_PAGE);
      }),
    );
  });
});
