import type { FilterOption } from "./types";

/**
 * Source of taxonomy terms for taxonomy-backed filters.
 * `value` is the term slug, `label` its display name.
 */
export interface TermProvider {
  getTerms(taxonomy: string): readonly FilterOption[];
}

/**
 * Fixed term lists, e.g. loaded once at startup or in tests.
 */
export class StaticTermProvider implements TermProvider {
  private readonly terms: ReadonlyMap<string, readonly FilterOption[]>;

  constructor(terms: Readonly<Record<string, readonly FilterOption[]>>) {
    this.terms = new Map(Object.entries(terms));
  }

  getTerms(taxonomy: string): readonly FilterOption[] {
    return this.terms.get(taxonomy) ?? [];
  }
}
