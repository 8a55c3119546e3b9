/**
 * QueryBuilder - typed, mutable description of one listing query.
 *
 * Filters and the orchestrator only ever call the named mutators below; the
 * storage layer reads an immutable `snapshot()` and is the only place that
 * knows about SQL.
 */

import {
  DEFAULT_PAGE_SIZE,
  LISTING_STATUS_PUBLISHED,
  MAX_PAGE_SIZE,
  MAX_SAFE_PAGE,
} from "../constants";

export type AttributeValueType = "CHAR" | "NUMERIC" | "DATE";

export type ScalarValue = string | number;

export type AttributeClause =
  | {
      key: string;
      compare: "=" | ">=" | "<=";
      value: ScalarValue;
      type: AttributeValueType;
    }
  | {
      key: string;
      compare: "BETWEEN";
      value: readonly [ScalarValue, ScalarValue];
      type: AttributeValueType;
    }
  | {
      key: string;
      compare: "IN";
      value: readonly string[];
      type: AttributeValueType;
    };

/** Listing must carry at least one of `terms` (term slugs) in `taxonomy` */
export interface TaxonomyClause {
  taxonomy: string;
  terms: readonly string[];
}

export type SortDirection = "asc" | "desc";
export type NativeSortField = "date" | "title";

export type SortSpec =
  | { kind: "field"; field: NativeSortField; direction: SortDirection }
  | { kind: "attribute"; key: string; numeric: boolean; direction: SortDirection }
  | { kind: "random" };

export interface Pagination {
  page: number;
  perPage: number;
}

/**
 * What the query is for. A query is a listing search when it names the
 * listing collection, is the collection's archive view, or is scoped to
 * one of its taxonomies.
 */
export interface QueryTarget {
  collection?: string;
  archiveOf?: string;
  taxonomy?: string;
  /** The request's main query (as opposed to a widget or sidebar query) */
  isPrimary?: boolean;
}

export interface QuerySnapshot {
  readonly target: Readonly<QueryTarget>;
  readonly status: string;
  readonly searchTerm: string | null;
  readonly keywordMetaKeys: readonly string[];
  readonly attributeClauses: readonly AttributeClause[];
  readonly taxonomyClauses: readonly TaxonomyClause[];
  readonly sort: SortSpec;
  readonly pagination: Readonly<Pagination>;
}

export interface QueryBuilderInit {
  target?: QueryTarget;
  status?: string;
  page?: number;
  perPage?: number;
}

export const DEFAULT_SORT: SortSpec = { kind: "field", field: "date", direction: "desc" };

function clampInt(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

function sameClause(a: AttributeClause, b: AttributeClause): boolean {
  return (
    a.key === b.key &&
    a.compare === b.compare &&
    a.type === b.type &&
    JSON.stringify(a.value) === JSON.stringify(b.value)
  );
}

export class QueryBuilder {
  private target: QueryTarget;
  private status: string;
  private searchTerm: string | null = null;
  private keywordMetaKeys: string[] = [];
  private attributeClauses: AttributeClause[] = [];
  private taxonomyClauses: TaxonomyClause[] = [];
  private sort: SortSpec = DEFAULT_SORT;
  private pagination: Pagination;

  constructor(init: QueryBuilderInit = {}) {
    this.target = { ...init.target };
    this.status = init.status ?? LISTING_STATUS_PUBLISHED;
    this.pagination = {
      page: clampInt(init.page ?? 1, 1, MAX_SAFE_PAGE),
      perPage: clampInt(init.perPage ?? DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE),
    };
  }

  static fromSnapshot(snapshot: QuerySnapshot): QueryBuilder {
    const builder = new QueryBuilder({
      target: snapshot.target,
      status: snapshot.status,
      page: snapshot.pagination.page,
      perPage: snapshot.pagination.perPage,
    });
    builder.searchTerm = snapshot.searchTerm;
    builder.keywordMetaKeys = [...snapshot.keywordMetaKeys];
    builder.attributeClauses = [...snapshot.attributeClauses];
    builder.taxonomyClauses = [...snapshot.taxonomyClauses];
    builder.sort = snapshot.sort;
    return builder;
  }

  getTarget(): Readonly<QueryTarget> {
    return this.target;
  }

  /**
   * Appends an AND-ed attribute clause. Adding a clause identical to one
   * already present is a no-op, so re-applying a filter doesn't stack.
   */
  addAttributeClause(clause: AttributeClause): this {
    if (!this.attributeClauses.some((existing) => sameClause(existing, clause))) {
      this.attributeClauses.push(clause);
    }
    return this;
  }

  getAttributeClauses(): readonly AttributeClause[] {
    return this.attributeClauses;
  }

  addTaxonomyClause(clause: TaxonomyClause): this {
    if (clause.terms.length === 0) return this;
    const duplicate = this.taxonomyClauses.some(
      (existing) =>
        existing.taxonomy === clause.taxonomy &&
        existing.terms.join("\u0000") === clause.terms.join("\u0000"),
    );
    if (!duplicate) {
      this.taxonomyClauses.push({ taxonomy: clause.taxonomy, terms: [...clause.terms] });
    }
    return this;
  }

  getTaxonomyClauses(): readonly TaxonomyClause[] {
    return this.taxonomyClauses;
  }

  setSearchTerm(term: string | null): this {
    const trimmed = term?.trim() ?? "";
    this.searchTerm = trimmed === "" ? null : trimmed;
    return this;
  }

  getSearchTerm(): string | null {
    return this.searchTerm;
  }

  /** Attribute-store keys whose values also match the search term */
  setKeywordMetaKeys(keys: readonly string[]): this {
    this.keywordMetaKeys = [...keys];
    return this;
  }

  getKeywordMetaKeys(): readonly string[] {
    return this.keywordMetaKeys;
  }

  setSort(sort: SortSpec): this {
    this.sort = sort;
    return this;
  }

  getSort(): SortSpec {
    return this.sort;
  }

  setPagination(page: number, perPage: number = this.pagination.perPage): this {
    this.pagination = {
      page: clampInt(page, 1, MAX_SAFE_PAGE),
      perPage: clampInt(perPage, 1, MAX_PAGE_SIZE),
    };
    return this;
  }

  getPagination(): Readonly<Pagination> {
    return this.pagination;
  }

  setStatus(status: string): this {
    this.status = status;
    return this;
  }

  getStatus(): string {
    return this.status;
  }

  clone(): QueryBuilder {
    return QueryBuilder.fromSnapshot(this.snapshot());
  }

  snapshot(): QuerySnapshot {
    return Object.freeze({
      target: Object.freeze({ ...this.target }),
      status: this.status,
      searchTerm: this.searchTerm,
      keywordMetaKeys: Object.freeze([...this.keywordMetaKeys]),
      attributeClauses: Object.freeze([...this.attributeClauses]),
      taxonomyClauses: Object.freeze([...this.taxonomyClauses]),
      sort: this.sort,
      pagination: Object.freeze({ ...this.pagination }),
    });
  }
}
