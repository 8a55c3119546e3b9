/**
 * Listing Query Compilation
 *
 * Compiles a QuerySnapshot into parameterized PostgreSQL over:
 *
 *   listings      (id, title, excerpt, content, status, created_at)
 *   listing_meta  (listing_id, meta_key, meta_value)
 *   listing_terms (listing_id, taxonomy, term_slug)
 *
 * Every attribute, taxonomy and keyword condition is an EXISTS semi-join on
 * the listing row, so a listing matching through several meta rows is still
 * returned once. No JOIN and no DISTINCT are ever emitted.
 *
 * SECURITY INVARIANT: the SQL text contains ONLY hard-coded fragments.
 * Meta keys, taxonomy names, terms, keywords and bounds all travel in
 * `values` as $N placeholders.
 */

import { getOffset } from "../../types/pagination";
import type {
  AttributeClause,
  AttributeValueType,
  QuerySnapshot,
  SortSpec,
  TaxonomyClause,
} from "./query-builder";

export interface CompiledQuery {
  text: string;
  values: unknown[];
}

const NUMERIC_VALUE_PATTERN = "^\\s*[+-]?([0-9]+(\\.[0-9]*)?|\\.[0-9]+)\\s*$";
const DATE_VALUE_PATTERN = "^[0-9]{4}-[0-9]{2}-[0-9]{2}";

const SORT_DIRECTIONS = { asc: "ASC", desc: "DESC" } as const;

const LISTING_COLUMNS = `l.id::text AS id, l.title, COALESCE(l.excerpt, '') AS excerpt, l.created_at AS "createdAt"`;

class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

export function assertParameterizedWhereClause(whereClause: string): void {
  if (/'[^']*'/.test(whereClause)) {
    throw new Error(
      "SECURITY: Raw string detected in whereClause; use parameterized $N placeholders",
    );
  }
}

/** Backslash-escape LIKE wildcards so the keyword matches literally */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Typed view of m.meta_value. Values that don't look like the type become
 * NULL instead of failing the cast, and NULL never satisfies a comparison.
 */
function typedMetaValue(column: string, type: AttributeValueType, params: SqlParams): string {
  switch (type) {
    case "NUMERIC":
      return `(CASE WHEN ${column} ~ ${params.add(NUMERIC_VALUE_PATTERN)} THEN ${column}::numeric END)`;
    case "DATE":
      return `(CASE WHEN ${column} ~ ${params.add(DATE_VALUE_PATTERN)} THEN left(${column}, 10)::date END)`;
    case "CHAR":
      return column;
  }
}

function typedParam(value: string | number, type: AttributeValueType, params: SqlParams): string {
  const placeholder = params.add(value);
  switch (type) {
    case "NUMERIC":
      return `${placeholder}::numeric`;
    case "DATE":
      return `${placeholder}::date`;
    case "CHAR":
      return `${placeholder}::text`;
  }
}

function compileAttributeClause(clause: AttributeClause, params: SqlParams): string {
  const key = params.add(clause.key);
  const column = typedMetaValue("m.meta_value", clause.type, params);

  let comparison: string;
  switch (clause.compare) {
    case "=":
    case ">=":
    case "<=":
      comparison = `${column} ${clause.compare} ${typedParam(clause.value, clause.type, params)}`;
      break;
    case "BETWEEN":
      comparison = `${column} BETWEEN ${typedParam(clause.value[0], clause.type, params)} AND ${typedParam(clause.value[1], clause.type, params)}`;
      break;
    case "IN":
      comparison = `m.meta_value = ANY(${params.add([...clause.value])}::text[])`;
      break;
  }

  return `EXISTS (
      SELECT 1 FROM listing_meta m
      WHERE m.listing_id = l.id AND m.meta_key = ${key} AND ${comparison}
    )`;
}

function compileTaxonomyClause(clause: TaxonomyClause, params: SqlParams): string {
  return `EXISTS (
      SELECT 1 FROM listing_terms t
      WHERE t.listing_id = l.id
        AND t.taxonomy = ${params.add(clause.taxonomy)}
        AND t.term_slug = ANY(${params.add([...clause.terms])}::text[])
    )`;
}

function compileKeywordCondition(
  searchTerm: string,
  metaKeys: readonly string[],
  params: SqlParams,
): string {
  const pattern = params.add(`%${escapeLikePattern(searchTerm)}%`);
  const native = [
    `l.title ILIKE ${pattern}`,
    `l.excerpt ILIKE ${pattern}`,
    `l.content ILIKE ${pattern}`,
  ];

  if (metaKeys.length > 0) {
    native.push(`EXISTS (
      SELECT 1 FROM listing_meta km
      WHERE km.listing_id = l.id
        AND km.meta_key = ANY(${params.add([...metaKeys])}::text[])
        AND km.meta_value ILIKE ${pattern}
    )`);
  }

  return `(${native.join(" OR ")})`;
}

function compileWhere(snapshot: QuerySnapshot, params: SqlParams): string {
  const conditions: string[] = [`l.status = ${params.add(snapshot.status)}`];

  for (const clause of snapshot.attributeClauses) {
    conditions.push(compileAttributeClause(clause, params));
  }
  for (const clause of snapshot.taxonomyClauses) {
    conditions.push(compileTaxonomyClause(clause, params));
  }
  if (snapshot.searchTerm) {
    conditions.push(compileKeywordCondition(snapshot.searchTerm, snapshot.keywordMetaKeys, params));
  }

  const whereClause = conditions.join(" AND ");
  assertParameterizedWhereClause(whereClause);
  return whereClause;
}

/**
 * ORDER BY with `l.id ASC` as the final tie-break so pages are stable.
 */
function compileOrderBy(sort: SortSpec, params: SqlParams): string {
  switch (sort.kind) {
    case "random":
      return "random()";
    case "field": {
      const column = sort.field === "title" ? "l.title" : "l.created_at";
      return `${column} ${SORT_DIRECTIONS[sort.direction]}, l.id ASC`;
    }
    case "attribute": {
      const value = sort.numeric
        ? typedMetaValue("sm.meta_value", "NUMERIC", params)
        : "sm.meta_value";
      return `(
      SELECT ${value} FROM listing_meta sm
      WHERE sm.listing_id = l.id AND sm.meta_key = ${params.add(sort.key)}
      LIMIT 1
    ) ${SORT_DIRECTIONS[sort.direction]} NULLS LAST, l.id ASC`;
    }
  }
}

export function compileListingQuery(snapshot: QuerySnapshot): CompiledQuery {
  const params = new SqlParams();
  const where = compileWhere(snapshot, params);
  const orderBy = compileOrderBy(snapshot.sort, params);
  const { page, perPage } = snapshot.pagination;
  const limit = params.add(perPage);
  const offset = params.add(getOffset(page, perPage));

  return {
    text: `SELECT ${LISTING_COLUMNS}
    FROM listings l
    WHERE ${where}
    ORDER BY ${orderBy}
    LIMIT ${limit} OFFSET ${offset}`,
    values: params.values,
  };
}

export function compileListingCountQuery(snapshot: QuerySnapshot): CompiledQuery {
  const params = new SqlParams();
  const where = compileWhere(snapshot, params);

  return {
    text: `SELECT COUNT(*)::int AS total
    FROM listings l
    WHERE ${where}`,
    values: params.values,
  };
}
