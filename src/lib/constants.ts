/**
 * Search Constants - Single Source of Truth
 *
 * All search-related constants live here to prevent drift between files.
 * Import from this module instead of defining locally.
 */

// ============================================
// Collection & Taxonomies
// ============================================

/** Content collection the engine searches */
export const LISTING_COLLECTION = "listing";

/** Status a listing must have to appear in search */
export const LISTING_STATUS_PUBLISHED = "published";

export const CATEGORY_TAXONOMY = "listing_category";
export const TAG_TAXONOMY = "listing_tag";

/** Taxonomies whose archive views are treated as listing searches */
export const LISTING_TAXONOMIES: readonly string[] = [CATEGORY_TAXONOMY, TAG_TAXONOMY];

// ============================================
// Attribute Store
// ============================================

/** Namespace token prepended to every content field's storage key */
export const META_KEY_PREFIX = "_dir_";

/** Field holding the listing's view counter (prefixed like any other field) */
export const VIEWS_FIELD = "views_count";

// ============================================
// Pagination
// ============================================

/** Maximum allowed page number */
export const MAX_SAFE_PAGE = 1000;

/** Default results per page */
export const DEFAULT_PAGE_SIZE = 10;

/** Maximum results per page */
export const MAX_PAGE_SIZE = 100;

/** Request parameter carrying the 1-based page number */
export const PAGE_PARAM = "paged";

// ============================================
// Keyword
// ============================================

export const KEYWORD_PARAM = "keyword";

/** Minimum trimmed keyword length before the keyword takes part in search */
export const MIN_KEYWORD_LENGTH = 2;

/** Keywords are cut to this many characters */
export const MAX_KEYWORD_LENGTH = 200;

// ============================================
// Sorting
// ============================================

export const ORDERBY_PARAM = "orderby";
export const ORDER_PARAM = "order";

export const VALID_ORDERBY_KEYS = ["date", "title", "views", "random"] as const;
export const VALID_ORDER_DIRECTIONS = ["asc", "desc"] as const;

export const DEFAULT_ORDERBY = "date";
export const DEFAULT_ORDER = "desc";

// ============================================
// Filters
// ============================================

/** Priority given to filters that don't declare one (lower sorts first) */
export const DEFAULT_FILTER_PRIORITY = 10;

/** Maximum values a checkbox filter accepts */
export const DEFAULT_MAX_CHECKBOX_ITEMS = 20;

// ============================================
// Database
// ============================================

/** Statement timeout for listing search queries */
export const DEFAULT_QUERY_TIMEOUT_MS = 5000;
