/**
 * Offset pagination types shared by executors and the search service.
 */

export interface PaginatedResult<T> {
  items: T[];
  /** Total matching rows across all pages */
  total: number;
  /** 1-based */
  page: number;
  perPage: number;
  totalPages: number;
}

/**
 * Number of pages for `total` rows; 0 rows still count as one (empty) page.
 */
export function getTotalPages(total: number, perPage: number): number {
  if (total <= 0 || perPage <= 0) return 1;
  return Math.ceil(total / perPage);
}

export function getOffset(page: number, perPage: number): number {
  return (Math.max(1, page) - 1) * perPage;
}
