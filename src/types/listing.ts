/** One search result row */
export interface ListingSummary {
  id: string;
  title: string;
  excerpt: string;
  /** ISO 8601 timestamp */
  createdAt: string;
  /** Public URL of the listing, when the executor knows it */
  url?: string;
}
