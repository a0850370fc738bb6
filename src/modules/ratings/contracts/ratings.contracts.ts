/**
 * RATINGS CONTRACTS
 *
 * Shapes shared by the ingestion pipeline, storage and the HTTP layer.
 */

// ═══════════════════════════════════════════════════════════════
// UPSTREAM FEED
// ═══════════════════════════════════════════════════════════════

/** One record as served by the ratings feed; every field is a string. */
export interface RawRating {
  ticker: string;
  company: string;
  brokerage: string;
  action: string;
  rating_from: string;
  rating_to: string;
  target_from: string;
  target_to: string;
  time: string;
}

export interface FeedPage {
  items: RawRating[];
  next_page: string | null;
}

// ═══════════════════════════════════════════════════════════════
// DOMAIN
// ═══════════════════════════════════════════════════════════════

export interface RatingEvent {
  ticker: string;
  company: string;
  brokerage: string;
  action: string;
  ratingFrom?: string;
  ratingTo: string;
  targetFrom?: number;
  targetTo?: number;
  issuedAt: Date;
  ingestedAt: Date;
}

/** Most recent rating per ticker, derived on demand. */
export type LatestRatingIndex = Map<string, RatingEvent>;

export interface IngestSummary {
  /** Pages fetched, including a terminating empty page */
  pages: number;
  /** Raw records received from the feed */
  received: number;
  /** Records left after in-page dedup */
  accepted: number;
  /** Rows actually written */
  inserted: number;
  durationMs: number;
}

// ═══════════════════════════════════════════════════════════════
// BROWSING
// ═══════════════════════════════════════════════════════════════

export const RATING_SORT_FIELDS = ['issuedAt', 'ticker', 'company', 'brokerage'] as const;
export type RatingSortField = (typeof RATING_SORT_FIELDS)[number];

export interface RatingListQuery {
  page: number;
  limit: number;
  sortBy: RatingSortField;
  order: 'asc' | 'desc';
  search?: string;
}

export interface Pagination {
  page: number;
  limit: number;
  totalItems: number;
  totalPages: number;
}

export interface RatingListPage {
  data: RatingEvent[];
  pagination: Pagination;
}

export const DEFAULT_PAGE_LIMIT = 20;
export const MAX_PAGE_LIMIT = 100;

/**
 * Clamps paging input the way the listing endpoint documents it.
 */
export function normalizeListQuery(input: Partial<RatingListQuery>): RatingListQuery {
  const page = input.page !== undefined && input.page >= 1 ? Math.floor(input.page) : 1;
  const limit =
    input.limit !== undefined && input.limit >= 1 && input.limit <= MAX_PAGE_LIMIT
      ? Math.floor(input.limit)
      : DEFAULT_PAGE_LIMIT;
  const sortBy = input.sortBy ?? 'issuedAt';
  const order = input.order === 'asc' ? 'asc' : 'desc';
  const search = input.search?.trim() || undefined;

  return { page, limit, sortBy, order, search };
}

const SORT_ALIASES: ReadonlyMap<string, RatingSortField> = new Map<string, RatingSortField>([
  ['time', 'issuedAt'],
  ['issued_at', 'issuedAt'],
  ['issuedat', 'issuedAt'],
  ['ticker', 'ticker'],
  ['company', 'company'],
  ['brokerage', 'brokerage'],
]);

/** Maps a client-supplied sort key onto a sortable field; unknown keys sort by issue time. */
export function parseSortField(value: string | undefined): RatingSortField {
  if (!value) return 'issuedAt';
  return SORT_ALIASES.get(value.trim().toLowerCase()) ?? 'issuedAt';
}

export function totalPages(totalItems: number, limit: number): number {
  return Math.ceil(totalItems / limit);
}
