import { MediaItem } from './Media';

/**
 * One provider's page of results
 */
export interface SearchResult {
  /** Provider-reported number of matches, may exceed what can be paged through */
  readonly total: number;
  /** Number of matches actually retrievable under the provider's caps */
  readonly totalHits: number;
  readonly page: number;
  readonly perPage: number;
  /** `calculateTotalPages(total, perPage)` */
  readonly totalPages: number;
  readonly items: readonly MediaItem[];
  readonly provider: string;
}

/**
 * Fan-out result across every registered provider.
 *
 * `totalPages` is the SUM of each provider's own page count. It is not the
 * number of pages of `items`: callers page through each provider
 * independently, and this figure only helps plan that.
 */
export interface AggregatedSearchResult {
  /** First successful provider's name, or "all" when there is none */
  readonly provider: string;
  readonly total: number;
  readonly totalHits: number;
  readonly page: number;
  readonly perPage: number;
  readonly totalPages: number;
  /** Items of every successful provider, in registration order */
  readonly items: readonly MediaItem[];
  readonly providerResults: readonly SearchResult[];
}

/**
 * ceil(total / perPage), zero for an empty result or a non-positive page size
 */
export function calculateTotalPages(total: number, perPage: number): number {
  if (perPage <= 0 || total <= 0) {
    return 0;
  }
  return Math.floor(total / perPage) + (total % perPage !== 0 ? 1 : 0);
}

export interface SearchResultInit {
  total: number;
  totalHits: number;
  page: number;
  perPage: number;
  items: readonly MediaItem[];
  provider: string;
}

/**
 * Build a SearchResult with its derived page count
 */
export function createSearchResult(init: SearchResultInit): SearchResult {
  return {
    ...init,
    totalPages: calculateTotalPages(init.total, init.perPage)
  };
}

/**
 * Merge successful provider results in the order given
 */
export function aggregateResults(
  results: readonly SearchResult[],
  page: number,
  perPage: number
): AggregatedSearchResult {
  let total = 0;
  let totalHits = 0;
  let totalPages = 0;
  const items: MediaItem[] = [];

  for (const result of results) {
    total += result.total;
    totalHits += result.totalHits;
    totalPages += result.totalPages;
    items.push(...result.items);
  }

  return {
    provider: results.length > 0 ? results[0].provider : 'all',
    total,
    totalHits,
    page,
    perPage,
    totalPages,
    items,
    providerResults: results
  };
}
