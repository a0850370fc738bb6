/**
 * Natural key of a rating: (ticker, brokerage, ratingTo, issuedAt).
 *
 * `naturalKeyId` encodes it as a JSON tuple; field contents cannot collide.
 */

import type { RatingEvent } from './ratings.contracts.js';

export interface NaturalKey {
  readonly ticker: string;
  readonly brokerage: string;
  readonly ratingTo: string;
  /** epoch ms */
  readonly issuedAt: number;
}

export function naturalKeyOf(event: Pick<RatingEvent, 'ticker' | 'brokerage' | 'ratingTo' | 'issuedAt'>): NaturalKey {
  return {
    ticker: event.ticker,
    brokerage: event.brokerage,
    ratingTo: event.ratingTo,
    issuedAt: event.issuedAt.getTime(),
  };
}

export function naturalKeyId(key: NaturalKey): string {
  return JSON.stringify([key.ticker, key.brokerage, key.ratingTo, key.issuedAt]);
}

export function naturalKeyEquals(a: NaturalKey, b: NaturalKey): boolean {
  return (
    a.ticker === b.ticker &&
    a.brokerage === b.brokerage &&
    a.ratingTo === b.ratingTo &&
    a.issuedAt === b.issuedAt
  );
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Total order: ticker, brokerage, ratingTo, then issuedAt ascending. */
export function compareNaturalKeys(a: NaturalKey, b: NaturalKey): number {
  return (
    compareStrings(a.ticker, b.ticker) ||
    compareStrings(a.brokerage, b.brokerage) ||
    compareStrings(a.ratingTo, b.ratingTo) ||
    a.issuedAt - b.issuedAt
  );
}

/**
 * Orders ratings newest first. Equal issue times fall back to the later
 * ingestion, then to natural-key order, so "latest per ticker" is
 * deterministic. The Mongo aggregation in the repository sorts the same way.
 */
export function compareRecency(a: RatingEvent, b: RatingEvent): number {
  return (
    b.issuedAt.getTime() - a.issuedAt.getTime() ||
    b.ingestedAt.getTime() - a.ingestedAt.getTime() ||
    compareNaturalKeys(naturalKeyOf(a), naturalKeyOf(b))
  );
}

/**
 * Builds the latest-per-ticker index from any sequence of ratings.
 */
export function buildLatestIndex(events: Iterable<RatingEvent>): Map<string, RatingEvent> {
  const latest = new Map<string, RatingEvent>();
  for (const event of events) {
    const current = latest.get(event.ticker);
    if (!current || compareRecency(event, current) < 0) {
      latest.set(event.ticker, event);
    }
  }
  return latest;
}
