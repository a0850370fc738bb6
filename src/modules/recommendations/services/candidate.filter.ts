/**
 * Candidate filter
 *
 * Picks, from the latest rating per ticker, the ones showing positive analyst
 * sentiment. A rating qualifies on any of: positive action verb, positive new
 * label, or an upgrade under the rank table.
 */

import type { RatingEvent } from '../../ratings/contracts/ratings.contracts.js';
import {
  POSITIVE_ACTIONS,
  POSITIVE_LABELS,
  RATING_RANK,
  normalizeAction,
  normalizeLabel,
} from '../contracts/recommendation.contracts.js';

export function hasPositiveAction(action: string): boolean {
  return POSITIVE_ACTIONS.has(normalizeAction(action));
}

export function hasPositiveLabel(ratingTo: string): boolean {
  return POSITIVE_LABELS.has(normalizeLabel(ratingTo));
}

/**
 * True when both labels are ranked and the new one ranks strictly higher.
 */
export function isUpgrade(ratingFrom: string | undefined, ratingTo: string): boolean {
  if (!ratingFrom) return false;

  const from = RATING_RANK.get(normalizeLabel(ratingFrom));
  const to = RATING_RANK.get(normalizeLabel(ratingTo));
  return from !== undefined && to !== undefined && to > from;
}

export function isCandidate(event: RatingEvent): boolean {
  return hasPositiveAction(event.action) || hasPositiveLabel(event.ratingTo) || isUpgrade(event.ratingFrom, event.ratingTo);
}

export function selectCandidates(latestByTicker: ReadonlyMap<string, RatingEvent>): RatingEvent[] {
  return [...latestByTicker.values()].filter(isCandidate);
}
