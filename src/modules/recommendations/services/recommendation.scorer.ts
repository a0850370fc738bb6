/**
 * Recommendation scorer
 *
 * score = 0.70 + label bonus + 0.05 if issued within the last 7 days, capped at 1.
 */

import type { RatingEvent } from '../../ratings/contracts/ratings.contracts.js';
import {
  LABEL_BONUS,
  PENDING_TECHNICAL_SIGNAL,
  SCORING,
  normalizeLabel,
  type Recommendation,
} from '../contracts/recommendation.contracts.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function computeScore(event: RatingEvent, now: Date): number {
  const labelBonus = LABEL_BONUS.get(normalizeLabel(event.ratingTo)) ?? 0;
  const ageMs = now.getTime() - event.issuedAt.getTime();
  const recencyBonus = ageMs < SCORING.recencyWindowMs ? SCORING.recencyBonus : 0;

  return Math.min(SCORING.max, round3(SCORING.base + labelBonus + recencyBonus));
}

export function buildRationale(event: RatingEvent, now: Date): string {
  const parts = [`${event.ratingTo} rating by ${event.brokerage}`];

  const days = Math.floor((now.getTime() - event.issuedAt.getTime()) / DAY_MS);
  if (days <= 1) {
    parts.push('issued today');
  } else if (days <= 7) {
    parts.push(`issued ${days} days ago`);
  }

  if (event.targetTo !== undefined) {
    parts.push(`price target $${event.targetTo.toFixed(2)}`);
  }

  return parts.join(', ');
}

export function scoreCandidate(event: RatingEvent, now: Date = new Date()): Recommendation {
  return {
    ticker: event.ticker,
    company: event.company,
    score: computeScore(event, now),
    rationale: buildRationale(event, now),
    latestRating: event.ratingTo,
    targetPrice: event.targetTo,
    technicalSignal: PENDING_TECHNICAL_SIGNAL,
    sentimentScore: undefined,
    generatedAt: now,
  };
}
