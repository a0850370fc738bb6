/**
 * RECOMMENDATION CONTRACTS
 */

export interface Recommendation {
  ticker: string;
  company: string;
  /** 0..1 */
  score: number;
  rationale: string;
  latestRating: string;
  targetPrice?: number;
  technicalSignal: string;
  sentimentScore?: number;
  generatedAt: Date;
}

export const RECOMMENDATION_SCOPE_ALL = 'all';

// ═══════════════════════════════════════════════════════════════
// RULE TABLES
// ═══════════════════════════════════════════════════════════════

/** Action verbs that signal positive sentiment, lower-cased without "by" */
export const POSITIVE_ACTIONS: ReadonlySet<string> = new Set(['upgraded', 'initiated', 'reiterated']);

/** Lower-cased labels that count as positive */
export const POSITIVE_LABELS: ReadonlySet<string> = new Set(['buy', 'strong buy', 'outperform', 'overweight']);

/** Ordinal strength of a label; labels missing here are unranked */
export const RATING_RANK: ReadonlyMap<string, number> = new Map([
  ['sell', 1],
  ['underperform', 2],
  ['hold', 3],
  ['market perform', 3],
  ['neutral', 3],
  ['buy', 4],
  ['outperform', 4],
  ['overweight', 4],
  ['strong buy', 5],
]);

export const LABEL_BONUS: ReadonlyMap<string, number> = new Map([
  ['strong buy', 0.2],
  ['buy', 0.15],
  ['outperform', 0.1],
  ['overweight', 0.1],
]);

export const SCORING = {
  base: 0.7,
  recencyBonus: 0.05,
  recencyWindowMs: 7 * 24 * 60 * 60 * 1000,
  max: 1,
} as const;

/** Placeholders until technical and sentiment signals are wired in */
export const PENDING_TECHNICAL_SIGNAL = 'Pending Analysis';

export function normalizeLabel(label: string | undefined): string {
  return (label ?? '').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function normalizeAction(action: string): string {
  return action.trim().replace(/\s+/g, ' ').toLowerCase().replace(/ by$/, '');
}
