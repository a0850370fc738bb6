/**
 * RATING TRANSFORMER
 *
 * Raw feed records → typed RatingEvents.
 *
 * - Timestamps are load-bearing: one unparseable `time` rejects the page.
 * - Prices are supplementary: a malformed price is dropped, not fatal.
 * - Records repeating a natural key within the page keep the first copy.
 */

import { ValidationError } from '../../../common/errors.js';
import type { RawRating, RatingEvent } from '../contracts/ratings.contracts.js';
import { naturalKeyId, naturalKeyOf } from '../contracts/natural-key.js';

// ═══════════════════════════════════════════════════════════════
// FIELD PARSERS
// ═══════════════════════════════════════════════════════════════

// Hours 00-23, minutes and seconds 00-59
const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt]([01]\d|2[0-3]):([0-5]\d):([0-5]\d)(?:\.(\d+))?([Zz]|[+-](?:[01]\d|2[0-3]):[0-5]\d)$/;

/**
 * Parses an RFC 3339 timestamp. Sub-millisecond digits are truncated.
 * Returns null for anything else, including out-of-range components.
 */
export function parseTimestamp(value: string): Date | null {
  const m = RFC3339.exec(value.trim());
  if (!m) return null;

  const [, year, month, day, hour, minute, second, fraction = '', zone] = m;
  const millis = fraction.slice(0, 3).padEnd(3, '0');
  const offset = zone === 'z' ? 'Z' : zone;
  const normalized = `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${offset}`;

  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) return null;

  // Date rolls invalid days over (Feb 30 → Mar 2); reject those.
  const probe = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (probe.getUTCMonth() !== Number(month) - 1 || probe.getUTCDate() !== Number(day)) {
    return null;
  }
  return date;
}

const PRICE = /^-?\d+(?:\.\d+)?$/;

/**
 * "$7.00" → 7, "€1,250.5" → 1250.5. Empty or malformed input → undefined.
 */
export function parsePrice(value: string | undefined): number | undefined {
  if (!value) return undefined;

  const cleaned = value
    .trim()
    .replace(/^[$€£]\s*/, '')
    .replace(/,/g, '');

  if (!PRICE.test(cleaned)) return undefined;

  const price = Number(cleaned);
  return Number.isFinite(price) ? price : undefined;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// ═══════════════════════════════════════════════════════════════
// TRANSFORM
// ═══════════════════════════════════════════════════════════════

export function toRatingEvent(raw: RawRating, ingestedAt: Date): RatingEvent {
  const ticker = raw.ticker.trim().toUpperCase();
  const issuedAt = parseTimestamp(raw.time);

  if (!issuedAt) {
    throw new ValidationError(`Invalid time "${raw.time}" for ticker ${ticker || '<empty>'}`);
  }

  return {
    ticker,
    company: raw.company.trim(),
    brokerage: raw.brokerage.trim(),
    action: raw.action.trim(),
    ratingFrom: optionalText(raw.rating_from),
    ratingTo: raw.rating_to.trim(),
    targetFrom: parsePrice(raw.target_from),
    targetTo: parsePrice(raw.target_to),
    issuedAt,
    ingestedAt,
  };
}

/**
 * Transforms one feed page. Throws ValidationError on the first record with
 * an unparseable timestamp; nothing from the page is returned in that case.
 */
export function transformRatings(raw: readonly RawRating[], ingestedAt: Date = new Date()): RatingEvent[] {
  const seen = new Set<string>();
  const events: RatingEvent[] = [];

  for (const record of raw) {
    const event = toRatingEvent(record, ingestedAt);
    const id = naturalKeyId(naturalKeyOf(event));

    if (seen.has(id)) continue;
    seen.add(id);
    events.push(event);
  }

  return events;
}
