import { vi } from 'vitest';
import type { Clock } from '../../../common/clock.js';
import type { Logger } from '../../../common/logger.js';
import type { FeedPage, RatingEvent, RawRating } from '../contracts/ratings.contracts.js';
import type { RatingsFeed } from '../ingest/feed.client.js';

export const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

export function rawRating(overrides: Partial<RawRating> = {}): RawRating {
  return {
    ticker: 'AAPL',
    company: 'Apple Inc.',
    brokerage: 'Goldman Sachs',
    action: 'upgraded by',
    rating_from: 'Hold',
    rating_to: 'Buy',
    target_from: '$180.00',
    target_to: '$210.00',
    time: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

export function ratingEvent(overrides: Partial<RatingEvent> = {}): RatingEvent {
  return {
    ticker: 'AAPL',
    company: 'Apple Inc.',
    brokerage: 'Goldman Sachs',
    action: 'upgraded by',
    ratingFrom: 'Hold',
    ratingTo: 'Buy',
    targetFrom: 180,
    targetTo: 210,
    issuedAt: new Date('2024-01-01T00:00:00Z'),
    ingestedAt: new Date('2024-01-02T00:00:00Z'),
    ...overrides,
  };
}

/** Clock whose time only moves when told to */
export class FakeClock implements Clock {
  constructor(private ms: number) {}

  now = (): number => this.ms;
  utcNow = (): Date => new Date(this.ms);

  advance(ms: number): void {
    this.ms += ms;
  }
}

/**
 * Serves pages keyed by cursor; the first page is keyed by ''.
 */
export class FakeFeed implements RatingsFeed {
  readonly cursors: Array<string | null> = [];

  constructor(private readonly pages: Record<string, FeedPage>) {}

  async fetchPage(cursor?: string | null): Promise<FeedPage> {
    this.cursors.push(cursor ?? null);
    const page = this.pages[cursor ?? ''];
    if (!page) throw new Error(`No page for cursor "${cursor ?? ''}"`);
    return page;
  }
}
