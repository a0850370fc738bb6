/**
 * RATINGS INGEST SERVICE
 *
 * Drives fetch → transform → store across feed pages until the feed runs dry.
 *
 * Each page commits on its own. A failure stops the run and leaves the pages
 * already stored in place; re-running is safe because the store skips rows
 * whose natural key exists.
 */

import { CancelledError, errorMessage } from '../../../common/errors.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import { systemClock, type Clock } from '../../../common/clock.js';
import type { IngestSummary } from '../contracts/ratings.contracts.js';
import type { RatingRepository } from '../storage/ratings.repository.js';
import type { RatingsFeed } from './feed.client.js';
import { transformRatings } from './rating.transformer.js';

export interface PageStored {
  page: number;
  received: number;
  accepted: number;
  inserted: number;
}

export interface IngestServiceDeps {
  feed: RatingsFeed;
  repository: RatingRepository;
  logger?: Logger;
  clock?: Clock;
  /**
   * Called after each committed page, so consumers see rows from runs that
   * later fail or are cancelled.
   */
  onPageStored?: (page: PageStored) => void;
}

export class RatingsIngestService {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: IngestServiceDeps) {
    this.logger = deps.logger ?? createLogger('ratings-ingest');
    this.clock = deps.clock ?? systemClock;
  }

  async ingestAll(signal?: AbortSignal): Promise<IngestSummary> {
    const start = this.clock.now();
    const summary: IngestSummary = { pages: 0, received: 0, accepted: 0, inserted: 0, durationMs: 0 };
    let cursor: string | null = null;

    this.logger.info({}, 'Ratings ingestion started');

    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError(`Ingestion cancelled after ${summary.pages} page(s)`);
      }

      const page = await this.deps.feed.fetchPage(cursor, signal);
      summary.pages++;

      if (page.items.length === 0) break;

      const events = transformRatings(page.items, this.clock.utcNow());
      const inserted = await this.deps.repository.storeBatch(events);

      summary.received += page.items.length;
      summary.accepted += events.length;
      summary.inserted += inserted;
      this.notifyPageStored({ page: summary.pages, received: page.items.length, accepted: events.length, inserted });

      this.logger.info(
        { page: summary.pages, received: page.items.length, accepted: events.length, inserted, total: summary.inserted },
        'Ratings page ingested'
      );

      if (!page.next_page) break;
      cursor = page.next_page;
    }

    summary.durationMs = this.clock.now() - start;
    this.logger.info({ ...summary }, 'Ratings ingestion completed');
    return summary;
  }

  private notifyPageStored(page: PageStored): void {
    if (!this.deps.onPageStored) return;
    try {
      this.deps.onPageStored(page);
    } catch (err) {
      this.logger.warn({ page: page.page, error: errorMessage(err) }, 'onPageStored listener threw');
    }
  }
}
