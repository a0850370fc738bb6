/**
 * SERVICE WIRING
 *
 * Builds the object graph shared by the HTTP server and the CLI scripts.
 * Storage is injected so tests can run the same graph in process.
 */

import type { Env } from './config/env.js';
import { systemClock, type Clock } from './common/clock.js';
import { createLogger } from './common/logger.js';
import type { IngestSummary } from './modules/ratings/contracts/ratings.contracts.js';
import { RatingsFeedClient, type RatingsFeed } from './modules/ratings/ingest/feed.client.js';
import { RatingsIngestService } from './modules/ratings/ingest/ratings.ingest.service.js';
import { RatingsIngestJob } from './modules/ratings/jobs/ingest.job.js';
import type { RatingRepository } from './modules/ratings/storage/ratings.repository.js';
import { RecommendationService } from './modules/recommendations/services/recommendation.service.js';
import { JobRunner } from './modules/shared/runtime/job-runner.js';

export interface Services {
  repository: RatingRepository;
  feed: RatingsFeed;
  ingest: RatingsIngestService;
  runner: JobRunner<IngestSummary>;
  ingestJob: RatingsIngestJob;
  recommendations: RecommendationService;
}

export interface ServiceOverrides {
  feed?: RatingsFeed;
  clock?: Clock;
}

export function buildServices(
  config: Env,
  repository: RatingRepository,
  overrides: ServiceOverrides = {}
): Services {
  const clock = overrides.clock ?? systemClock;

  const feed =
    overrides.feed ??
    new RatingsFeedClient({
      url: config.RATINGS_API_URL,
      token: config.RATINGS_API_TOKEN,
      maxRetries: config.FETCH_MAX_RETRIES,
      backoffMs: config.FETCH_BACKOFF_MS,
      timeoutMs: config.FETCH_TIMEOUT_MS,
      logger: createLogger('ratings-feed'),
    });

  const recommendations = new RecommendationService({
    repository,
    ttlMs: config.RECOMMENDATION_TTL_MS,
    limit: config.RECOMMENDATION_LIMIT,
    clock,
  });

  // Any committed row outdates the cached ranking, whatever the run's outcome
  const ingest = new RatingsIngestService({
    feed,
    repository,
    clock,
    onPageStored: ({ inserted }) => {
      if (inserted > 0) recommendations.invalidate();
    },
  });
  const runner = new JobRunner<IngestSummary>({
    historyLimit: config.JOB_HISTORY_LIMIT,
    clock,
    logger: createLogger('jobs'),
  });
  const ingestJob = new RatingsIngestJob({ ingest, repository, runner });

  return { repository, feed, ingest, runner, ingestJob, recommendations };
}
