/**
 * RATINGS MODULE
 *
 * Feed ingestion, deduplicated storage and browsing of analyst ratings.
 */

import type { FastifyInstance } from 'fastify';
import { registerRatingsRoutes, type RatingsRoutesDeps } from './api/ratings.routes.js';

export async function registerRatingsModule(fastify: FastifyInstance, deps: RatingsRoutesDeps): Promise<void> {
  await registerRatingsRoutes(fastify, deps);
  fastify.log.info('Ratings module registered at /api/v1/ratings, /api/v1/ingest');
}

export * from './contracts/ratings.contracts.js';
export * from './contracts/natural-key.js';
export { transformRatings, toRatingEvent, parseTimestamp, parsePrice } from './ingest/rating.transformer.js';
export { RatingsFeedClient, type RatingsFeed } from './ingest/feed.client.js';
export { RatingsIngestService } from './ingest/ratings.ingest.service.js';
export { MongoRatingRepository, type RatingRepository } from './storage/ratings.repository.js';
export { RatingsIngestJob, INGEST_JOB_NAME } from './jobs/ingest.job.js';
export type { RatingsRoutesDeps };
