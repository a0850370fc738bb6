/**
 * RECOMMENDATIONS MODULE
 *
 * Ranks tickers from their latest analyst rating and serves the list from a
 * TTL snapshot cache.
 */

import type { FastifyInstance } from 'fastify';
import { registerRecommendationsRoutes, type RecommendationsRoutesDeps } from './api/recommendations.routes.js';

export async function registerRecommendationsModule(
  fastify: FastifyInstance,
  deps: RecommendationsRoutesDeps
): Promise<void> {
  await registerRecommendationsRoutes(fastify, deps);
  fastify.log.info('Recommendations module registered at /api/v1/recommendations');
}

export * from './contracts/recommendation.contracts.js';
export { selectCandidates, isCandidate, isUpgrade } from './services/candidate.filter.js';
export { scoreCandidate, computeScore, buildRationale } from './services/recommendation.scorer.js';
export { RecommendationService, rankRecommendations } from './services/recommendation.service.js';
export type { RecommendationsRoutesDeps };
