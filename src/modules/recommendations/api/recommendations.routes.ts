/**
 * RECOMMENDATIONS API ROUTES
 */

import type { FastifyInstance } from 'fastify';
import type { RecommendationService } from '../services/recommendation.service.js';

export interface RecommendationsRoutesDeps {
  recommendations: RecommendationService;
}

export async function registerRecommendationsRoutes(
  fastify: FastifyInstance,
  deps: RecommendationsRoutesDeps
): Promise<void> {
  const prefix = '/api/v1/recommendations';

  // Served from the snapshot cache; a cold or stale cache blocks on one refresh
  fastify.get(prefix, async () => {
    const data = await deps.recommendations.getCached();
    return { ok: true, count: data.length, data };
  });

  fastify.get(`${prefix}/status`, async () => {
    return { ok: true, cache: deps.recommendations.cacheStatus() };
  });
}
