/**
 * RECOMMENDATION SERVICE
 *
 * Latest rating per ticker → candidate filter → scorer → top N, served
 * through a TTL snapshot cache.
 */

import { systemClock, type Clock } from '../../../common/clock.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import type { RatingRepository } from '../../ratings/storage/ratings.repository.js';
import { SnapshotCache } from '../../shared/runtime/snapshot-cache.js';
import { RECOMMENDATION_SCOPE_ALL, type Recommendation } from '../contracts/recommendation.contracts.js';
import { selectCandidates } from './candidate.filter.js';
import { scoreCandidate } from './recommendation.scorer.js';

export interface RecommendationServiceDeps {
  repository: RatingRepository;
  ttlMs: number;
  limit?: number;
  clock?: Clock;
  logger?: Logger;
}

export function rankRecommendations(recommendations: Recommendation[], limit: number): Recommendation[] {
  return [...recommendations]
    .sort((a, b) => b.score - a.score || (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0))
    .slice(0, limit);
}

export class RecommendationService {
  private readonly cache: SnapshotCache<Recommendation>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly limit: number;

  constructor(private readonly deps: RecommendationServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('recommendations');
    this.limit = deps.limit ?? 10;
    this.cache = new SnapshotCache<Recommendation>({ ttlMs: deps.ttlMs, clock: this.clock, logger: this.logger });
  }

  /**
   * Computes a fresh list, bypassing the cache.
   */
  async generate(): Promise<Recommendation[]> {
    const latest = await this.deps.repository.latestByTicker();
    const candidates = selectCandidates(latest);
    const now = this.clock.utcNow();

    const ranked = rankRecommendations(
      candidates.map((event) => scoreCandidate(event, now)),
      this.limit
    );

    this.logger.info({ tickers: latest.size, candidates: candidates.length, returned: ranked.length }, 'Recommendations generated');
    return ranked;
  }

  /** Cached list; blocks on a refresh when the snapshot is cold or stale. */
  getCached(): Promise<Recommendation[]> {
    return this.cache.get(RECOMMENDATION_SCOPE_ALL, () => this.generate());
  }

  invalidate(): void {
    this.cache.markStale(RECOMMENDATION_SCOPE_ALL);
  }

  cacheStatus() {
    const entry = this.cache.peek(RECOMMENDATION_SCOPE_ALL);
    return {
      state: this.cache.state(RECOMMENDATION_SCOPE_ALL),
      generatedAt: entry?.generatedAt.toISOString() ?? null,
      items: entry?.items.length ?? 0,
      ...this.cache.stats(),
    };
  }
}
