/**
 * RATINGS API ROUTES
 *
 * Browsing of stored ratings and control of ingestion jobs.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../../common/errors.js';
import type { JobRunner } from '../../shared/runtime/job-runner.js';
import { normalizeListQuery, parseSortField, type IngestSummary } from '../contracts/ratings.contracts.js';
import type { RatingsIngestJob } from '../jobs/ingest.job.js';
import type { RatingRepository } from '../storage/ratings.repository.js';

export interface RatingsRoutesDeps {
  repository: RatingRepository;
  ingestJob: RatingsIngestJob;
  runner: JobRunner<IngestSummary>;
}

// ═══════════════════════════════════════════════════════════════
// QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════

const ListQuerySchema = z.object({
  page: z.coerce.number().int().optional(),
  limit: z.coerce.number().int().optional(),
  sort_by: z.string().optional(),
  order: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(['asc', 'desc']))
    .optional(),
  search: z.string().max(200).optional(),
});

const JobsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const TickerParamsSchema = z.object({
  ticker: z.string().trim().min(1).max(16),
});

const JobParamsSchema = z.object({
  id: z.string().uuid(),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || what}: ${i.message}`);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerRatingsRoutes(fastify: FastifyInstance, deps: RatingsRoutesDeps): Promise<void> {
  const prefix = '/api/v1';

  // ─────────────────────────────────────────────────────────────
  // GET /ratings: paginated listing
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/ratings`, async (req) => {
    const q = parseOrThrow(ListQuerySchema, req.query, 'query');
    const query = normalizeListQuery({
      page: q.page,
      limit: q.limit,
      sortBy: parseSortField(q.sort_by),
      order: q.order,
      search: q.search,
    });

    const result = await deps.repository.list(query);
    return { ok: true, ...result };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /ratings/:ticker
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/ratings/:ticker`, async (req) => {
    const { ticker } = parseOrThrow(TickerParamsSchema, req.params, 'ticker');
    const data = await deps.repository.byTicker(ticker);
    if (data.length === 0) {
      throw new NotFoundError(`No ratings found for ticker ${ticker.toUpperCase()}`);
    }
    return { ok: true, ticker: ticker.toUpperCase(), count: data.length, data };
  });

  // ─────────────────────────────────────────────────────────────
  // Ingestion jobs
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/ingest`, async (_req, reply) => {
    const job = deps.ingestJob.trigger('api');
    return reply.status(202).send({ ok: true, jobId: job.id, status: job.status });
  });

  fastify.get(`${prefix}/ingest/jobs`, async (req) => {
    const { limit } = parseOrThrow(JobsQuerySchema, req.query, 'query');
    return { ok: true, schedule: deps.ingestJob.getStatus().scheduled, jobs: deps.runner.list(limit) };
  });

  fastify.get(`${prefix}/ingest/jobs/:id`, async (req) => {
    const { id } = parseOrThrow(JobParamsSchema, req.params, 'job id');
    const job = deps.runner.get(id);
    if (!job) throw new NotFoundError(`Job ${id} not found`);
    return { ok: true, job };
  });

  fastify.post(`${prefix}/ingest/jobs/:id/cancel`, async (req) => {
    const { id } = parseOrThrow(JobParamsSchema, req.params, 'job id');
    const job = deps.runner.cancel(id);
    return { ok: true, job };
  });
}
