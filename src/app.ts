import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { isMongoConnected } from './db/mongoose.js';
import { registerRatingsModule, type RatingsRoutesDeps } from './modules/ratings/index.js';
import {
  registerRecommendationsModule,
  type RecommendationsRoutesDeps,
} from './modules/recommendations/index.js';

export const SERVICE_NAME = 'ratings-service';
export const SERVICE_VERSION = '1.0.0';

export type AppDeps = RatingsRoutesDeps & RecommendationsRoutesDeps;

export interface BuildAppOptions {
  logLevel?: string;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps, options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    uptimeSec: Math.round(process.uptime()),
    db: isMongoConnected() ? 'connected' : 'disconnected',
    timestamp: new Date().toISOString(),
  }));

  // ═══════════════════════════════════════════════════════════════
  // MODULES
  // ═══════════════════════════════════════════════════════════════

  app.register(async (fastify) => {
    await registerRatingsModule(fastify, deps);
    await registerRecommendationsModule(fastify, deps);
  });

  return app;
}
