/**
 * Ratings Service Entry Point
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { buildServices } from './bootstrap.js';
import { errorMessage } from './common/errors.js';
import { rootLogger } from './common/logger.js';
import { env } from './config/env.js';
import { ensureIndexes } from './db/indexes.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { MongoRatingRepository } from './modules/ratings/storage/ratings.repository.js';

const log = rootLogger.child({ component: 'boot' });

async function main(): Promise<void> {
  log.info({ env: env.NODE_ENV, port: env.PORT }, 'Starting ratings service');

  await connectMongo(env.MONGO_URL);
  await ensureIndexes();

  const services = buildServices(env, new MongoRatingRepository());
  const app = buildApp(services);

  if (env.INGEST_ON_BOOT) {
    await services.ingestJob.triggerIfEmpty();
  }
  if (env.INGEST_CRON) {
    services.ingestJob.start(env.INGEST_CRON);
  }

  await app.listen({ host: env.HOST, port: env.PORT });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    services.ingestJob.stop();
    services.runner.cancelAll();

    try {
      // Let in-flight batches commit or roll back before the connection goes
      await services.runner.drain();
      await app.close();
      await disconnectMongo();
      process.exit(0);
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.error({ error: errorMessage(err) }, 'Fatal startup error');
  process.exit(1);
});
