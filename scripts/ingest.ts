/**
 * One-shot ratings ingestion.
 *
 * Usage: npm run ingest
 */

import 'dotenv/config';
import { buildServices } from '../src/bootstrap.js';
import { errorMessage, toAppError } from '../src/common/errors.js';
import { rootLogger } from '../src/common/logger.js';
import { env } from '../src/config/env.js';
import { ensureIndexes } from '../src/db/indexes.js';
import { connectMongo, disconnectMongo } from '../src/db/mongoose.js';
import { MongoRatingRepository } from '../src/modules/ratings/storage/ratings.repository.js';

const log = rootLogger.child({ component: 'ingest-cli' });

async function run(): Promise<number> {
  await connectMongo(env.MONGO_URL);
  try {
    await ensureIndexes();
    const services = buildServices(env, new MongoRatingRepository());
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const summary = await services.ingest.ingestAll(controller.signal);
    log.info({ ...summary }, 'Ingestion finished');
    return 0;
  } catch (err) {
    const error = toAppError(err);
    log.error({ code: error.code, error: error.message }, 'Ingestion failed');
    return 1;
  } finally {
    await disconnectMongo();
  }
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error({ error: errorMessage(err) }, 'Ingestion crashed');
    process.exitCode = 1;
  });
