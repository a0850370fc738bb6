/**
 * Database Indexes
 * Run on startup or via the ingest script
 */

import { errorMessage, StoreError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { RatingModel } from '../modules/ratings/storage/rating.model.js';

const log = createLogger('db');

/**
 * Builds the indexes declared on the models. The unique natural-key index is
 * what makes batch upserts idempotent, so a failure here is fatal.
 */
export async function ensureIndexes(): Promise<void> {
  try {
    await RatingModel.createIndexes();
    log.info({ collection: RatingModel.collection.collectionName }, 'Indexes ensured');
  } catch (err) {
    throw new StoreError(`Failed to create indexes: ${errorMessage(err)}`, { cause: err });
  }
}
