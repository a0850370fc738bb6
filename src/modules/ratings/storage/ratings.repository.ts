/**
 * RATINGS REPOSITORY
 *
 * Persistence for RatingEvents. Writes are insert-if-absent on the natural
 * key, one transaction per batch; reads back the latest rating per ticker and
 * paginated listings.
 */

import type { FilterQuery, SortOrder } from 'mongoose';
import { mongoose } from '../../../db/mongoose.js';
import { StoreError, errorMessage } from '../../../common/errors.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import {
  totalPages,
  type LatestRatingIndex,
  type RatingEvent,
  type RatingListPage,
  type RatingListQuery,
} from '../contracts/ratings.contracts.js';
import { RatingModel, type RatingDoc } from './rating.model.js';

export interface RatingRepository {
  /**
   * Inserts every event whose natural key is not stored yet, all-or-nothing.
   * Resolves to the number of rows actually inserted.
   */
  storeBatch(events: readonly RatingEvent[]): Promise<number>;
  latestByTicker(): Promise<LatestRatingIndex>;
  list(query: RatingListQuery): Promise<RatingListPage>;
  /** Newest first */
  byTicker(ticker: string): Promise<RatingEvent[]>;
  count(): Promise<number>;
}

// ═══════════════════════════════════════════════════════════════
// MAPPING
// ═══════════════════════════════════════════════════════════════

function toDoc(event: RatingEvent): RatingDoc {
  return {
    ticker: event.ticker,
    company: event.company,
    brokerage: event.brokerage,
    action: event.action,
    ratingFrom: event.ratingFrom ?? null,
    ratingTo: event.ratingTo,
    targetFrom: event.targetFrom ?? null,
    targetTo: event.targetTo ?? null,
    issuedAt: event.issuedAt,
    ingestedAt: event.ingestedAt,
  };
}

function fromDoc(doc: RatingDoc): RatingEvent {
  return {
    ticker: doc.ticker,
    company: doc.company,
    brokerage: doc.brokerage,
    action: doc.action,
    ratingFrom: doc.ratingFrom ?? undefined,
    ratingTo: doc.ratingTo,
    targetFrom: doc.targetFrom ?? undefined,
    targetTo: doc.targetTo ?? undefined,
    issuedAt: new Date(doc.issuedAt),
    ingestedAt: new Date(doc.ingestedAt),
  };
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ═══════════════════════════════════════════════════════════════
// MONGO IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════

export class MongoRatingRepository implements RatingRepository {
  constructor(private readonly logger: Logger = createLogger('ratings-store')) {}

  async storeBatch(events: readonly RatingEvent[]): Promise<number> {
    if (events.length === 0) return 0;

    const ops = events.map((event) => ({
      updateOne: {
        filter: {
          ticker: event.ticker,
          brokerage: event.brokerage,
          ratingTo: event.ratingTo,
          issuedAt: event.issuedAt,
        },
        update: { $setOnInsert: toDoc(event) },
        upsert: true,
      },
    }));

    const session = await mongoose.startSession().catch((err: unknown) => {
      throw new StoreError(`Failed to start a session: ${errorMessage(err)}`, { cause: err });
    });
    let inserted = 0;

    try {
      await session.withTransaction(async () => {
        const result = await RatingModel.bulkWrite(ops, { session, ordered: true });
        inserted = result.upsertedCount;
      });
    } catch (err) {
      throw new StoreError(`Failed to store batch of ${events.length} ratings: ${errorMessage(err)}`, { cause: err });
    } finally {
      await session.endSession();
    }

    this.logger.debug?.(
      { attempted: events.length, inserted, skipped: events.length - inserted },
      'Ratings batch committed'
    );
    return inserted;
  }

  async latestByTicker(): Promise<LatestRatingIndex> {
    try {
      // Same order as compareRecency: newest issue, latest ingestion, natural key
      const docs = await RatingModel.aggregate<RatingDoc>([
        { $sort: { ticker: 1, issuedAt: -1, ingestedAt: -1, brokerage: 1, ratingTo: 1 } },
        { $group: { _id: '$ticker', doc: { $first: '$$ROOT' } } },
        { $replaceRoot: { newRoot: '$doc' } },
      ]).allowDiskUse(true);

      const index: LatestRatingIndex = new Map();
      for (const doc of docs) {
        index.set(doc.ticker, fromDoc(doc));
      }
      return index;
    } catch (err) {
      throw new StoreError(`Failed to read latest ratings: ${errorMessage(err)}`, { cause: err });
    }
  }

  async list(query: RatingListQuery): Promise<RatingListPage> {
    const filter: FilterQuery<RatingDoc> = {};
    if (query.search) {
      const pattern = { $regex: escapeRegex(query.search), $options: 'i' };
      filter.$or = [{ ticker: pattern }, { company: pattern }, { brokerage: pattern }];
    }
    const sort: Record<string, SortOrder> = { [query.sortBy]: query.order === 'asc' ? 1 : -1, _id: 1 };

    try {
      const [totalItems, docs] = await Promise.all([
        RatingModel.countDocuments(filter),
        RatingModel.find(filter)
          .sort(sort)
          .skip((query.page - 1) * query.limit)
          .limit(query.limit)
          .lean<RatingDoc[]>(),
      ]);

      return {
        data: docs.map(fromDoc),
        pagination: {
          page: query.page,
          limit: query.limit,
          totalItems,
          totalPages: totalPages(totalItems, query.limit),
        },
      };
    } catch (err) {
      throw new StoreError(`Failed to list ratings: ${errorMessage(err)}`, { cause: err });
    }
  }

  async byTicker(ticker: string): Promise<RatingEvent[]> {
    try {
      const docs = await RatingModel.find({ ticker: ticker.trim().toUpperCase() })
        .sort({ issuedAt: -1, ingestedAt: -1 })
        .lean<RatingDoc[]>();
      return docs.map(fromDoc);
    } catch (err) {
      throw new StoreError(`Failed to read ratings for ${ticker}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async count(): Promise<number> {
    try {
      return await RatingModel.countDocuments({});
    } catch (err) {
      throw new StoreError(`Failed to count ratings: ${errorMessage(err)}`, { cause: err });
    }
  }
}
