/**
 * RATING MODEL
 *
 * MongoDB schema for analyst ratings.
 */

import mongoose, { Schema } from 'mongoose';

export interface RatingDoc {
  ticker: string;
  company: string;
  brokerage: string;
  action: string;
  ratingFrom?: string | null;
  ratingTo: string;
  targetFrom?: number | null;
  targetTo?: number | null;
  issuedAt: Date;
  ingestedAt: Date;
}

const RatingSchema = new Schema<RatingDoc>(
  {
    ticker: { type: String, default: '' },
    company: { type: String, default: '' },
    brokerage: { type: String, default: '' },
    action: { type: String, default: '' },
    ratingFrom: { type: String },
    ratingTo: { type: String, default: '' },
    targetFrom: { type: Number },
    targetTo: { type: Number },
    issuedAt: { type: Date, required: true },
    ingestedAt: { type: Date, required: true },
  },
  {
    collection: 'stock_ratings',
    versionKey: false,
  }
);

// Natural key: one rating per ticker/brokerage/label/issue time
RatingSchema.index({ ticker: 1, brokerage: 1, ratingTo: 1, issuedAt: 1 }, { unique: true, name: 'uniq_natural_key' });

// Latest-per-ticker and listing
RatingSchema.index({ ticker: 1, issuedAt: -1 });
RatingSchema.index({ issuedAt: -1 });

export const RatingModel = mongoose.model<RatingDoc>('Rating', RatingSchema);
