/**
 * MongoDB connection (Mongoose)
 */

import mongoose from 'mongoose';
import { createLogger } from '../common/logger.js';

const log = createLogger('db');

export async function connectMongo(url: string): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) {
    return mongoose;
  }

  mongoose.set('strictQuery', true);
  await mongoose.connect(url, {
    serverSelectionTimeoutMS: 10_000,
    maxPoolSize: 25,
  });

  log.info({ db: mongoose.connection.name }, 'MongoDB connected');
  return mongoose;
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  log.info({}, 'MongoDB disconnected');
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === 1;
}

export { mongoose };
