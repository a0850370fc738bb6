/**
 * Logging
 *
 * Fastify logs through its own pino instance; services outside the request
 * cycle take a Logger and default to a named child of the root logger below.
 */

import { pino } from 'pino';
import { env } from '../config/env.js';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export const rootLogger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'ratings-service' },
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}
