/**
 * RATINGS FEED CLIENT
 *
 * Authenticated GET against the upstream ratings feed, one page per call.
 *
 * Retry policy:
 * - transport errors and HTTP >= 500 are retried with exponential backoff
 *   (base, 2*base, 4*base, ...) up to `maxRetries` times
 * - any status below 500 is final: 200 is parsed, everything else fails
 * - cancellation interrupts both the request and a pending backoff sleep
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { CancelledError, UpstreamError, errorMessage } from '../../../common/errors.js';
import { createLogger, type Logger } from '../../../common/logger.js';
import type { FeedPage } from '../contracts/ratings.contracts.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface FeedClientOptions {
  url: string;
  token: string;
  maxRetries?: number;
  backoffMs?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
  sleep?: Sleep;
  logger?: Logger;
}

export interface RatingsFeed {
  fetchPage(cursor?: string | null, signal?: AbortSignal): Promise<FeedPage>;
}

// ═══════════════════════════════════════════════════════════════
// RESPONSE SCHEMA
// ═══════════════════════════════════════════════════════════════

const feedText = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

const RawRatingSchema = z.object({
  ticker: feedText,
  company: feedText,
  brokerage: feedText,
  action: feedText,
  rating_from: feedText,
  rating_to: feedText,
  target_from: feedText,
  target_to: feedText,
  time: feedText,
});

const FeedPageSchema = z.object({
  items: z.array(RawRatingSchema).nullish().transform((v) => v ?? []),
  next_page: z.string().nullish().transform((v) => v ?? null),
});

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

/**
 * setTimeout that rejects with CancelledError as soon as the signal aborts.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Backoff cancelled'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Backoff cancelled'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * 2 ** (attempt - 1);
}

// ═══════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════

export class RatingsFeedClient implements RatingsFeed {
  private readonly http: AxiosInstance;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly timeoutMs: number;

  constructor(private readonly options: FeedClientOptions) {
    this.http = options.http ?? axios.create();
    this.sleep = options.sleep ?? abortableSleep;
    this.logger = options.logger ?? createLogger('ratings-feed');
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffMs = options.backoffMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async fetchPage(cursor?: string | null, signal?: AbortSignal): Promise<FeedPage> {
    if (!this.options.url) {
      throw new UpstreamError('Ratings feed URL is not configured (RATINGS_API_URL)');
    }

    const response = await this.requestWithRetry(cursor ?? null, signal);

    if (response.status !== 200) {
      throw new UpstreamError(
        `Feed request failed with status ${response.status}: ${bodyPreview(response.data)}`,
        response.status
      );
    }

    const parsed = FeedPageSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamError(`Feed returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  private async requestWithRetry(cursor: string | null, signal?: AbortSignal): Promise<AxiosResponse<unknown>> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(attempt, this.backoffMs);
        this.logger.warn({ attempt, delay, cursor, error: errorMessage(lastError) }, 'Feed request failed, retrying');
        await this.sleep(delay, signal);
      }

      if (signal?.aborted) {
        throw new CancelledError('Feed request cancelled');
      }

      try {
        const response = await this.http.get<unknown>(this.options.url, {
          headers: {
            Authorization: `Bearer ${this.options.token}`,
            Accept: 'application/json',
          },
          params: cursor ? { next_page: cursor } : undefined,
          timeout: this.timeoutMs,
          signal,
          validateStatus: () => true,
        });

        if (response.status < 500) {
          return response;
        }
        lastError = new UpstreamError(`Feed server error: ${response.status}`, response.status);
      } catch (err) {
        if (signal?.aborted || axios.isCancel(err)) {
          throw new CancelledError('Feed request cancelled');
        }
        lastError = err;
      }
    }

    throw new UpstreamError(
      `Feed request failed after ${this.maxRetries} retries: ${errorMessage(lastError)}`,
      lastError instanceof UpstreamError ? lastError.status : undefined,
      { cause: lastError }
    );
  }
}

function bodyPreview(data: unknown): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}
