import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { CancelledError, UpstreamError } from '../../../common/errors.js';
import { RatingsFeedClient, abortableSleep, backoffDelay, type Sleep } from '../ingest/feed.client.js';
import { createMockLogger, rawRating } from './fixtures.js';

type Reply = { status: number; data?: unknown } | Error;

/**
 * axios instance whose adapter plays back canned replies and records requests.
 */
function scriptedHttp(replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = replies.shift();
      if (!reply) throw new Error('No scripted reply left');
      if (reply instanceof Error) throw reply;
      return { data: reply.data ?? null, status: reply.status, statusText: '', headers: {}, config };
    },
  });
  return { http, requests };
}

function recordingSleep() {
  const delays: number[] = [];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

const PAGE = { items: [rawRating()], next_page: 'cursor-2' };

function client(http: ReturnType<typeof scriptedHttp>['http'], sleep: Sleep, maxRetries = 3) {
  return new RatingsFeedClient({
    url: 'https://feed.test/list',
    token: 'test-token',
    maxRetries,
    backoffMs: 1000,
    http,
    sleep,
    logger: createMockLogger(),
  });
}

describe('backoffDelay', () => {
  it('doubles per attempt', () => {
    expect([1, 2, 3, 4].map((a) => backoffDelay(a, 1000))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('RatingsFeedClient', () => {
  it('sends the bearer token and the cursor', async () => {
    const { http, requests } = scriptedHttp([{ status: 200, data: PAGE }]);
    const { sleep } = recordingSleep();

    await client(http, sleep).fetchPage('abc');

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://feed.test/list');
    expect(requests[0].headers.Authorization).toBe('Bearer test-token');
    expect(requests[0].params).toEqual({ next_page: 'abc' });
  });

  it('omits the cursor on the first page', async () => {
    const { http, requests } = scriptedHttp([{ status: 200, data: PAGE }]);
    const { sleep } = recordingSleep();

    await client(http, sleep).fetchPage();

    expect(requests[0].params).toBeUndefined();
  });

  it('parses the page body', async () => {
    const { http } = scriptedHttp([{ status: 200, data: PAGE }]);
    const { sleep } = recordingSleep();

    const page = await client(http, sleep).fetchPage();

    expect(page.next_page).toBe('cursor-2');
    expect(page.items).toEqual([rawRating()]);
  });

  it('fills missing fields with defaults', async () => {
    const { http } = scriptedHttp([{ status: 200, data: { items: [{ ticker: 'MSFT', rating_from: null }] } }]);
    const { sleep } = recordingSleep();

    const page = await client(http, sleep).fetchPage();

    expect(page.next_page).toBeNull();
    expect(page.items[0].ticker).toBe('MSFT');
    expect(page.items[0].rating_from).toBe('');
    expect(page.items[0].time).toBe('');
  });

  it('succeeds after two 503s with exactly two backoff sleeps', async () => {
    const { http, requests } = scriptedHttp([{ status: 503 }, { status: 503 }, { status: 200, data: PAGE }]);
    const { sleep, delays } = recordingSleep();

    const page = await client(http, sleep).fetchPage();

    expect(requests).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
    expect(page.items).toHaveLength(1);
  });

  it('retries transport errors', async () => {
    const { http, requests } = scriptedHttp([new Error('socket hang up'), { status: 200, data: PAGE }]);
    const { sleep, delays } = recordingSleep();

    await client(http, sleep).fetchPage();

    expect(requests).toHaveLength(2);
    expect(delays).toEqual([1000]);
  });

  it('does not retry a 4xx', async () => {
    const { http, requests } = scriptedHttp([{ status: 404, data: { error: 'missing' } }]);
    const { sleep, delays } = recordingSleep();

    const error = await client(http, sleep).fetchPage().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 404, message: 'Feed request failed with status 404: {"error":"missing"}' });
    expect(requests).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('gives up after maxRetries with non-decreasing delays', async () => {
    const { http, requests } = scriptedHttp([{ status: 503 }, { status: 502 }, { status: 500 }, { status: 503 }]);
    const { sleep, delays } = recordingSleep();

    const error = await client(http, sleep).fetchPage().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({
      status: 503,
      message: 'Feed request failed after 3 retries: Feed server error: 503',
    });
    expect(requests).toHaveLength(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('rejects a body that is not a feed page', async () => {
    const { http } = scriptedHttp([{ status: 200, data: { items: 'nope' } }]);
    const { sleep } = recordingSleep();

    await expect(client(http, sleep).fetchPage()).rejects.toBeInstanceOf(UpstreamError);
  });

  it('fails fast without a configured URL', async () => {
    const { http, requests } = scriptedHttp([]);
    const feed = new RatingsFeedClient({ url: '', token: 'test-token', http, logger: createMockLogger() });

    await expect(feed.fetchPage()).rejects.toBeInstanceOf(UpstreamError);
    expect(requests).toHaveLength(0);
  });

  it('stops when cancelled during backoff', async () => {
    const { http, requests } = scriptedHttp([{ status: 503 }, { status: 200, data: PAGE }]);
    const controller = new AbortController();
    const sleep: Sleep = (ms, signal) => {
      controller.abort();
      return abortableSleep(ms, signal);
    };

    const error = await client(http, sleep).fetchPage(null, controller.signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CancelledError);
    expect(requests).toHaveLength(1);
  });
});
