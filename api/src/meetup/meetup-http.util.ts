import { Logger } from '@nestjs/common';

const logger = new Logger('MeetupHTTP');

/** Attempts after the first one on a throttled Meetup request */
const MAX_RETRIES = 3;
const BASE_BACKOFF_MS = 1_000;

export interface MeetupFetchOptions {
  maxRetries?: number;
  /** Waits `ms` unless `signal` aborts first; replaced in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Resolves after `ms`, rejects with the abort reason once `signal` fires. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * How long Meetup wants us to wait: `Retry-After`, else the seconds left in
 * the window from `X-RateLimit-Reset`, else exponential backoff.
 */
export function throttleDelayMs(headers: Headers, attempt: number): number {
  for (const name of ['retry-after', 'x-ratelimit-reset']) {
    const seconds = parseFloat(headers.get(name) ?? '');
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds * 1_000);
    }
  }
  return BASE_BACKOFF_MS * 2 ** attempt;
}

/**
 * `fetch()` against the Meetup API that waits out 429 answers. The wait
 * honours `init.signal`, so a sync deadline also cuts the back-off short.
 */
export async function meetupFetch(
  url: string | URL,
  init?: RequestInit,
  options?: MeetupFetchOptions,
): Promise<Response> {
  const maxRetries = options?.maxRetries ?? MAX_RETRIES;
  const sleep = options?.sleep ?? abortableSleep;
  const signal = init?.signal ?? undefined;

  for (let attempt = 0; ; attempt++) {
    const response = await fetch(url, init);
    if (response.status !== 429) return response;

    if (attempt === maxRetries) {
      logger.error(`Meetup still throttling after ${maxRetries} retries: ${String(url)}`);
      return response;
    }

    const waitMs = throttleDelayMs(response.headers, attempt);
    logger.warn(`Meetup throttled ${String(url)}, waiting ${waitMs}ms`);
    await sleep(waitMs, signal);
  }
}
