import type Redis from 'ioredis';
import type { ChainableCommander } from 'ioredis';

/** WATCH conflicts are retried this many times before giving up */
const MAX_TRANSACTION_ATTEMPTS = 5;

/**
 * Body of an optimistic transaction. Runs after WATCH on a dedicated
 * connection: read what you need with `conn`, then return the MULTI
 * pipeline to execute, or `null` to abort without writing.
 */
export type TransactionBody = (
  conn: Redis,
) => Promise<ChainableCommander | null>;

export type TransactionOutcome =
  | { committed: true; results: unknown[] }
  | { committed: false };

/**
 * WATCH `keys`, run `body`, EXEC. Retries when a watched key changed
 * underneath (EXEC returned null). Each attempt uses a duplicated
 * connection so WATCH state never leaks into commands other callers
 * issue on the shared client.
 */
export async function watchedTransaction(
  redis: Redis,
  keys: string[],
  body: TransactionBody,
): Promise<TransactionOutcome> {
  for (let attempt = 1; attempt <= MAX_TRANSACTION_ATTEMPTS; attempt++) {
    const conn = redis.duplicate();
    try {
      await conn.watch(...keys);
      const pipeline = await body(conn);
      if (!pipeline) {
        await conn.unwatch();
        return { committed: false };
      }
      const replies = await pipeline.exec();
      if (replies === null) {
        // A watched key changed, run the body again against fresh state
        continue;
      }
      const results: unknown[] = [];
      for (const [error, value] of replies) {
        if (error) throw error;
        results.push(value);
      }
      return { committed: true, results };
    } finally {
      conn.disconnect();
    }
  }
  throw new Error(
    `Redis transaction on ${keys.join(', ')} kept conflicting after ${MAX_TRANSACTION_ATTEMPTS} attempts`,
  );
}
