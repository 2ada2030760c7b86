import type { RedisOptions } from 'ioredis';

/**
 * ioredis options for REDIS_URL, shared by the data client and the BullMQ
 * queues. A value starting with `/` is the unix socket of the local Redis;
 * anything else is a `redis://[:password@]host[:port][/db]` URL.
 */
export function redisConnectionOptions(url: string): RedisOptions {
  if (url.startsWith('/')) {
    return { path: url };
  }

  const parsed = new URL(url);
  const db = Number(parsed.pathname.slice(1));
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(Number.isInteger(db) && db > 0 ? { db } : {}),
  };
}
