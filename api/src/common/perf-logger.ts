import { Logger } from '@nestjs/common';
import type { SyncTrigger } from '../queue/sync-job';

const perfLogger = new Logger('PERF');

/** Timing lines are written with DEBUG=true only */
export function isPerfEnabled(): boolean {
  return process.env.DEBUG === 'true';
}

/**
 * One line per finished sync run, grep-able by queue name:
 *
 * `[PERF] discord-sync | requested | 812ms | series=4`
 */
export function perfLogSyncRun(
  queue: string,
  trigger: SyncTrigger,
  startedAt: number,
  counts: Record<string, number>,
): void {
  if (!isPerfEnabled()) return;

  const durationMs = Date.now() - startedAt;
  let line = `[PERF] ${queue} | ${trigger} | ${durationMs}ms`;
  const pairs = Object.entries(counts)
    .map(([key, value]) => `${key}=${value}`)
    .join(' ');
  if (pairs) {
    line += ` | ${pairs}`;
  }

  perfLogger.debug(line);
}
