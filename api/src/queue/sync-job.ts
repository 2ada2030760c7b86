import type { JobsOptions, Queue } from 'bullmq';

export type SyncTrigger = 'scheduled' | 'requested';

export interface SyncJobData {
  trigger: SyncTrigger;
  /** Discord id of the organizer who asked, for requested runs */
  requestedBy?: string;
}

export interface SyncRetryPolicy {
  attempts: number;
  delayMs: number;
}

/**
 * Scheduled runs share one job id per queue, so a tick that lands while the
 * previous scheduled run is still queued or active is dropped. Requested runs
 * get their own id and always enqueue.
 */
export function syncJobId(queueName: string, trigger: SyncTrigger): string {
  return trigger === 'scheduled'
    ? `${queueName}-scheduled`
    : `${queueName}-requested-${Date.now()}`;
}

/** Add a sync run to `queue`. */
export async function addSyncJob(
  queue: Queue<SyncJobData>,
  data: SyncJobData,
  retry?: SyncRetryPolicy,
): Promise<void> {
  const options: JobsOptions = {
    jobId: syncJobId(queue.name, data.trigger),
    removeOnComplete: true,
    removeOnFail: true,
    ...(retry
      ? {
          attempts: retry.attempts,
          backoff: { type: 'fixed', delay: retry.delayMs },
        }
      : {}),
  };
  await queue.add(data.trigger, data, options);
}
