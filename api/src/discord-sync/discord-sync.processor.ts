import { Logger, OnModuleInit } from '@nestjs/common';
import {
  InjectQueue,
  OnWorkerEvent,
  Processor,
  WorkerHost,
} from '@nestjs/bullmq';
import type { Job, Queue } from 'bullmq';
import { perfLogSyncRun } from '../common/perf-logger';
import { QueueHealthService } from '../queue/queue-health.service';
import type { SyncJobData } from '../queue/sync-job';
import { DISCORD_SYNC_QUEUE } from './discord-sync.queue';
import { DiscordSyncService } from './discord-sync.service';

@Processor(DISCORD_SYNC_QUEUE, { concurrency: 1 })
export class DiscordSyncProcessor extends WorkerHost implements OnModuleInit {
  private readonly logger = new Logger(DiscordSyncProcessor.name);

  constructor(
    private readonly syncService: DiscordSyncService,
    @InjectQueue(DISCORD_SYNC_QUEUE) private readonly queue: Queue<SyncJobData>,
    private readonly queueHealth: QueueHealthService,
  ) {
    super();
  }

  onModuleInit(): void {
    this.queueHealth.register(this.queue);
  }

  async process(
    job: Job<SyncJobData>,
  ): Promise<{ synced: number; failed: number }> {
    const start = Date.now();
    this.logger.log(`Starting Discord sync (trigger: ${job.data.trigger})`);

    const result = await this.syncService.syncAll();

    perfLogSyncRun(DISCORD_SYNC_QUEUE, job.data.trigger, start, {
      series: result.synced,
      failed: result.failed,
    });
    this.logger.log(`Discord sync complete: ${result.synced} event series`);
    return result;
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<SyncJobData> | undefined, error: Error): void {
    const attempts = job?.opts.attempts ?? 1;
    const attemptsMade = job?.attemptsMade ?? attempts;
    if (attemptsMade < attempts) {
      this.logger.warn(
        `Discord sync failed, retrying (attempt ${attemptsMade}/${attempts}): ${error.message}`,
      );
      return;
    }
    this.logger.error(`Discord sync failed: ${error.message}`);
    this.queueHealth.recordFailure(DISCORD_SYNC_QUEUE, error.message);
  }
}
