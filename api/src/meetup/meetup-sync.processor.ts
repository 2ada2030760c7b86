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
import { MEETUP_SYNC_QUEUE } from './meetup-sync.queue';
import { MeetupSyncService } from './meetup-sync.service';

@Processor(MEETUP_SYNC_QUEUE, { concurrency: 1 })
export class MeetupSyncProcessor extends WorkerHost implements OnModuleInit {
  private readonly logger = new Logger(MeetupSyncProcessor.name);

  constructor(
    private readonly syncService: MeetupSyncService,
    @InjectQueue(MEETUP_SYNC_QUEUE) private readonly queue: Queue<SyncJobData>,
    private readonly queueHealth: QueueHealthService,
  ) {
    super();
  }

  onModuleInit(): void {
    this.queueHealth.register(this.queue);
  }

  async process(job: Job<SyncJobData>): Promise<{ events: number }> {
    const start = Date.now();
    this.logger.log(`Starting Meetup sync (trigger: ${job.data.trigger})`);

    const result = await this.syncService.syncAll();

    perfLogSyncRun(MEETUP_SYNC_QUEUE, job.data.trigger, start, {
      events: result.events,
    });
    this.logger.log(`Meetup sync complete: ${result.events} events`);
    return result;
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<SyncJobData> | undefined, error: Error): void {
    this.logger.error(
      `Meetup sync (${job?.data.trigger ?? 'unknown'}) failed: ${error.message}`,
    );
    this.queueHealth.recordFailure(MEETUP_SYNC_QUEUE, error.message);
  }
}
