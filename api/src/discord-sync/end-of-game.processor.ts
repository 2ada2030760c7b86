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
import { END_OF_GAME_QUEUE } from './end-of-game.queue';
import { EndOfGameService, type EndOfGameResult } from './end-of-game.service';

@Processor(END_OF_GAME_QUEUE, { concurrency: 1 })
export class EndOfGameProcessor extends WorkerHost implements OnModuleInit {
  private readonly logger = new Logger(EndOfGameProcessor.name);

  constructor(
    private readonly endOfGame: EndOfGameService,
    @InjectQueue(END_OF_GAME_QUEUE) private readonly queue: Queue<SyncJobData>,
    private readonly queueHealth: QueueHealthService,
  ) {
    super();
  }

  onModuleInit(): void {
    this.queueHealth.register(this.queue);
  }

  async process(job: Job<SyncJobData>): Promise<EndOfGameResult> {
    const start = Date.now();
    const result = await this.endOfGame.run();
    perfLogSyncRun(END_OF_GAME_QUEUE, job.data.trigger, start, {
      reminded: result.reminded,
      deleted: result.deleted,
    });
    if (result.reminded > 0 || result.deleted > 0) {
      this.logger.log(
        `End of game: ${result.reminded} reminders sent, ${result.deleted} channels deleted`,
      );
    }
    return result;
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<SyncJobData> | undefined, error: Error): void {
    this.logger.error(
      `End of game run (${job?.data.trigger ?? 'unknown'}) failed: ${error.message}`,
    );
    this.queueHealth.recordFailure(END_OF_GAME_QUEUE, error.message);
  }
}
