import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { OnEvent } from '@nestjs/event-emitter';
import { Cron } from '@nestjs/schedule';
import type { Queue } from 'bullmq';
import {
  SYNC_REQUEST_EVENTS,
  type SyncRequestPayload,
} from '../discord-bot/discord-bot.constants';
import { addSyncJob, type SyncJobData } from '../queue/sync-job';

export const END_OF_GAME_QUEUE = 'end-of-game';

@Injectable()
export class EndOfGameQueueService {
  private readonly logger = new Logger(EndOfGameQueueService.name);

  constructor(
    @InjectQueue(END_OF_GAME_QUEUE)
    private readonly queue: Queue<SyncJobData>,
  ) {}

  @Cron('0 0 * * * *', { name: 'EndOfGameQueueService_scheduleRun' })
  async scheduleRun(): Promise<void> {
    try {
      await addSyncJob(this.queue, { trigger: 'scheduled' });
    } catch (error) {
      this.logger.error(
        `Failed to enqueue end of game run: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  @OnEvent(SYNC_REQUEST_EVENTS.END_OF_GAME, { suppressErrors: false })
  async handleRunRequest(payload: SyncRequestPayload): Promise<void> {
    await addSyncJob(this.queue, {
      trigger: 'requested',
      requestedBy: payload.requestedBy,
    });
    this.logger.log(`Expiration reminder requested by ${payload.requestedBy}`);
  }
}
