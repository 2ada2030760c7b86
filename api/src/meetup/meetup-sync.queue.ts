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

export const MEETUP_SYNC_QUEUE = 'meetup-sync';

@Injectable()
export class MeetupSyncQueueService {
  private readonly logger = new Logger(MeetupSyncQueueService.name);

  constructor(
    @InjectQueue(MEETUP_SYNC_QUEUE)
    private readonly queue: Queue<SyncJobData>,
  ) {}

  @Cron('0 0 * * * *', { name: 'MeetupSyncQueueService_scheduleSync' })
  async scheduleSync(): Promise<void> {
    try {
      await addSyncJob(this.queue, { trigger: 'scheduled' });
    } catch (error) {
      this.logger.error(
        `Failed to enqueue scheduled Meetup sync: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  @OnEvent(SYNC_REQUEST_EVENTS.MEETUP, { suppressErrors: false })
  async handleSyncRequest(payload: SyncRequestPayload): Promise<void> {
    await addSyncJob(this.queue, {
      trigger: 'requested',
      requestedBy: payload.requestedBy,
    });
    this.logger.log(`Meetup sync requested by ${payload.requestedBy}`);
  }
}
