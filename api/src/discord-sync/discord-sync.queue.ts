import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { OnEvent } from '@nestjs/event-emitter';
import { Cron } from '@nestjs/schedule';
import type { Queue } from 'bullmq';
import {
  DISCORD_BOT_EVENTS,
  SYNC_REQUEST_EVENTS,
  type SyncRequestPayload,
} from '../discord-bot/discord-bot.constants';
import { addSyncJob, type SyncJobData } from '../queue/sync-job';

export const DISCORD_SYNC_QUEUE = 'discord-sync';

/** A failed scheduled run is tried once more a minute later */
const SCHEDULED_RETRY = { attempts: 2, delayMs: 60_000 };

/**
 * Producer for the discord-sync queue: every 15 minutes, right after the
 * bot connects, and on `sync discord`.
 */
@Injectable()
export class DiscordSyncQueueService {
  private readonly logger = new Logger(DiscordSyncQueueService.name);

  constructor(
    @InjectQueue(DISCORD_SYNC_QUEUE)
    private readonly queue: Queue<SyncJobData>,
  ) {}

  @Cron('0 */15 * * * *', { name: 'DiscordSyncQueueService_scheduleSync' })
  async scheduleSync(): Promise<void> {
    try {
      await addSyncJob(this.queue, { trigger: 'scheduled' }, SCHEDULED_RETRY);
    } catch (error) {
      this.logger.error(
        `Failed to enqueue scheduled Discord sync: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  async handleBotConnected(): Promise<void> {
    await this.scheduleSync();
  }

  /** Errors reach the command that asked, which reports them */
  @OnEvent(SYNC_REQUEST_EVENTS.DISCORD, { suppressErrors: false })
  async handleSyncRequest(payload: SyncRequestPayload): Promise<void> {
    await addSyncJob(this.queue, {
      trigger: 'requested',
      requestedBy: payload.requestedBy,
    });
    this.logger.log(`Discord sync requested by ${payload.requestedBy}`);
  }
}
