import { Inject, Injectable, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { DiscordBotClientService } from '../discord-bot/discord-bot-client.service';
import { STRINGS } from '../discord-bot/discord-bot.strings';
import { REDIS_CLIENT } from '../redis/redis.module';
import { REDIS_KEYS } from '../redis/redis-keys';
import { loadSeriesEvents } from './event-series';

function parseTimestamp(value: string, key: string): number {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new Error(`Invalid timestamp "${value}" in ${key}`);
  }
  return time;
}

export interface EndOfGameResult {
  reminded: number;
  deleted: number;
}

/**
 * Reminds hosts once the last session of their game has passed, and
 * deletes channels (with both roles) that were closed.
 */
@Injectable()
export class EndOfGameService {
  private readonly logger = new Logger(EndOfGameService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly clientService: DiscordBotClientService,
  ) {}

  /** @throws once all channels ran, if any of them failed */
  async run(): Promise<EndOfGameResult> {
    const botId = this.clientService.getBotUserId();
    if (!botId) {
      throw new Error('Discord bot is not connected');
    }

    const channelIds = await this.redis.smembers(REDIS_KEYS.DISCORD_CHANNELS);
    const result: EndOfGameResult = { reminded: 0, deleted: 0 };
    const failed: string[] = [];
    for (const channelId of channelIds) {
      try {
        const outcome = await this.processChannel(channelId, botId);
        if (outcome === 'reminded') result.reminded++;
        if (outcome === 'deleted') result.deleted++;
      } catch (error) {
        failed.push(channelId);
        this.logger.error(
          `End of game handling for channel ${channelId} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }

    if (failed.length > 0) {
      throw new Error(
        `End of game handling failed for ${failed.length} of ${channelIds.length} channels: ${failed.join(', ')}`,
      );
    }
    return result;
  }

  private async processChannel(
    channelId: string,
    botId: string,
  ): Promise<'deleted' | 'reminded' | null> {
    const now = Date.now();
    const deletionKey = REDIS_KEYS.channelDeletionTime(channelId);
    const deletion = await this.redis.get(deletionKey);
    if (deletion !== null) {
      if (parseTimestamp(deletion, deletionKey) > now) return null;
      await this.deleteChannel(channelId);
      return 'deleted';
    }

    const seriesId = await this.redis.get(REDIS_KEYS.channelSeries(channelId));
    if (!seriesId) {
      this.logger.warn(`Channel ${channelId} has no event series`);
      return null;
    }

    const events = await loadSeriesEvents(this.redis, seriesId);
    if (events.length === 0) return null;
    const expiration = Math.max(...events.map((event) => event.time.getTime()));
    await this.redis.set(
      REDIS_KEYS.channelExpirationTime(channelId),
      new Date(expiration).toISOString(),
    );
    if (expiration > now) return null;

    const reminderKey = REDIS_KEYS.channelLastReminderTime(channelId);
    const lastReminder = await this.redis.get(reminderKey);
    if (lastReminder !== null && parseTimestamp(lastReminder, reminderKey) >= expiration) {
      return null;
    }

    const hostRoleId = await this.redis.get(REDIS_KEYS.channelRole(channelId, true));
    if (!hostRoleId) {
      this.logger.warn(`Channel ${channelId} has no host role, not reminding`);
      return null;
    }
    await this.clientService.sendChannelMessage(
      channelId,
      STRINGS.expirationReminder(hostRoleId, `<@${botId}>`),
    );
    await this.redis.set(reminderKey, new Date(now).toISOString());
    this.logger.log(`Sent expiration reminder to channel ${channelId}`);
    return 'reminded';
  }

  private async deleteChannel(channelId: string): Promise<void> {
    if (await this.clientService.channelExists(channelId)) {
      await this.clientService.deleteChannel(channelId);
    }
    this.logger.log(`Deleted channel ${channelId}`);

    const [seriesId, roleId, hostRoleId] = await this.redis.mget(
      REDIS_KEYS.channelSeries(channelId),
      REDIS_KEYS.channelRole(channelId, false),
      REDIS_KEYS.channelRole(channelId, true),
    );

    const multi = this.redis
      .multi()
      .srem(REDIS_KEYS.DISCORD_CHANNELS, channelId)
      .del(
        REDIS_KEYS.channelSeries(channelId),
        REDIS_KEYS.channelRole(channelId, false),
        REDIS_KEYS.channelRole(channelId, true),
        REDIS_KEYS.channelRemovedUsers(channelId),
        REDIS_KEYS.channelRemovedHosts(channelId),
        REDIS_KEYS.channelExpirationTime(channelId),
        REDIS_KEYS.channelDeletionTime(channelId),
        REDIS_KEYS.channelLastReminderTime(channelId),
      );
    if (seriesId) multi.del(REDIS_KEYS.seriesChannel(seriesId));

    for (const [id, isHostRole] of [
      [roleId, false],
      [hostRoleId, true],
    ] as const) {
      if (!id) continue;
      await this.deleteRole(id);
      multi
        .srem(REDIS_KEYS.rolesSet(isHostRole), id)
        .del(REDIS_KEYS.roleChannel(id, isHostRole));
    }
    await multi.exec();
  }

  /** A role that cannot be deleted is recorded as orphaned */
  private async deleteRole(roleId: string): Promise<void> {
    try {
      if (await this.clientService.roleExists(roleId)) {
        await this.clientService.deleteRole(roleId);
      }
      this.logger.log(`Deleted role ${roleId}`);
    } catch (error) {
      this.logger.warn(
        `Could not delete role ${roleId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      await this.redis.sadd(REDIS_KEYS.ORPHANED_DISCORD_ROLES, roleId);
    }
  }
}
