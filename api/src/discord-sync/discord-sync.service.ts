import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type Redis from 'ioredis';
import type { ChainableCommander } from 'ioredis';
import { EventSeriesTypeSchema, type Env } from '@swissrpg-bot/contract';
import {
  DiscordBotClientService,
  type ChannelPermissionOverwrite,
  type CreatedGuildObject,
} from '../discord-bot/discord-bot-client.service';
import { REDIS_CLIENT } from '../redis/redis.module';
import { REDIS_KEYS } from '../redis/redis-keys';
import { watchedTransaction } from '../redis/redis-transaction';
import {
  loadSeriesEvents,
  seriesNameFromEventName,
  upcomingEvents,
  type SeriesEvent,
} from './event-series';

/** A mapped channel or role that turns out deleted is unmapped and recreated at most this often */
const MAX_STALE_RETRIES = 1;

export const HOST_ROLE_PREFIX = '[Host] ';

/** How to create, claim and throw away one Discord object of a series */
interface ClaimSpec {
  label: string;
  /** Key holding the claimed object's id */
  claimKey: string;
  orphanSetKey: string;
  create: () => Promise<CreatedGuildObject>;
  destroy: (id: string) => Promise<void>;
  /** Writes stored alongside the claim */
  register: (multi: ChainableCommander, id: string) => ChainableCommander;
}

/**
 * Brings Discord in line with the event series stored in Redis: one
 * private channel per series with a player and a host role, the roles
 * handed to everyone who RSVP'd, the channel topic pointing at the next
 * session.
 */
@Injectable()
export class DiscordSyncService {
  private readonly logger = new Logger(DiscordSyncService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService<Env, true>,
  ) {}

  /**
   * Sync every known series. A failing series does not stop the others.
   * @throws once all series ran, if any of them failed
   */
  async syncAll(): Promise<{ synced: number; failed: number }> {
    const botId = this.clientService.getBotUserId();
    if (!botId) {
      throw new Error('Discord bot is not connected');
    }

    const seriesIds = await this.redis.smembers(REDIS_KEYS.EVENT_SERIES);
    const failed: string[] = [];
    for (const seriesId of seriesIds) {
      try {
        await this.syncSeries(seriesId, botId);
      } catch (error) {
        failed.push(seriesId);
        this.logger.error(
          `Syncing event series ${seriesId} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }

    if (failed.length > 0) {
      throw new Error(
        `Discord sync failed for ${failed.length} of ${seriesIds.length} event series: ${failed.join(', ')}`,
      );
    }
    return { synced: seriesIds.length, failed: 0 };
  }

  async syncSeries(seriesId: string, botId: string): Promise<void> {
    const events = await loadSeriesEvents(this.redis, seriesId);
    const [nextEvent] = upcomingEvents(events, Date.now());
    if (!nextEvent) {
      this.logger.log(
        `Event series ${seriesId} has no upcoming events, not syncing it to Discord`,
      );
      return;
    }

    const seriesName = seriesNameFromEventName(nextEvent.name);
    const channelId = await this.syncChannel(seriesName, seriesId, botId);
    const roleId = await this.syncRole(seriesName, false, channelId);
    const hostRoleId = await this.syncRole(
      `${HOST_ROLE_PREFIX}${seriesName}`,
      true,
      channelId,
    );
    await this.syncChannelPermissions(channelId, roleId, hostRoleId, botId);
    await this.syncRoleAssignments(seriesId, channelId, roleId, false);
    await this.syncRoleAssignments(seriesId, channelId, hostRoleId, true);
    await this.syncGameMasterRole(seriesId);
    await this.syncTopicAndCategory(seriesId, channelId, nextEvent);
  }

  // ─── Channel and roles ────────────────────────────────────────────

  private async syncChannel(
    name: string,
    seriesId: string,
    botId: string,
  ): Promise<string> {
    const seriesChannelKey = REDIS_KEYS.seriesChannel(seriesId);
    for (let attempt = 0; attempt <= MAX_STALE_RETRIES; attempt++) {
      const channelId = await this.claim({
        label: 'channel',
        claimKey: seriesChannelKey,
        orphanSetKey: REDIS_KEYS.ORPHANED_DISCORD_CHANNELS,
        create: () =>
          this.clientService.createTextChannel(
            name,
            this.privateChannelOverwrites(botId),
          ),
        destroy: (id) => this.clientService.deleteChannel(id),
        register: (multi, id) =>
          multi
            .sadd(REDIS_KEYS.DISCORD_CHANNELS, id)
            .set(seriesChannelKey, id)
            .set(REDIS_KEYS.channelSeries(id), seriesId),
      });

      if (await this.clientService.channelExists(channelId)) {
        return channelId;
      }

      this.logger.warn(
        `Channel ${channelId} of series ${seriesId} no longer exists on Discord, unmapping it`,
      );
      await this.unmapIfCurrent(seriesChannelKey, channelId, (multi) =>
        multi
          .del(seriesChannelKey)
          .del(REDIS_KEYS.channelSeries(channelId))
          .srem(REDIS_KEYS.DISCORD_CHANNELS, channelId),
      );
    }
    throw new Error('Channel sync failed, max retries reached');
  }

  private async syncRole(
    name: string,
    isHostRole: boolean,
    channelId: string,
  ): Promise<string> {
    const channelRoleKey = REDIS_KEYS.channelRole(channelId, isHostRole);
    const rolesSetKey = REDIS_KEYS.rolesSet(isHostRole);
    for (let attempt = 0; attempt <= MAX_STALE_RETRIES; attempt++) {
      const roleId = await this.claim({
        label: isHostRole ? 'host role' : 'role',
        claimKey: channelRoleKey,
        orphanSetKey: REDIS_KEYS.ORPHANED_DISCORD_ROLES,
        create: () => this.clientService.createRole(name),
        destroy: (id) => this.clientService.deleteRole(id),
        register: (multi, id) =>
          multi
            .sadd(rolesSetKey, id)
            .set(channelRoleKey, id)
            .set(REDIS_KEYS.roleChannel(id, isHostRole), channelId),
      });

      if (await this.clientService.roleExists(roleId)) {
        return roleId;
      }

      this.logger.warn(
        `Role ${roleId} of channel ${channelId} no longer exists on Discord, unmapping it`,
      );
      await this.unmapIfCurrent(channelRoleKey, roleId, (multi) =>
        multi
          .del(channelRoleKey)
          .del(REDIS_KEYS.roleChannel(roleId, isHostRole))
          .srem(rolesSetKey, roleId),
      );
    }
    throw new Error('Role sync failed, max retries reached');
  }

  /**
   * Return the object mapped under `claimKey`, creating and claiming a new
   * one when there is none. When another writer claimed the key first,
   * the object created here is deleted again (or recorded as orphaned)
   * and the winner's id is returned.
   */
  private async claim(spec: ClaimSpec): Promise<string> {
    const existing = await this.redis.get(spec.claimKey);
    if (existing) return existing;

    const created = await spec.create();
    this.logger.log(`Created ${spec.label} ${created.id} "${created.name}"`);

    const state: { winner: string | null } = { winner: null };
    let committed: boolean;
    try {
      const outcome = await watchedTransaction(
        this.redis,
        [spec.claimKey],
        async (conn) => {
          const current = await conn.get(spec.claimKey);
          if (current) {
            state.winner = current;
            return null;
          }
          return spec.register(conn.multi(), created.id);
        },
      );
      committed = outcome.committed;
    } catch (error) {
      await this.discard(spec, created.id);
      throw error;
    }

    if (committed) {
      this.logger.log(`Persisted new ${spec.label} ${created.id}`);
      return created.id;
    }

    await this.discard(spec, created.id);
    if (!state.winner) {
      throw new Error(`Lost the claim on ${spec.claimKey} without a winner`);
    }
    return state.winner;
  }

  private async discard(spec: ClaimSpec, id: string): Promise<void> {
    try {
      await spec.destroy(id);
      this.logger.log(`Deleted temporary ${spec.label} ${id}`);
    } catch (error) {
      this.logger.warn(
        `Could not delete temporary ${spec.label} ${id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      try {
        await this.redis.sadd(spec.orphanSetKey, id);
        this.logger.log(`Recorded orphaned ${spec.label} ${id}`);
      } catch (redisError) {
        this.logger.error(`Could not record orphaned ${spec.label} ${id}:`, redisError);
      }
    }
  }

  /** Run `unmap` only if `key` still points at `id` */
  private async unmapIfCurrent(
    key: string,
    id: string,
    unmap: (multi: ChainableCommander) => ChainableCommander,
  ): Promise<void> {
    await watchedTransaction(this.redis, [key], async (conn) => {
      if ((await conn.get(key)) !== id) return null;
      return unmap(conn.multi());
    });
  }

  // ─── Permissions ──────────────────────────────────────────────────

  /** `@everyone` cannot see the channel, the bot can */
  private privateChannelOverwrites(botId: string): ChannelPermissionOverwrite[] {
    return [
      {
        // The @everyone role shares the guild's id
        id: this.clientService.getGuildId(),
        type: 'role',
        allow: [],
        deny: ['ViewChannel'],
      },
      { id: botId, type: 'member', allow: ['ViewChannel'], deny: [] },
    ];
  }

  /**
   * Set the overwrites the bot owns. Overwrites added by hand for other
   * roles or members stay as they are.
   */
  private async syncChannelPermissions(
    channelId: string,
    roleId: string,
    hostRoleId: string,
    botId: string,
  ): Promise<void> {
    const overwrites: ChannelPermissionOverwrite[] = [
      ...this.privateChannelOverwrites(botId),
      {
        id: roleId,
        type: 'role',
        allow: ['ViewChannel', 'MentionEveryone'],
        deny: [],
      },
      {
        id: hostRoleId,
        type: 'role',
        allow: ['ViewChannel', 'MentionEveryone', 'ManageMessages'],
        deny: [],
      },
    ];
    for (const overwrite of overwrites) {
      await this.clientService.setPermissionOverwrite(channelId, overwrite);
    }
  }

  // ─── Role assignment ──────────────────────────────────────────────

  /** Meetup users of the series' events (hosts only, for host roles) */
  private async seriesMeetupUsers(
    seriesId: string,
    hostsOnly: boolean,
  ): Promise<string[]> {
    const eventIds = await this.redis.smembers(REDIS_KEYS.seriesEvents(seriesId));
    if (eventIds.length === 0) return [];
    return this.redis.sunion(
      ...eventIds.map((eventId) =>
        hostsOnly ? REDIS_KEYS.eventHosts(eventId) : REDIS_KEYS.eventUsers(eventId),
      ),
    );
  }

  /** Discord ids linked to the given Meetup ids; unlinked users are dropped */
  private async linkedDiscordIds(meetupIds: string[]): Promise<string[]> {
    if (meetupIds.length === 0) return [];
    const discordIds = await this.redis.mget(
      ...meetupIds.map((id) => REDIS_KEYS.meetupUserDiscordUser(id)),
    );
    return discordIds.filter((id): id is string => id !== null);
  }

  private async syncRoleAssignments(
    seriesId: string,
    channelId: string,
    roleId: string,
    isHostRole: boolean,
  ): Promise<void> {
    const discordIds = await this.linkedDiscordIds(
      await this.seriesMeetupUsers(seriesId, isHostRole),
    );
    // Users removed by hand do not get their role back; a removed player
    // does not get the host role either
    const ignored = new Set(
      isHostRole
        ? await this.redis.sunion(
            REDIS_KEYS.channelRemovedHosts(channelId),
            REDIS_KEYS.channelRemovedUsers(channelId),
          )
        : await this.redis.smembers(REDIS_KEYS.channelRemovedUsers(channelId)),
    );
    await this.assignRole(
      discordIds.filter((id) => !ignored.has(id)),
      roleId,
    );
  }

  private async syncGameMasterRole(seriesId: string): Promise<void> {
    const gameMasterRoleId = this.configService.get(
      'DISCORD_GAME_MASTER_ROLE_ID',
      { infer: true },
    );
    if (!gameMasterRoleId) return;
    const hostIds = await this.linkedDiscordIds(
      await this.seriesMeetupUsers(seriesId, true),
    );
    await this.assignRole(hostIds, gameMasterRoleId);
  }

  /** Give `roleId` to each user lacking it. Failures are per user. */
  private async assignRole(discordIds: string[], roleId: string): Promise<void> {
    for (const discordId of discordIds) {
      try {
        if (await this.clientService.memberHasRole(discordId, roleId)) continue;
        await this.clientService.addMemberRole(discordId, roleId);
        this.logger.log(`Assigned user ${discordId} to role ${roleId}`);
      } catch (error) {
        this.logger.warn(
          `Could not assign user ${discordId} to role ${roleId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }
  }

  // ─── Topic and category ───────────────────────────────────────────

  private categoryFor(seriesId: string, type: string | null): string | undefined {
    const campaignCategory = this.configService.get(
      'DISCORD_CAMPAIGN_CATEGORY_ID',
      { infer: true },
    );
    const parsed = EventSeriesTypeSchema.safeParse(type);
    if (!parsed.success) {
      this.logger.error(
        `Event series ${seriesId} has neither type 'campaign' nor 'adventure'`,
      );
      return campaignCategory;
    }
    return parsed.data === 'adventure'
      ? this.configService.get('DISCORD_ONE_SHOT_CATEGORY_ID', { infer: true })
      : campaignCategory;
  }

  private async syncTopicAndCategory(
    seriesId: string,
    channelId: string,
    nextEvent: SeriesEvent,
  ): Promise<void> {
    const topic = `Next session: ${nextEvent.link}`;
    const category = this.categoryFor(
      seriesId,
      await this.redis.get(REDIS_KEYS.seriesType(seriesId)),
    );

    const current = await this.clientService.getTextChannelState(channelId);
    if (!current) {
      this.logger.warn(`Channel ${channelId} is not a text channel, skipping topic`);
      return;
    }

    const topicChanged = current.topic !== topic;
    const categoryChanged = category !== undefined && current.parentId !== category;
    if (topicChanged || categoryChanged) {
      await this.clientService.editTextChannel(channelId, {
        topic,
        parentId: category,
      });
    }
  }
}
