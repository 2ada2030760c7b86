import { Inject, Injectable, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { REDIS_CLIENT } from '../../redis/redis.module';
import { REDIS_KEYS } from '../../redis/redis-keys';
import type { CommandContext } from '../commands/command-context';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { STRINGS } from '../discord-bot.strings';

export interface ChannelRoles {
  /** Player role */
  user: string;
  host: string;
}

function parseTimestamp(value: string, key: string): number {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new Error(`Invalid timestamp "${value}" in ${key}`);
  }
  return time;
}

/**
 * Commands hosts and organizers use inside a bot-controlled game channel:
 * add/remove players and hosts, and close the channel.
 */
@Injectable()
export class ChannelAdminService {
  private readonly logger = new Logger(ChannelAdminService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly clientService: DiscordBotClientService,
  ) {}

  /**
   * Roles of a bot-controlled channel.
   * @returns null when the channel is not controlled by the bot
   * @throws when only one of the two roles is mapped
   */
  async getChannelRoles(channelId: string): Promise<ChannelRoles | null> {
    const [user, host] = await this.redis.mget(
      REDIS_KEYS.channelRole(channelId, false),
      REDIS_KEYS.channelRole(channelId, true),
    );
    if (user !== null && host !== null) return { user, host };
    if (user === null && host === null) return null;
    throw new Error(`Channel ${channelId} has only one of two roles`);
  }

  private async hasRoleOrFalse(
    check: () => Promise<boolean>,
    what: string,
  ): Promise<boolean> {
    try {
      return await check();
    } catch (error) {
      this.logger.warn(
        `Could not check ${what}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  /**
   * Resolve the channel's roles and check that the author may administrate
   * it, answering in the channel when not.
   */
  private async authorize(ctx: CommandContext): Promise<ChannelRoles | null> {
    const roles = await this.getChannelRoles(ctx.channelId);
    if (!roles) {
      await ctx.say(STRINGS.CHANNEL_NOT_BOT_CONTROLLED);
      return null;
    }
    const isOrganizer = await this.hasRoleOrFalse(
      () => this.clientService.isOrganizer(ctx.authorId),
      'organizer role',
    );
    const isHost =
      isOrganizer ||
      (await this.hasRoleOrFalse(
        () => this.clientService.memberHasRole(ctx.authorId, roles.host),
        'host role',
      ));
    if (!isHost) {
      await ctx.say(STRINGS.NOT_A_CHANNEL_ADMIN);
      return null;
    }
    return roles;
  }

  /** Give `discordId` the player role, and the host role when `asHost` */
  async addMember(
    ctx: CommandContext,
    discordId: string,
    asHost: boolean,
  ): Promise<void> {
    const roles = await this.authorize(ctx);
    if (!roles) return;

    try {
      await this.clientService.addMemberRole(discordId, roles.user);
      await ctx.say(STRINGS.channelWelcome(discordId));
    } catch (error) {
      this.logger.error('Could not assign channel role:', error);
      await ctx.say(STRINGS.CHANNEL_ROLE_ADD_ERROR);
    }

    if (asHost) {
      try {
        await this.clientService.addMemberRole(discordId, roles.host);
        await ctx.say(STRINGS.channelAddedNewHost(discordId));
      } catch (error) {
        this.logger.error('Could not assign host channel role:', error);
        await ctx.say(STRINGS.CHANNEL_ROLE_ADD_ERROR);
      }
    }
  }

  /**
   * Take the host role from `discordId`; unless `asHost`, the player role
   * too. The removal is remembered so the next sync does not undo it.
   */
  async removeMember(
    ctx: CommandContext,
    discordId: string,
    asHost: boolean,
  ): Promise<void> {
    const roles = await this.authorize(ctx);
    if (!roles) return;

    try {
      await this.clientService.removeMemberRole(discordId, roles.host);
    } catch (error) {
      this.logger.error('Could not remove host channel role:', error);
      await ctx.say(STRINGS.CHANNEL_ROLE_REMOVE_ERROR);
    }
    if (!asHost) {
      try {
        await this.clientService.removeMemberRole(discordId, roles.user);
      } catch (error) {
        this.logger.error('Could not remove channel role:', error);
        await ctx.say(STRINGS.CHANNEL_ROLE_REMOVE_ERROR);
      }
    }

    const removedKey = asHost
      ? REDIS_KEYS.channelRemovedHosts(ctx.channelId)
      : REDIS_KEYS.channelRemovedUsers(ctx.channelId);
    await this.redis.sadd(removedKey, discordId);
  }

  /**
   * Mark the channel for deletion. Only possible once the channel's
   * expiration time has passed.
   */
  async closeChannel(ctx: CommandContext): Promise<void> {
    const roles = await this.authorize(ctx);
    if (!roles) return;

    const expirationKey = REDIS_KEYS.channelExpirationTime(ctx.channelId);
    const deletionKey = REDIS_KEYS.channelDeletionTime(ctx.channelId);
    const [expiration, deletion] = await this.redis.mget(
      expirationKey,
      deletionKey,
    );

    const now = Date.now();
    if (expiration !== null && parseTimestamp(expiration, expirationKey) > now) {
      await ctx.say(STRINGS.CHANNEL_NOT_YET_CLOSEABLE);
      return;
    }
    if (deletion !== null) {
      await ctx.say(STRINGS.CHANNEL_ALREADY_MARKED_FOR_CLOSING);
      return;
    }

    await this.redis.set(deletionKey, new Date(now).toISOString());
    this.logger.log(`Channel ${ctx.channelId} marked for deletion`);
    await ctx.say(STRINGS.CHANNEL_MARKED_FOR_CLOSING);
  }
}
