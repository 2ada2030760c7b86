import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'node:crypto';
import type Redis from 'ioredis';
import { REDIS_CLIENT } from '../redis/redis.module';
import { REDIS_KEYS } from '../redis/redis-keys';
import { watchedTransaction } from '../redis/redis-transaction';

/** Linking sessions expire after 10 minutes */
export const LINKING_SESSION_TTL = 10 * 60;

export type LinkResult =
  | { status: 'linked' }
  | { status: 'discord-already-linked'; meetupId: string }
  | { status: 'meetup-already-linked'; discordId: string };

/**
 * Discord <-> Meetup account links and the short-lived sessions of the
 * OAuth linking flow.
 *
 * Both directions of a link are written and removed in one MULTI, so a
 * Discord id maps to a Meetup id exactly when the reverse mapping exists.
 */
@Injectable()
export class LinkingService {
  private readonly logger = new Logger(LinkingService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async getLinkedMeetupId(discordId: string): Promise<string | null> {
    return this.redis.get(REDIS_KEYS.discordUserMeetupUser(discordId));
  }

  async getLinkedDiscordId(meetupId: string): Promise<string | null> {
    return this.redis.get(REDIS_KEYS.meetupUserDiscordUser(meetupId));
  }

  /**
   * Link both accounts, unless either side is linked already.
   * Checked and written under WATCH, so two concurrent links of the same
   * account cannot both succeed.
   */
  async link(discordId: string, meetupId: string): Promise<LinkResult> {
    const d2m = REDIS_KEYS.discordUserMeetupUser(discordId);
    const m2d = REDIS_KEYS.meetupUserDiscordUser(meetupId);
    const state: { conflict: LinkResult | null } = { conflict: null };

    const outcome = await watchedTransaction(
      this.redis,
      [d2m, m2d],
      async (conn) => {
        const [linkedMeetupId, linkedDiscordId] = await conn.mget(d2m, m2d);
        if (linkedMeetupId !== null) {
          state.conflict = {
            status: 'discord-already-linked',
            meetupId: linkedMeetupId,
          };
          return null;
        }
        if (linkedDiscordId !== null) {
          state.conflict = {
            status: 'meetup-already-linked',
            discordId: linkedDiscordId,
          };
          return null;
        }
        state.conflict = null;
        return conn
          .multi()
          .sadd(REDIS_KEYS.MEETUP_USERS, meetupId)
          .sadd(REDIS_KEYS.DISCORD_USERS, discordId)
          .set(d2m, meetupId)
          .set(m2d, discordId);
      },
    );

    if (outcome.committed) {
      this.logger.log(
        `Linked Discord user ${discordId} to Meetup user ${meetupId}`,
      );
      return { status: 'linked' };
    }
    if (!state.conflict) {
      throw new Error('Link transaction aborted without a conflict');
    }
    return state.conflict;
  }

  /**
   * Remove the link of a Discord user in both directions.
   * @returns the Meetup id that was linked, or null if there was none
   */
  async unlink(discordId: string): Promise<string | null> {
    const d2m = REDIS_KEYS.discordUserMeetupUser(discordId);
    const state: { meetupId: string | null } = { meetupId: null };

    await watchedTransaction(this.redis, [d2m], async (conn) => {
      const meetupId = await conn.get(d2m);
      state.meetupId = meetupId;
      if (meetupId === null) return null;
      return conn
        .multi()
        .del(d2m, REDIS_KEYS.meetupUserDiscordUser(meetupId))
        .srem(REDIS_KEYS.DISCORD_USERS, discordId)
        .srem(REDIS_KEYS.MEETUP_USERS, meetupId);
    });

    if (state.meetupId !== null) {
      this.logger.log(
        `Unlinked Discord user ${discordId} from Meetup user ${state.meetupId}`,
      );
    }
    return state.meetupId;
  }

  /** Start a linking session for a Discord user and return its id */
  async createLinkingSession(discordId: string): Promise<string> {
    const linkingId = randomBytes(16).toString('hex');
    await this.redis.set(
      REDIS_KEYS.linkingDiscordUser(linkingId),
      discordId,
      'EX',
      LINKING_SESSION_TTL,
    );
    return linkingId;
  }

  /** Discord user of a pending session, without consuming it */
  async peekLinkingSession(linkingId: string): Promise<string | null> {
    return this.redis.get(REDIS_KEYS.linkingDiscordUser(linkingId));
  }

  /**
   * Consume a session (single use).
   * @returns the Discord user it belonged to, or null if unknown or expired
   */
  async consumeLinkingSession(linkingId: string): Promise<string | null> {
    return this.redis.getdel(REDIS_KEYS.linkingDiscordUser(linkingId));
  }
}
