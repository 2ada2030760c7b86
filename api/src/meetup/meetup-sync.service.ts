import { Inject, Injectable, Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import type {
  EventSeriesType,
  MeetupEvent,
  MeetupRsvp,
  StoredEvent,
} from '@swissrpg-bot/contract';
import { REDIS_CLIENT } from '../redis/redis.module';
import { REDIS_KEYS } from '../redis/redis-keys';
import { MeetupClientService } from './meetup-client.service';

export const MEETUP_SYNC_TIMEOUT_MS = 60_000;

/** `[series:<id>]` in an event description puts the event into that series */
const SERIES_TAG_PATTERN = /\[series:\s*(?<id>[\w-]+)\s*\]/i;
const CAMPAIGN_TAG_PATTERN = /\[campaign\]/i;

export function seriesTypeOf(event: MeetupEvent): EventSeriesType {
  return CAMPAIGN_TAG_PATTERN.test(event.description ?? '')
    ? 'campaign'
    : 'adventure';
}

export function seriesTagOf(event: MeetupEvent): string | null {
  return SERIES_TAG_PATTERN.exec(event.description ?? '')?.groups?.id ?? null;
}

export function toStoredEvent(event: MeetupEvent): StoredEvent {
  return {
    time: new Date(event.time).toISOString(),
    name: event.name,
    link: event.link,
  };
}

/**
 * Copies the group's upcoming events and their RSVPs from Meetup into
 * Redis, where the Discord sync picks them up.
 */
@Injectable()
export class MeetupSyncService {
  private readonly logger = new Logger(MeetupSyncService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    private readonly meetupClient: MeetupClientService,
  ) {}

  /**
   * @throws when the event list cannot be fetched, or once all events ran
   * if any of them failed
   */
  async syncAll(
    signal: AbortSignal = AbortSignal.timeout(MEETUP_SYNC_TIMEOUT_MS),
  ): Promise<{ events: number }> {
    const events = await this.meetupClient.getUpcomingEvents(signal);
    const failed: string[] = [];
    for (const event of events) {
      try {
        await this.syncEvent(event, signal);
      } catch (error) {
        failed.push(event.id);
        this.logger.error(
          `Syncing Meetup event ${event.id} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }

    if (failed.length > 0) {
      throw new Error(
        `Meetup sync failed for ${failed.length} of ${events.length} events: ${failed.join(', ')}`,
      );
    }
    return { events: events.length };
  }

  async syncEvent(event: MeetupEvent, signal?: AbortSignal): Promise<void> {
    const rsvps = await this.meetupClient.getRsvps(event.id, signal);
    const seriesId = await this.seriesIdFor(event);
    const { users, hosts } = splitRsvps(rsvps);

    const usersKey = REDIS_KEYS.eventUsers(event.id);
    const hostsKey = REDIS_KEYS.eventHosts(event.id);
    const multi = this.redis
      .multi()
      .hset(REDIS_KEYS.event(event.id), { ...toStoredEvent(event) })
      .set(REDIS_KEYS.eventSeries(event.id), seriesId)
      .sadd(REDIS_KEYS.seriesEvents(seriesId), event.id)
      .set(REDIS_KEYS.seriesType(seriesId), seriesTypeOf(event))
      .sadd(REDIS_KEYS.EVENT_SERIES, seriesId)
      .del(usersKey, hostsKey);
    if (users.length > 0) multi.sadd(usersKey, ...users);
    if (hosts.length > 0) multi.sadd(hostsKey, ...hosts);

    const replies = await multi.exec();
    const failure = replies?.find(([error]) => error !== null)?.[0];
    if (failure) throw failure;

    this.logger.debug(
      `Synced Meetup event ${event.id} into series ${seriesId} (${users.length} users, ${hosts.length} hosts)`,
    );
  }

  /** An event keeps the series it was first put in */
  private async seriesIdFor(event: MeetupEvent): Promise<string> {
    const existing = await this.redis.get(REDIS_KEYS.eventSeries(event.id));
    return existing ?? seriesTagOf(event) ?? event.id;
  }
}

/** Members who said yes; hosts among everyone who answered */
function splitRsvps(rsvps: MeetupRsvp[]): { users: string[]; hosts: string[] } {
  const users = rsvps
    .filter((rsvp) => rsvp.response === 'yes')
    .map((rsvp) => rsvp.member.id);
  const hosts = rsvps
    .filter((rsvp) => rsvp.member.event_context?.host === true)
    .map((rsvp) => rsvp.member.id);
  return { users, hosts };
}
