import { Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { StoredEventSchema } from '@swissrpg-bot/contract';
import { REDIS_KEYS } from '../redis/redis-keys';

const logger = new Logger('EventSeries');

/** Leading part of an event name, up to the first `[` or `(` */
const EVENT_NAME_PATTERN = /^\s*(?<name>[^[(]+[^\s[(])/;

export const SERIES_NAME_MIN_LENGTH = 2;
export const SERIES_NAME_MAX_LENGTH = 80;

export interface SeriesEvent {
  id: string;
  name: string;
  time: Date;
  link: string;
}

/**
 * Name of a series, taken from the name of one of its events:
 * "Curse of Strahd [Session 4]" becomes "Curse of Strahd".
 * @throws when no name can be extracted or it does not fit a channel name
 */
export function seriesNameFromEventName(eventName: string): string {
  const name = EVENT_NAME_PATTERN.exec(eventName)?.groups?.name;
  if (!name) {
    throw new Error(
      `Could not extract a series name from the event "${eventName}"`,
    );
  }
  // Discord counts characters, not UTF-16 code units
  const characters = [...name].length;
  if (
    characters < SERIES_NAME_MIN_LENGTH ||
    characters > SERIES_NAME_MAX_LENGTH
  ) {
    throw new Error(`Channel name "${name}" is too short or too long`);
  }
  return name;
}

/**
 * Events of a series as stored in Redis. Events whose hash is missing or
 * malformed are logged and left out.
 */
export async function loadSeriesEvents(
  redis: Redis,
  seriesId: string,
): Promise<SeriesEvent[]> {
  const eventIds = await redis.smembers(REDIS_KEYS.seriesEvents(seriesId));
  const events: SeriesEvent[] = [];
  for (const eventId of eventIds) {
    const parsed = StoredEventSchema.safeParse(
      await redis.hgetall(REDIS_KEYS.event(eventId)),
    );
    if (!parsed.success) {
      logger.warn(
        `Skipping event ${eventId} of series ${seriesId}: ${parsed.error.issues[0]?.message ?? 'invalid record'}`,
      );
      continue;
    }
    events.push({
      id: eventId,
      name: parsed.data.name,
      time: new Date(parsed.data.time),
      link: parsed.data.link,
    });
  }
  return events;
}

/** Events after `now`, soonest first */
export function upcomingEvents(
  events: SeriesEvent[],
  now: number,
): SeriesEvent[] {
  return events
    .filter((event) => event.time.getTime() > now)
    .sort((a, b) => a.time.getTime() - b.time.getTime());
}
