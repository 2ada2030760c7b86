import { z } from 'zod';

/** Discord ids are 64-bit snowflakes: keep them as strings, never numbers. */
export const SnowflakeSchema = z.string().regex(/^\d{17,20}$/, 'Expected a Discord snowflake id');

/** Treat empty env values (`FOO=`) as unset so `.optional()` and `.default()` apply. */
const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalSnowflake = z.preprocess(blankToUndefined, SnowflakeSchema.optional());
const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());

/**
 * Process environment of the bot.
 * Validated once at boot by ConfigModule; an invalid environment aborts startup.
 */
export const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    /** Enables debug/verbose log levels and PERF lines */
    DEBUG: z.preprocess(blankToUndefined, z.enum(['true', 'false']).default('false')),

    /** Address of the HTTP listener. nginx proxies to it, so keep it on loopback. */
    HOST: z.preprocess(blankToUndefined, z.string().default('127.0.0.1')),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
    /** Public origin nginx serves the bot under; used to build linking URLs */
    PUBLIC_URL: z.preprocess(
        blankToUndefined,
        z.string().url().default('https://bot.swissrpg.ch'),
    ),
    THROTTLE_DEFAULT_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(60)),

    REDIS_URL: z.preprocess(blankToUndefined, z.string().default('redis://localhost:6379')),

    DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
    DISCORD_GUILD_ID: SnowflakeSchema,
    DISCORD_ORGANIZER_ROLE_ID: SnowflakeSchema,
    DISCORD_GAME_MASTER_ROLE_ID: optionalSnowflake,
    DISCORD_ONE_SHOT_CATEGORY_ID: optionalSnowflake,
    DISCORD_CAMPAIGN_CATEGORY_ID: optionalSnowflake,

    MEETUP_CLIENT_ID: optionalString,
    MEETUP_CLIENT_SECRET: optionalString,
    /** Organizer token used for API reads (profiles, events, RSVPs) */
    MEETUP_ACCESS_TOKEN: optionalString,
    MEETUP_GROUP_URLNAME: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;
