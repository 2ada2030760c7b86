import { Throttle } from '@nestjs/throttler';

/** Every throttler counts requests over one minute */
export const RATE_LIMIT_WINDOW_MS = 60_000;

/**
 * Per-route limits on top of THROTTLE_DEFAULT_LIMIT, in requests per
 * window and visitor. /health skips throttling altogether.
 */
export const RATE_LIMIT_TIERS = {
  /** DM'd linking URLs and the Meetup callback, opened by hand */
  linking: 10,
} as const;

export type RateLimitTier = keyof typeof RATE_LIMIT_TIERS;

/** `@RateLimit('linking')` on a controller method or class. */
export function RateLimit(
  tier: RateLimitTier,
): MethodDecorator & ClassDecorator {
  return Throttle({
    default: { ttl: RATE_LIMIT_WINDOW_MS, limit: RATE_LIMIT_TIERS[tier] },
  });
}
