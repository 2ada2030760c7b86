export const DISCORD_BOT_EVENTS = {
  CONNECTED: 'discord-bot.connected',
  DISCONNECTED: 'discord-bot.disconnected',
  ERROR: 'discord-bot.error',
} as const;

/**
 * Background work requested from Discord commands.
 * Emitted by CommandRouterService, consumed by the queue listeners of the
 * sync modules.
 */
export const SYNC_REQUEST_EVENTS = {
  DISCORD: 'sync.discord.requested',
  MEETUP: 'sync.meetup.requested',
  END_OF_GAME: 'sync.end-of-game.requested',
} as const;

export interface SyncRequestPayload {
  /** Discord id of the organizer who asked */
  requestedBy: string;
}

/** Accent colors for Discord embeds, as decimal values for discord.js. */
export const EMBED_COLORS = {
  /** Welcome DM, #FF1744 */
  WELCOME: 0xff1744,
  /** Account linked, #34d399 */
  LINKED: 0x34d399,
} as const;

/** Reaction used to acknowledge a command that was answered by DM */
export const ACK_REACTION = '\u{2705}';

/**
 * Convert Discord.js errors into operator-friendly messages.
 * Used when logging connection failures at startup.
 */
export function friendlyDiscordErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return 'Failed to connect with provided token';
  const raw = error.message;

  if (
    /disallowed intent|privileged intent/i.test(raw) ||
    ('code' in error && error.code === 4014)
  ) {
    return 'Missing required privileged intent: Server Members or Message Content. Enable both in the Discord Developer Portal under Bot > Privileged Gateway Intents.';
  }
  if (/invalid token|TOKEN_INVALID/i.test(raw)) {
    return 'Invalid bot token. Check DISCORD_TOKEN.';
  }
  if (/getaddrinfo|ENOTFOUND/i.test(raw)) {
    return 'Unable to reach Discord servers. Check your internet connection.';
  }
  if (/ECONNREFUSED/i.test(raw)) {
    return 'Connection to Discord was refused. Try again in a few moments.';
  }

  return 'Failed to connect with provided token';
}
