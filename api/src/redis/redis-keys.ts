/**
 * Redis key layout. Every id is a decimal string; Discord snowflakes do
 * not fit in a JS number.
 */
export const REDIS_KEYS = {
  DISCORD_USERS: 'discord_users',
  MEETUP_USERS: 'meetup_users',
  EVENT_SERIES: 'event_series',
  DISCORD_CHANNELS: 'discord_channels',
  DISCORD_ROLES: 'discord_roles',
  DISCORD_HOST_ROLES: 'discord_host_roles',
  ORPHANED_DISCORD_ROLES: 'orphaned_discord_roles',
  ORPHANED_DISCORD_CHANNELS: 'orphaned_discord_channels',

  discordUserMeetupUser: (discordId: string) =>
    `discord_user:${discordId}:meetup_user`,
  meetupUserDiscordUser: (meetupId: string) =>
    `meetup_user:${meetupId}:discord_user`,
  linkingDiscordUser: (linkingId: string) =>
    `meetup_linking:${linkingId}:discord_user`,

  seriesEvents: (seriesId: string) => `event_series:${seriesId}:meetup_events`,
  seriesType: (seriesId: string) => `event_series:${seriesId}:type`,
  seriesChannel: (seriesId: string) =>
    `event_series:${seriesId}:discord_channel`,

  event: (eventId: string) => `meetup_event:${eventId}`,
  eventSeries: (eventId: string) => `meetup_event:${eventId}:event_series`,
  eventUsers: (eventId: string) => `meetup_event:${eventId}:meetup_users`,
  eventHosts: (eventId: string) => `meetup_event:${eventId}:meetup_hosts`,

  channelSeries: (channelId: string) =>
    `discord_channel:${channelId}:event_series`,
  channelRole: (channelId: string, isHostRole: boolean) =>
    isHostRole
      ? `discord_channel:${channelId}:discord_host_role`
      : `discord_channel:${channelId}:discord_role`,
  channelRemovedUsers: (channelId: string) =>
    `discord_channel:${channelId}:removed_users`,
  channelRemovedHosts: (channelId: string) =>
    `discord_channel:${channelId}:removed_hosts`,
  channelExpirationTime: (channelId: string) =>
    `discord_channel:${channelId}:expiration_time`,
  channelDeletionTime: (channelId: string) =>
    `discord_channel:${channelId}:deletion_time`,
  channelLastReminderTime: (channelId: string) =>
    `discord_channel:${channelId}:last_expiration_reminder_time`,

  roleChannel: (roleId: string, isHostRole: boolean) =>
    isHostRole
      ? `discord_host_role:${roleId}:discord_channel`
      : `discord_role:${roleId}:discord_channel`,
  rolesSet: (isHostRole: boolean) =>
    isHostRole ? 'discord_host_roles' : 'discord_roles',
} as const;
