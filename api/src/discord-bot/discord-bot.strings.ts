/**
 * User-facing texts of the bot. Functions take the values they
 * interpolate; mentions are passed as raw ids.
 */
export const STRINGS = {
  INVALID_COMMAND:
    "Sorry, I didn't get that. Write `help` in a DM to me to see what I can do.",
  NOT_AN_ORGANISER: 'Only organisers can do this.',
  NOT_A_CHANNEL_ADMIN: 'Only organisers and the hosts of this channel can do this.',
  UNSPECIFIED_ERROR: 'Something went wrong. The organisers have been notified.',

  meetupLinking: (url: string) =>
    `Hi! Follow this link to connect your Meetup profile:\n${url}\n` +
    'The link is valid for ten minutes and can only be used once.',
  DM_FAILED: 'There was an error trying to send you instructions.',
  discordAlreadyLinked: (meetupName: string, botId: string) =>
    `You are already linked to ${meetupName}'s Meetup account. ` +
    `If you want to change this, unlink your account first by writing:\n<@${botId}> unlink meetup`,
  discordAlreadyLinkedUnknownName: (botId: string) =>
    'You are already linked to a Meetup account. ' +
    `If you want to change this, unlink your account first by writing:\n<@${botId}> unlink meetup`,
  nonexistentMeetupLinked: (botId: string) =>
    'You are linked to a Meetup account that does not seem to exist anymore. ' +
    `Unlink it by writing:\n<@${botId}> unlink meetup\nand link your current account afterwards.`,

  INVALID_DISCORD_OR_MEETUP_ID:
    'Seems like the specified Discord or Meetup ID is invalid',
  INVALID_DISCORD_ID: 'Seems like the specified Discord ID is invalid',
  alreadyLinkedToSameMeetup: (discordId: string) =>
    `All good, this Meetup account was already linked to <@${discordId}>`,
  alreadyLinkedToOtherMeetup: (discordId: string, botMention: string) =>
    `<@${discordId}> is already linked to a different Meetup account. ` +
    'If you want to change this, unlink the currently linked Meetup account first by writing:\n' +
    `${botMention} unlink meetup <@${discordId}>`,
  meetupLinkedToOther: (linkedDiscordId: string, botMention: string) =>
    `This Meetup account is already linked to <@${linkedDiscordId}>. ` +
    'If you want to change this, unlink the Meetup account first by writing:\n' +
    `${botMention} unlink meetup <@${linkedDiscordId}>`,
  MEETUP_PROFILE_NOT_FOUND: 'It looks like this Meetup profile does not exist',
  LINK_TIMING_ERROR: 'Could not assign meetup id (timing error)',
  LINKED_EMBED_TITLE: 'Linked Meetup account',
  linkedEmbedDescription: (discordId: string, meetupName: string) =>
    `Successfully linked <@${discordId}> to ${meetupName}'s Meetup account`,

  MEETUP_UNLINK_SUCCESS: 'Your Meetup account has been unlinked.',
  MEETUP_UNLINK_NOT_LINKED: 'There is no Meetup account linked to you.',
  organizerUnlinkSuccess: (discordId: string) =>
    `Unlinked <@${discordId}>'s Meetup account`,
  organizerUnlinkNotLinked: (discordId: string) =>
    `There was seemingly no meetup account linked to <@${discordId}>`,

  MEETUP_SYNC_STARTED: 'Started asynchronous Meetup synchronization task',
  DISCORD_SYNC_STARTED: 'Started Discord synchronization task',
  EXPIRATION_REMINDER_STARTED: 'Started expiration reminder task',
  taskSubmitFailed: (task: string, reason: string) =>
    `Could not submit the ${task} task to the queue (${reason})`,
  STOPPING: 'Shutting down. systemd will not restart me until someone starts the service again.',

  CHANNEL_NOT_BOT_CONTROLLED: "This channel is not managed by me, so I can't help here.",
  channelWelcome: (discordId: string) => `Welcome <@${discordId}>!`,
  channelAddedNewHost: (discordId: string) =>
    `<@${discordId}> is now a host of this channel.`,
  CHANNEL_ROLE_ADD_ERROR: 'Something went wrong assigning the channel role.',
  CHANNEL_ROLE_REMOVE_ERROR: 'Something went wrong removing the channel role.',
  CHANNEL_NOT_YET_CLOSEABLE:
    'This channel can only be closed after its last session has taken place.',
  CHANNEL_ALREADY_MARKED_FOR_CLOSING: 'This channel is already marked for closing.',
  CHANNEL_MARKED_FOR_CLOSING:
    'This channel is now marked for closing. It will be deleted shortly.',
  expirationReminder: (hostRoleId: string, botMention: string) =>
    `<@&${hostRoleId}> the last session of this game has taken place. ` +
    'If the game is over, close this channel by writing:\n' +
    `${botMention} close channel`,

  WELCOME_MESSAGE_PART1: 'Welcome to the SwissRPG Discord server!',
  WELCOME_MESSAGE_PART2_EMBED_TITLE: 'Link your Meetup account',
  welcomeMessagePart2EmbedContent: (botId: string) =>
    'Game channels on this server are created from our Meetup events. ' +
    'To get access to the channels of the games you signed up for, ' +
    `link your Meetup account by writing \`link meetup\` to <@${botId}> in a direct message.`,

  help: (botMention: string) =>
    [
      '**Everyone**',
      '`link meetup` (in a DM) connect your Meetup account',
      '`unlink meetup` (in a DM) disconnect it again',
      '',
      '**Hosts and organisers, in a game channel**',
      `\`${botMention} add @user\` / \`${botMention} add host @user\``,
      `\`${botMention} remove @user\` / \`${botMention} remove host @user\``,
      `\`${botMention} close channel\``,
      '',
      '**Organisers**',
      `\`${botMention} link meetup @user <meetup id>\`, \`${botMention} unlink meetup @user\``,
      `\`${botMention} sync meetup\`, \`${botMention} sync discord\`, \`${botMention} remind expiration\``,
      `\`${botMention} stop\``,
    ].join('\n'),
} as const;
