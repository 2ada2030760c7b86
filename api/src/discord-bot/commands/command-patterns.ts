/** A user mention, `<@id>` or the nickname form `<@!id>` */
const MENTION_PATTERN = '<@!?(?<mentionId>[0-9]+)>';

export type ParsedCommand =
  | { kind: 'link-meetup' }
  | { kind: 'link-meetup-organizer'; discordId: string; meetupId: string }
  | { kind: 'unlink-meetup' }
  | { kind: 'unlink-meetup-organizer'; discordId: string }
  | { kind: 'sync-meetup' }
  | { kind: 'sync-discord' }
  | { kind: 'remind-expiration' }
  | { kind: 'add-user'; discordId: string }
  | { kind: 'add-host'; discordId: string }
  | { kind: 'remove-user'; discordId: string }
  | { kind: 'remove-host'; discordId: string }
  | { kind: 'close-channel' }
  | { kind: 'stop' }
  | { kind: 'help' };

export type CommandKind = ParsedCommand['kind'];

interface CommandPattern {
  /** Builds the command from a successful match */
  build: (groups: Record<string, string>) => ParsedCommand;
  dm: RegExp | null;
  mention: RegExp;
}

/**
 * Text command grammar. Compiled once per bot user id, since every
 * mention-form pattern is anchored on the bot's own mention.
 *
 * Patterns are tried in declaration order; the first match wins.
 */
export class CommandPatterns {
  /** Canonical mention of the bot, used in help and hint texts */
  readonly botMention: string;
  private readonly mentionPrefix: RegExp;
  private readonly patterns: CommandPattern[];

  constructor(botId: string) {
    this.botMention = `<@${botId}>`;
    const bot = `<@!?${botId}>`;
    this.mentionPrefix = new RegExp(`^${bot}`);

    const dmAndMention = (body: string, flags = '') => ({
      dm: new RegExp(`^${body}\\s*$`, flags),
      mention: new RegExp(`^${bot}\\s+${body}\\s*$`, flags),
    });
    const mentionOnly = (body: string, flags = '') => ({
      dm: null,
      mention: new RegExp(`^${bot}\\s+${body}\\s*$`, flags),
    });

    this.patterns = [
      {
        build: () => ({ kind: 'stop' }),
        ...dmAndMention('stop', 'i'),
      },
      {
        build: () => ({ kind: 'link-meetup' }),
        ...dmAndMention('link[ -]?meetup'),
      },
      {
        build: (g) => ({
          kind: 'link-meetup-organizer',
          discordId: g.mentionId,
          meetupId: g.meetupId,
        }),
        ...dmAndMention(
          `link[ -]?meetup\\s+${MENTION_PATTERN}\\s+(?<meetupId>[0-9]+)`,
        ),
      },
      {
        build: () => ({ kind: 'unlink-meetup' }),
        ...dmAndMention('unlink[ -]?meetup'),
      },
      {
        build: (g) => ({ kind: 'unlink-meetup-organizer', discordId: g.mentionId }),
        ...dmAndMention(`unlink[ -]?meetup\\s+${MENTION_PATTERN}`),
      },
      {
        build: () => ({ kind: 'sync-meetup' }),
        ...mentionOnly('sync\\s+meetup'),
      },
      {
        build: () => ({ kind: 'sync-discord' }),
        ...mentionOnly('sync\\s+discord'),
      },
      {
        build: () => ({ kind: 'remind-expiration' }),
        ...mentionOnly('remind\\s+expiration', 'i'),
      },
      {
        build: (g) => ({ kind: 'add-user', discordId: g.mentionId }),
        ...mentionOnly(`add\\s+${MENTION_PATTERN}`),
      },
      {
        build: (g) => ({ kind: 'add-host', discordId: g.mentionId }),
        ...mentionOnly(`add\\s+host\\s+${MENTION_PATTERN}`),
      },
      {
        build: (g) => ({ kind: 'remove-user', discordId: g.mentionId }),
        ...mentionOnly(`remove\\s+${MENTION_PATTERN}`),
      },
      {
        build: (g) => ({ kind: 'remove-host', discordId: g.mentionId }),
        ...mentionOnly(`remove\\s+host\\s+${MENTION_PATTERN}`),
      },
      {
        build: () => ({ kind: 'close-channel' }),
        ...mentionOnly('close\\s+channel', 'i'),
      },
      {
        build: () => ({ kind: 'help' }),
        ...dmAndMention('help', 'i'),
      },
    ];
  }

  /** Whether the message is addressed to the bot by a leading mention */
  startsWithBotMention(content: string): boolean {
    return this.mentionPrefix.test(content);
  }

  /**
   * Parse a message. `isDm` selects the DM grammar, where the leading bot
   * mention is optional; pass `false` for a DM that starts with a mention.
   * @returns the command, or null when nothing matches
   */
  parse(content: string, isDm: boolean): ParsedCommand | null {
    for (const pattern of this.patterns) {
      const regex = isDm ? pattern.dm : pattern.mention;
      if (!regex) continue;
      const match = regex.exec(content);
      if (match) {
        return pattern.build(match.groups ?? {});
      }
    }
    return null;
  }
}
