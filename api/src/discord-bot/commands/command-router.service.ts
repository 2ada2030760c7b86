import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SnowflakeSchema } from '@swissrpg-bot/contract';
import { DiscordBotClientService } from '../discord-bot-client.service';
import {
  SYNC_REQUEST_EVENTS,
  type SyncRequestPayload,
} from '../discord-bot.constants';
import { STRINGS } from '../discord-bot.strings';
import { BotLifecycleService } from '../services/bot-lifecycle.service';
import { ChannelAdminService } from '../services/channel-admin.service';
import { MemberLinkingService } from '../services/member-linking.service';
import type { CommandContext } from './command-context';
import {
  CommandPatterns,
  type CommandKind,
  type ParsedCommand,
} from './command-patterns';

const ORGANIZER_ONLY: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'link-meetup-organizer',
  'unlink-meetup-organizer',
  'sync-meetup',
  'sync-discord',
  'remind-expiration',
  'stop',
]);

/** Meetup ids are positive 64-bit integers */
const MEETUP_ID_PATTERN = /^[0-9]{1,19}$/;

type SyncRequest = (typeof SYNC_REQUEST_EVENTS)[keyof typeof SYNC_REQUEST_EVENTS];

/**
 * Parses text commands and dispatches them to their handlers after the
 * permission and id checks every command shares.
 */
@Injectable()
export class CommandRouterService {
  private readonly logger = new Logger(CommandRouterService.name);
  private patterns: CommandPatterns | null = null;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly memberLinking: MemberLinkingService,
    private readonly channelAdmin: ChannelAdminService,
    private readonly lifecycle: BotLifecycleService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /** Grammar for the given bot id, compiled once */
  getPatterns(botId: string): CommandPatterns {
    if (!this.patterns || this.patterns.botMention !== `<@${botId}>`) {
      this.patterns = new CommandPatterns(botId);
    }
    return this.patterns;
  }

  private async isOrganizer(userId: string): Promise<boolean> {
    try {
      return await this.clientService.isOrganizer(userId);
    } catch (error) {
      this.logger.warn(
        `Could not check organizer role of ${userId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  /**
   * Run a parsed command. Handler errors propagate to the caller, which
   * answers with the generic error text.
   */
  async dispatch(
    ctx: CommandContext,
    command: ParsedCommand,
    botId: string,
  ): Promise<void> {
    const botMention = this.getPatterns(botId).botMention;

    if (ORGANIZER_ONLY.has(command.kind) && !(await this.isOrganizer(ctx.authorId))) {
      await ctx.say(STRINGS.NOT_AN_ORGANISER);
      return;
    }

    switch (command.kind) {
      case 'help':
        await ctx.say(STRINGS.help(botMention));
        return;
      case 'link-meetup':
        await this.memberLinking.linkSelf(ctx, botId);
        return;
      case 'link-meetup-organizer':
        if (
          !SnowflakeSchema.safeParse(command.discordId).success ||
          !MEETUP_ID_PATTERN.test(command.meetupId)
        ) {
          await ctx.say(STRINGS.INVALID_DISCORD_OR_MEETUP_ID);
          return;
        }
        await this.memberLinking.linkOther(
          ctx,
          command.discordId,
          command.meetupId,
          botMention,
        );
        return;
      case 'unlink-meetup':
        await this.memberLinking.unlink(ctx, ctx.authorId, false);
        return;
      case 'unlink-meetup-organizer':
        if (!SnowflakeSchema.safeParse(command.discordId).success) {
          await ctx.say(STRINGS.INVALID_DISCORD_ID);
          return;
        }
        await this.memberLinking.unlink(ctx, command.discordId, true);
        return;
      case 'sync-meetup':
        await this.requestSync(
          ctx,
          SYNC_REQUEST_EVENTS.MEETUP,
          'Meetup synchronization',
          STRINGS.MEETUP_SYNC_STARTED,
        );
        return;
      case 'sync-discord':
        await this.requestSync(
          ctx,
          SYNC_REQUEST_EVENTS.DISCORD,
          'Discord synchronization',
          STRINGS.DISCORD_SYNC_STARTED,
        );
        return;
      case 'remind-expiration':
        await this.requestSync(
          ctx,
          SYNC_REQUEST_EVENTS.END_OF_GAME,
          'expiration reminder',
          STRINGS.EXPIRATION_REMINDER_STARTED,
        );
        return;
      case 'add-user':
      case 'add-host':
      case 'remove-user':
      case 'remove-host': {
        if (!SnowflakeSchema.safeParse(command.discordId).success) {
          await ctx.say(STRINGS.INVALID_DISCORD_ID);
          return;
        }
        const asHost = command.kind === 'add-host' || command.kind === 'remove-host';
        if (command.kind === 'add-user' || command.kind === 'add-host') {
          await this.channelAdmin.addMember(ctx, command.discordId, asHost);
        } else {
          await this.channelAdmin.removeMember(ctx, command.discordId, asHost);
        }
        return;
      }
      case 'close-channel':
        await this.channelAdmin.closeChannel(ctx);
        return;
      case 'stop':
        await ctx.say(STRINGS.STOPPING);
        this.lifecycle.requestShutdown(ctx.authorId);
        return;
    }
  }

  /**
   * Hand a background task to the queue listeners. Answers whether the
   * task was accepted; the task itself runs later.
   */
  private async requestSync(
    ctx: CommandContext,
    event: SyncRequest,
    task: string,
    startedText: string,
  ): Promise<void> {
    const payload: SyncRequestPayload = { requestedBy: ctx.authorId };
    let accepted: unknown[];
    try {
      accepted = await this.eventEmitter.emitAsync(event, payload);
    } catch (error) {
      this.logger.error(`Could not enqueue ${task}:`, error);
      await ctx.say(
        STRINGS.taskSubmitFailed(
          task,
          error instanceof Error ? error.message : 'unknown error',
        ),
      );
      return;
    }
    if (accepted.length === 0) {
      await ctx.say(STRINGS.taskSubmitFailed(task, 'no worker is listening'));
      return;
    }
    await ctx.say(startedText);
  }
}
