import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ChannelType, Events, type Message } from 'discord.js';
import { CommandRouterService } from '../commands/command-router.service';
import type { CommandContext } from '../commands/command-context';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS } from '../discord-bot.constants';
import { STRINGS } from '../discord-bot.strings';

/**
 * Entry point of text commands: filters incoming messages down to the ones
 * addressed to the bot and hands them to the command router.
 *
 * In guild channels a command must start with a mention of the bot. In DMs
 * the mention is optional; a DM that does start with it is read with the
 * channel grammar.
 */
@Injectable()
export class MessageListener {
  private readonly logger = new Logger(MessageListener.name);
  private listenerAttached = false;

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly router: CommandRouterService,
  ) {}

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  handleBotConnected(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.MessageCreate, (message: Message) => {
      this.handleMessage(message).catch((err: unknown) => {
        this.logger.error('Error handling messageCreate:', err);
      });
    });

    this.listenerAttached = true;
    this.logger.log('Command listener attached');
  }

  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  handleBotDisconnected(): void {
    this.listenerAttached = false;
  }

  private buildContext(message: Message, isDm: boolean): CommandContext {
    return {
      authorId: message.author.id,
      channelId: message.channelId,
      isDm,
      say: async (payload) => {
        if (!message.channel.isSendable()) {
          throw new Error(`Cannot send to channel ${message.channelId}`);
        }
        await message.channel.send(payload);
      },
      dm: async (payload) => {
        await message.author.send(payload);
      },
      react: async (emoji) => {
        await message.react(emoji);
      },
    };
  }

  async handleMessage(message: Message): Promise<void> {
    const botId = this.clientService.getBotUserId();
    if (!botId) return;

    // Never answer ourselves or other bots
    if (message.author.id === botId || message.author.bot) return;

    if (
      message.guildId !== null &&
      message.guildId !== this.clientService.getGuildId()
    ) {
      return;
    }

    const isDm = message.channel.type === ChannelType.DM;
    const patterns = this.router.getPatterns(botId);
    const addressed = patterns.startsWithBotMention(message.content);
    if (!isDm && !addressed) return;

    const ctx = this.buildContext(message, isDm);
    const command = patterns.parse(message.content, isDm && !addressed);
    if (!command) {
      await ctx.say(STRINGS.INVALID_COMMAND);
      return;
    }

    try {
      await this.router.dispatch(ctx, command, botId);
    } catch (error) {
      this.logger.error(`Error handling ${command.kind} command:`, error);
      await ctx.say(STRINGS.UNSPECIFIED_ERROR).catch((err: unknown) => {
        this.logger.warn(
          `Failed to report error: ${err instanceof Error ? err.message : 'Unknown error'}`,
        );
      });
    }
  }
}
