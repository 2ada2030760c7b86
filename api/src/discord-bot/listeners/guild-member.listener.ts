import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { EmbedBuilder, Events, type GuildMember } from 'discord.js';
import { DiscordBotClientService } from '../discord-bot-client.service';
import { DISCORD_BOT_EVENTS, EMBED_COLORS } from '../discord-bot.constants';
import { STRINGS } from '../discord-bot.strings';

/**
 * Greets new members of the community guild with a DM explaining how to
 * link their Meetup account.
 */
@Injectable()
export class GuildMemberListener {
  private readonly logger = new Logger(GuildMemberListener.name);
  private listenerAttached = false;

  constructor(private readonly clientService: DiscordBotClientService) {}

  @OnEvent(DISCORD_BOT_EVENTS.CONNECTED)
  handleBotConnected(): void {
    const client = this.clientService.getClient();
    if (!client || this.listenerAttached) return;

    client.on(Events.GuildMemberAdd, (member: GuildMember) => {
      this.handleMemberAdd(member).catch((err: unknown) => {
        this.logger.error('Error handling guildMemberAdd:', err);
      });
    });

    this.listenerAttached = true;
  }

  @OnEvent(DISCORD_BOT_EVENTS.DISCONNECTED)
  handleBotDisconnected(): void {
    this.listenerAttached = false;
  }

  async handleMemberAdd(member: GuildMember): Promise<void> {
    if (member.guild.id !== this.clientService.getGuildId()) return;
    const botId = this.clientService.getBotUserId();
    if (!botId || member.user.bot) return;

    const embed = new EmbedBuilder()
      .setColor(EMBED_COLORS.WELCOME)
      .setTitle(STRINGS.WELCOME_MESSAGE_PART2_EMBED_TITLE)
      .setDescription(STRINGS.welcomeMessagePart2EmbedContent(botId));

    try {
      await member.send({
        content: STRINGS.WELCOME_MESSAGE_PART1,
        embeds: [embed],
      });
      this.logger.log(`Sent welcome message to ${member.id}`);
    } catch (error) {
      // Members can close their DMs to server members
      this.logger.warn(
        `Could not send welcome message to ${member.id}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
