import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmbedBuilder } from 'discord.js';
import type { Env } from '@swissrpg-bot/contract';
import { LinkingService } from '../../linking/linking.service';
import { MeetupClientService } from '../../meetup/meetup-client.service';
import type { CommandContext } from '../commands/command-context';
import { ACK_REACTION, EMBED_COLORS } from '../discord-bot.constants';
import { STRINGS } from '../discord-bot.strings';

/**
 * The "link meetup" and "unlink meetup" commands, for oneself and the
 * organizer variants acting on another member.
 */
@Injectable()
export class MemberLinkingService {
  private readonly logger = new Logger(MemberLinkingService.name);

  constructor(
    private readonly linkingService: LinkingService,
    private readonly meetupClient: MeetupClientService,
    private readonly configService: ConfigService<Env, true>,
  ) {}

  private async acknowledge(ctx: CommandContext): Promise<void> {
    await ctx.react(ACK_REACTION).catch((err: unknown) => {
      this.logger.warn(
        `Failed to react to command: ${err instanceof Error ? err.message : 'Unknown error'}`,
      );
    });
  }

  private async dmOrWarn(ctx: CommandContext, content: string): Promise<void> {
    await ctx.dm(content).catch((err: unknown) => {
      this.logger.warn(
        `Failed to DM ${ctx.authorId}: ${err instanceof Error ? err.message : 'Unknown error'}`,
      );
    });
  }

  /**
   * Self-service linking. Already linked users are told which profile
   * they are linked to; everyone else gets a one-time linking URL by DM.
   */
  async linkSelf(ctx: CommandContext, botId: string): Promise<void> {
    const linkedMeetupId = await this.linkingService.getLinkedMeetupId(
      ctx.authorId,
    );

    if (linkedMeetupId !== null) {
      if (!this.meetupClient.isConfigured()) {
        await this.dmOrWarn(ctx, STRINGS.discordAlreadyLinkedUnknownName(botId));
      } else {
        const profile = await this.meetupClient.getMemberProfile(linkedMeetupId);
        await this.dmOrWarn(
          ctx,
          profile
            ? STRINGS.discordAlreadyLinked(profile.name, botId)
            : STRINGS.nonexistentMeetupLinked(botId),
        );
      }
      await this.acknowledge(ctx);
      return;
    }

    const linkingId = await this.linkingService.createLinkingSession(
      ctx.authorId,
    );
    const publicUrl = this.configService.get('PUBLIC_URL', { infer: true });
    const url = new URL(`/link/${linkingId}`, publicUrl).toString();

    try {
      await ctx.dm(STRINGS.meetupLinking(url));
    } catch (error) {
      this.logger.error('Error sending Meetup linking DM:', error);
      await ctx.say(STRINGS.DM_FAILED);
      return;
    }
    await this.acknowledge(ctx);
  }

  /** An organizer links `discordId` to the Meetup member `meetupId` */
  async linkOther(
    ctx: CommandContext,
    discordId: string,
    meetupId: string,
    botMention: string,
  ): Promise<void> {
    const linkedMeetupId =
      await this.linkingService.getLinkedMeetupId(discordId);
    if (linkedMeetupId !== null) {
      await ctx.say(
        linkedMeetupId === meetupId
          ? STRINGS.alreadyLinkedToSameMeetup(discordId)
          : STRINGS.alreadyLinkedToOtherMeetup(discordId, botMention),
      );
      return;
    }

    const linkedDiscordId =
      await this.linkingService.getLinkedDiscordId(meetupId);
    if (linkedDiscordId !== null) {
      await this.dmOrWarn(
        ctx,
        STRINGS.meetupLinkedToOther(linkedDiscordId, botMention),
      );
      return;
    }

    // Make sure the Meetup member exists before linking to it
    const profile = await this.meetupClient.getMemberProfile(meetupId);
    if (!profile) {
      await ctx.say(STRINGS.MEETUP_PROFILE_NOT_FOUND);
      return;
    }

    const result = await this.linkingService.link(discordId, meetupId);
    if (result.status !== 'linked') {
      await ctx.say(STRINGS.LINK_TIMING_ERROR);
      return;
    }

    const embed = new EmbedBuilder()
      .setTitle(STRINGS.LINKED_EMBED_TITLE)
      .setDescription(STRINGS.linkedEmbedDescription(discordId, profile.name))
      .setColor(EMBED_COLORS.LINKED);
    if (profile.photo) {
      embed.setImage(profile.photo.thumb_link);
    }
    await ctx.say({ embeds: [embed] });
  }

  /**
   * Remove a link. `asOrganizer` selects the wording for an organizer
   * unlinking someone else.
   */
  async unlink(
    ctx: CommandContext,
    discordId: string,
    asOrganizer: boolean,
  ): Promise<void> {
    const meetupId = await this.linkingService.unlink(discordId);
    if (meetupId !== null) {
      await ctx.say(
        asOrganizer
          ? STRINGS.organizerUnlinkSuccess(discordId)
          : STRINGS.MEETUP_UNLINK_SUCCESS,
      );
    } else {
      await ctx.say(
        asOrganizer
          ? STRINGS.organizerUnlinkNotLinked(discordId)
          : STRINGS.MEETUP_UNLINK_NOT_LINKED,
      );
    }
  }
}
