import { Injectable, Logger } from '@nestjs/common';
import {
  AuthorizeRedirectQuerySchema,
  LinkingIdSchema,
  type MeetupMember,
} from '@swissrpg-bot/contract';
import { MeetupClientService } from '../meetup/meetup-client.service';
import { LinkingService } from './linking.service';

export type StartLinkingResult =
  | { status: 'redirect'; url: string }
  | { status: 'invalid-session' };

export type CompleteLinkingResult =
  | { status: 'linked'; discordId: string; member: MeetupMember }
  | { status: 'invalid-session' }
  | { status: 'denied' }
  | { status: 'discord-already-linked' }
  | { status: 'meetup-already-linked' };

/**
 * The browser half of account linking: the bot DMs a
 * `{PUBLIC_URL}/link/{linkingId}` URL, the user consents on Meetup and
 * Meetup redirects back with a code and `state = linkingId`.
 */
@Injectable()
export class MeetupOAuthService {
  private readonly logger = new Logger(MeetupOAuthService.name);

  constructor(
    private readonly linkingService: LinkingService,
    private readonly meetupClient: MeetupClientService,
  ) {}

  async startLinking(linkingId: string): Promise<StartLinkingResult> {
    if (!LinkingIdSchema.safeParse(linkingId).success) {
      return { status: 'invalid-session' };
    }
    const discordId = await this.linkingService.peekLinkingSession(linkingId);
    if (!discordId) {
      return { status: 'invalid-session' };
    }
    return { status: 'redirect', url: this.meetupClient.buildAuthorizeUrl(linkingId) };
  }

  /**
   * Handle Meetup's redirect. The session is consumed before anything
   * else, so a code can complete at most one link.
   * Meetup and network failures propagate as MeetupApiError.
   */
  async completeLinking(
    query: Record<string, unknown>,
  ): Promise<CompleteLinkingResult> {
    if (typeof query.error === 'string') {
      if (typeof query.state === 'string') {
        await this.linkingService.consumeLinkingSession(query.state);
      }
      this.logger.log(`Meetup authorization refused: ${query.error}`);
      return { status: 'denied' };
    }

    const parsed = AuthorizeRedirectQuerySchema.safeParse(query);
    if (!parsed.success) {
      return { status: 'invalid-session' };
    }
    const { code, state } = parsed.data;

    const discordId = await this.linkingService.consumeLinkingSession(state);
    if (!discordId) {
      return { status: 'invalid-session' };
    }

    const token = await this.meetupClient.exchangeCode(code);
    const member = await this.meetupClient.getAuthenticatedMember(
      token.access_token,
    );

    const result = await this.linkingService.link(discordId, member.id);
    switch (result.status) {
      case 'linked':
        return { status: 'linked', discordId, member };
      case 'discord-already-linked':
        return { status: 'discord-already-linked' };
      case 'meetup-already-linked':
        this.logger.warn(
          `Meetup user ${member.id} is already linked to Discord user ${result.discordId}, refused link for ${discordId}`,
        );
        return { status: 'meetup-already-linked' };
    }
  }
}
