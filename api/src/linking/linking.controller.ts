import {
  Controller,
  Get,
  HttpStatus,
  Logger,
  Param,
  Query,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { MeetupApiError } from '../meetup/meetup-client.service';
import { RateLimit } from '../throttler/rate-limit.decorator';
import {
  LINKING_PAGES,
  renderLinkingPage,
  type LinkingPage,
} from './linking-pages';
import { MeetupOAuthService } from './meetup-oauth.service';

/**
 * Meetup account linking over HTTP.
 * Answers with small HTML pages, since users arrive here from a browser.
 */
@RateLimit('linking')
@Controller()
export class LinkingController {
  private readonly logger = new Logger(LinkingController.name);

  constructor(private readonly oauthService: MeetupOAuthService) {}

  private sendPage(res: Response, status: number, page: LinkingPage): void {
    res.status(status).type('html').send(renderLinkingPage(page));
  }

  /**
   * GET /link/:linkingId
   * Entry point of the DM'd linking URL; redirects to Meetup's consent page.
   */
  @Get('link/:linkingId')
  async startLinking(
    @Param('linkingId') linkingId: string,
    @Res() res: Response,
  ): Promise<void> {
    try {
      const result = await this.oauthService.startLinking(linkingId);
      if (result.status === 'invalid-session') {
        this.sendPage(res, HttpStatus.BAD_REQUEST, LINKING_PAGES.invalidSession);
        return;
      }
      res.redirect(HttpStatus.FOUND, result.url);
    } catch (error) {
      this.handleUpstreamError(res, error);
    }
  }

  /**
   * GET /authorize/redirect?code=&state=
   * Meetup's OAuth2 callback.
   */
  @Get('authorize/redirect')
  async authorizeRedirect(
    @Query() query: Record<string, unknown>,
    @Res() res: Response,
  ): Promise<void> {
    // NOTE: errors are answered with res.status() instead of thrown,
    // because @Res() bypasses NestJS exception filters once headers are sent.
    try {
      const result = await this.oauthService.completeLinking(query);
      switch (result.status) {
        case 'linked':
          this.sendPage(res, HttpStatus.OK, LINKING_PAGES.linked(result.member.name));
          return;
        case 'invalid-session':
          this.sendPage(res, HttpStatus.BAD_REQUEST, LINKING_PAGES.invalidSession);
          return;
        case 'denied':
          this.sendPage(res, HttpStatus.BAD_REQUEST, LINKING_PAGES.denied);
          return;
        case 'discord-already-linked':
          this.sendPage(res, HttpStatus.CONFLICT, LINKING_PAGES.discordAlreadyLinked);
          return;
        case 'meetup-already-linked':
          this.sendPage(res, HttpStatus.CONFLICT, LINKING_PAGES.meetupAlreadyLinked);
          return;
      }
    } catch (error) {
      this.handleUpstreamError(res, error);
    }
  }

  /** Meetup failures become a 502 page; anything else is rethrown */
  private handleUpstreamError(res: Response, error: unknown): void {
    if (error instanceof MeetupApiError || error instanceof ZodError) {
      this.logger.error(`Meetup linking failed: ${error.message}`);
      this.sendPage(res, HttpStatus.BAD_GATEWAY, LINKING_PAGES.upstreamError);
      return;
    }
    throw error;
  }
}
