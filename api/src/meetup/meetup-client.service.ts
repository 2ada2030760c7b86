import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import {
  MeetupEventSchema,
  MeetupMemberSchema,
  MeetupRsvpSchema,
  MeetupTokenResponseSchema,
  type Env,
  type MeetupEvent,
  type MeetupMember,
  type MeetupRsvp,
  type MeetupTokenResponse,
} from '@swissrpg-bot/contract';
import { meetupFetch } from './meetup-http.util';

export const MEETUP_API_URL = 'https://api.meetup.com';
export const MEETUP_OAUTH_URL = 'https://secure.meetup.com/oauth2';

/** A Meetup request that failed, or could not be made for lack of credentials */
export class MeetupApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'MeetupApiError';
  }
}

/**
 * Parse a list element by element, dropping (and logging) entries that do
 * not match the schema instead of failing the whole response.
 */
function parseEach<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  what: string,
  logger: Logger,
): z.output<T>[] {
  if (!Array.isArray(payload)) {
    throw new MeetupApiError(`Expected a list of ${what}`);
  }
  const parsed: z.output<T>[] = [];
  for (const item of payload) {
    const result = schema.safeParse(item);
    if (result.success) {
      parsed.push(result.data);
    } else {
      logger.warn(`Skipping malformed ${what}: ${result.error.message}`);
    }
  }
  return parsed;
}

/**
 * Meetup REST and OAuth2 client.
 *
 * Reads (profiles, events, RSVPs) use the organizer's access token from
 * MEETUP_ACCESS_TOKEN; the OAuth2 code exchange uses the app credentials.
 */
@Injectable()
export class MeetupClientService {
  private readonly logger = new Logger(MeetupClientService.name);

  constructor(private readonly configService: ConfigService<Env, true>) {}

  /** Whether API reads are possible at all */
  isConfigured(): boolean {
    return !!this.configService.get('MEETUP_ACCESS_TOKEN', { infer: true });
  }

  private requireAccessToken(): string {
    const token = this.configService.get('MEETUP_ACCESS_TOKEN', {
      infer: true,
    });
    if (!token) {
      throw new MeetupApiError('Meetup API unavailable: no access token');
    }
    return token;
  }

  private requireGroup(): string {
    const group = this.configService.get('MEETUP_GROUP_URLNAME', {
      infer: true,
    });
    if (!group) {
      throw new MeetupApiError('MEETUP_GROUP_URLNAME is not configured');
    }
    return group;
  }

  private redirectUri(): string {
    const publicUrl = this.configService.get('PUBLIC_URL', { infer: true });
    return new URL('/authorize/redirect', publicUrl).toString();
  }

  /** meetupFetch, with network failures reported as MeetupApiError */
  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await meetupFetch(url, init);
    } catch (error) {
      throw new MeetupApiError(
        `Meetup request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async getJson(
    path: string,
    accessToken: string,
    signal?: AbortSignal,
  ): Promise<{ status: number; body: unknown }> {
    const response = await this.request(`${MEETUP_API_URL}${path}`, {
      headers: {
        Authorization: `Bearer ${accessToken}`,
        Accept: 'application/json',
      },
      signal,
    });
    if (response.status === 404) {
      return { status: 404, body: null };
    }
    if (!response.ok) {
      throw new MeetupApiError(
        `Meetup API ${path} answered ${response.status}`,
        response.status,
      );
    }
    return { status: response.status, body: await response.json() };
  }

  /**
   * Public profile of a member.
   * @returns null when Meetup does not know the member
   */
  async getMemberProfile(memberId: string): Promise<MeetupMember | null> {
    const { status, body } = await this.getJson(
      `/members/${encodeURIComponent(memberId)}`,
      this.requireAccessToken(),
    );
    if (status === 404) return null;
    return MeetupMemberSchema.parse(body);
  }

  /** Upcoming events of the configured group */
  async getUpcomingEvents(signal?: AbortSignal): Promise<MeetupEvent[]> {
    const group = encodeURIComponent(this.requireGroup());
    const { status, body } = await this.getJson(
      `/${group}/events?status=upcoming&page=200`,
      this.requireAccessToken(),
      signal,
    );
    if (status === 404) {
      throw new MeetupApiError(`Meetup group ${group} not found`, 404);
    }
    return parseEach(MeetupEventSchema, body, 'event', this.logger);
  }

  async getRsvps(eventId: string, signal?: AbortSignal): Promise<MeetupRsvp[]> {
    const group = encodeURIComponent(this.requireGroup());
    const { status, body } = await this.getJson(
      `/${group}/events/${encodeURIComponent(eventId)}/rsvps`,
      this.requireAccessToken(),
      signal,
    );
    if (status === 404) return [];
    return parseEach(MeetupRsvpSchema, body, 'RSVP', this.logger);
  }

  /** URL of Meetup's consent page; Meetup hands `state` back on redirect */
  buildAuthorizeUrl(state: string): string {
    const clientId = this.configService.get('MEETUP_CLIENT_ID', {
      infer: true,
    });
    if (!clientId) {
      throw new MeetupApiError('MEETUP_CLIENT_ID is not configured');
    }
    const url = new URL(`${MEETUP_OAUTH_URL}/authorize`);
    url.searchParams.set('client_id', clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', this.redirectUri());
    url.searchParams.set('state', state);
    return url.toString();
  }

  /** Exchange an authorization code for an access token */
  async exchangeCode(code: string): Promise<MeetupTokenResponse> {
    const clientId = this.configService.get('MEETUP_CLIENT_ID', {
      infer: true,
    });
    const clientSecret = this.configService.get('MEETUP_CLIENT_SECRET', {
      infer: true,
    });
    if (!clientId || !clientSecret) {
      throw new MeetupApiError('Meetup OAuth2 credentials are not configured');
    }

    const response = await this.request(`${MEETUP_OAUTH_URL}/access`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: clientId,
        client_secret: clientSecret,
        grant_type: 'authorization_code',
        redirect_uri: this.redirectUri(),
        code,
      }),
    });
    if (!response.ok) {
      throw new MeetupApiError(
        `Meetup token exchange answered ${response.status}`,
        response.status,
      );
    }
    return MeetupTokenResponseSchema.parse(await response.json());
  }

  /** Profile of the member an access token belongs to */
  async getAuthenticatedMember(accessToken: string): Promise<MeetupMember> {
    const { status, body } = await this.getJson('/members/self', accessToken);
    if (status === 404) {
      throw new MeetupApiError('Meetup did not return the member profile', 404);
    }
    return MeetupMemberSchema.parse(body);
  }
}
