import type { ConfigService } from '@nestjs/config';
import type { Env } from '@swissrpg-bot/contract';
import { MeetupApiError, MeetupClientService } from './meetup-client.service';

function createConfig(overrides: Partial<Env> = {}) {
  const values: Partial<Env> = {
    PUBLIC_URL: 'https://bot.example.test',
    MEETUP_ACCESS_TOKEN: 'test-access-token',
    MEETUP_GROUP_URLNAME: 'test-group',
    MEETUP_CLIENT_ID: 'test-client',
    MEETUP_CLIENT_SECRET: 'test-secret',
    ...overrides,
  };
  return {
    get: jest.fn((key: keyof Env) => values[key]),
  } as unknown as ConfigService<Env, true>;
}

function jsonResponse(status: number, body: unknown) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('MeetupClientService', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('getMemberProfile', () => {
    it('returns the parsed profile with a string id', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, {
          id: 42,
          name: 'Alice',
          photo: { thumb_link: 'https://img.example.test/a.jpg' },
        }),
      );
      const service = new MeetupClientService(createConfig());

      const member = await service.getMemberProfile('42');

      expect(member).toEqual({
        id: '42',
        name: 'Alice',
        photo: { thumb_link: 'https://img.example.test/a.jpg' },
      });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.meetup.com/members/42');
      expect(init.headers.Authorization).toBe('Bearer test-access-token');
    });

    it('returns null for unknown members', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(404, {}));
      const service = new MeetupClientService(createConfig());

      expect(await service.getMemberProfile('42')).toBeNull();
    });

    it('throws MeetupApiError on server errors', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(500, {}));
      const service = new MeetupClientService(createConfig());

      await expect(service.getMemberProfile('42')).rejects.toBeInstanceOf(
        MeetupApiError,
      );
    });

    it('refuses to call the API without an access token', async () => {
      const service = new MeetupClientService(
        createConfig({ MEETUP_ACCESS_TOKEN: undefined }),
      );

      expect(service.isConfigured()).toBe(false);
      await expect(service.getMemberProfile('42')).rejects.toThrow(
        'Meetup API unavailable',
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('getUpcomingEvents', () => {
    it('skips malformed events', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, [
          {
            id: 'ev1',
            name: 'Curse of Strahd [Session 3]',
            time: 1_900_000_000_000,
            link: 'https://www.meetup.com/test-group/events/ev1/',
          },
          { id: 'ev2', name: 'No time' },
        ]),
      );
      const service = new MeetupClientService(createConfig());

      const events = await service.getUpcomingEvents();

      expect(events.map((event) => event.id)).toEqual(['ev1']);
      expect(fetchMock.mock.calls[0][0]).toBe(
        'https://api.meetup.com/test-group/events?status=upcoming&page=200',
      );
    });
  });

  describe('getRsvps', () => {
    it('returns an empty list for unknown events', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(404, {}));
      const service = new MeetupClientService(createConfig());

      expect(await service.getRsvps('ev1')).toEqual([]);
    });

    it('passes the abort signal to fetch', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, []));
      const service = new MeetupClientService(createConfig());
      const controller = new AbortController();

      await service.getRsvps('ev1', controller.signal);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.meetup.com/test-group/events/ev1/rsvps');
      expect(init.signal).toBe(controller.signal);
    });
  });

  describe('OAuth2', () => {
    it('builds the authorize URL with state and redirect URI', () => {
      const service = new MeetupClientService(createConfig());

      const url = new URL(service.buildAuthorizeUrl('abc'));

      expect(url.origin + url.pathname).toBe(
        'https://secure.meetup.com/oauth2/authorize',
      );
      expect(url.searchParams.get('client_id')).toBe('test-client');
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('state')).toBe('abc');
      expect(url.searchParams.get('redirect_uri')).toBe(
        'https://bot.example.test/authorize/redirect',
      );
    });

    it('exchanges a code with a form POST', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, { access_token: 'test-token', token_type: 'bearer' }),
      );
      const service = new MeetupClientService(createConfig());

      const token = await service.exchangeCode('the-code');

      expect(token).toEqual({ access_token: 'test-token', token_type: 'bearer' });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://secure.meetup.com/oauth2/access');
      expect(init.method).toBe('POST');
      const form = init.body as URLSearchParams;
      expect(form.get('grant_type')).toBe('authorization_code');
      expect(form.get('code')).toBe('the-code');
      expect(form.get('client_secret')).toBe('test-secret');
    });

    it('fails the exchange on a non-2xx answer', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(400, {}));
      const service = new MeetupClientService(createConfig());

      await expect(service.exchangeCode('bad')).rejects.toThrow(
        'Meetup token exchange answered 400',
      );
    });
  });
});
