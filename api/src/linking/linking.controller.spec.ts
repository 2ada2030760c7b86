import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import * as supertest from 'supertest';
import { MeetupApiError } from '../meetup/meetup-client.service';
import { LinkingController } from './linking.controller';
import { MeetupOAuthService } from './meetup-oauth.service';

describe('LinkingController', () => {
  let app: INestApplication;
  let mockOAuth: { startLinking: jest.Mock; completeLinking: jest.Mock };

  beforeAll(async () => {
    mockOAuth = { startLinking: jest.fn(), completeLinking: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [LinkingController],
      providers: [{ provide: MeetupOAuthService, useValue: mockOAuth }],
    }).compile();

    app = module.createNestApplication({ logger: false });
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    mockOAuth.startLinking.mockReset();
    mockOAuth.completeLinking.mockReset();
  });

  describe('GET /link/:linkingId', () => {
    it('redirects to the Meetup consent page', async () => {
      mockOAuth.startLinking.mockResolvedValueOnce({
        status: 'redirect',
        url: 'https://secure.meetup.com/oauth2/authorize?state=abc',
      });

      const res = await supertest.default(app.getHttpServer()).get('/link/abc');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe(
        'https://secure.meetup.com/oauth2/authorize?state=abc',
      );
      expect(mockOAuth.startLinking).toHaveBeenCalledWith('abc');
    });

    it('answers 400 with an HTML page for invalid sessions', async () => {
      mockOAuth.startLinking.mockResolvedValueOnce({ status: 'invalid-session' });

      const res = await supertest.default(app.getHttpServer()).get('/link/abc');

      expect(res.status).toBe(400);
      expect(res.headers['content-type']).toMatch(/^text\/html/);
      expect(res.text).toContain('<h1>Link expired</h1>');
      expect(res.text).toContain('<link rel="stylesheet" href="/static/style.css" />');
    });

    it('answers 502 when Meetup is not configured', async () => {
      mockOAuth.startLinking.mockRejectedValueOnce(
        new MeetupApiError('MEETUP_CLIENT_ID is not configured'),
      );

      const res = await supertest.default(app.getHttpServer()).get('/link/abc');

      expect(res.status).toBe(502);
    });
  });

  describe('GET /authorize/redirect', () => {
    it('renders the success page with an escaped member name', async () => {
      mockOAuth.completeLinking.mockResolvedValueOnce({
        status: 'linked',
        discordId: '1001',
        member: { id: '42', name: 'Bob <Bard>' },
      });

      const res = await supertest
        .default(app.getHttpServer())
        .get('/authorize/redirect?code=c&state=s');

      expect(res.status).toBe(200);
      expect(res.text).toContain('<h1>Meetup account linked</h1>');
      expect(res.text).toContain('Bob &lt;Bard&gt;&#39;s Meetup account');
      expect(mockOAuth.completeLinking).toHaveBeenCalledWith({
        code: 'c',
        state: 's',
      });
    });

    it('answers 400 for invalid sessions', async () => {
      mockOAuth.completeLinking.mockResolvedValueOnce({ status: 'invalid-session' });

      const res = await supertest
        .default(app.getHttpServer())
        .get('/authorize/redirect?code=c&state=s');

      expect(res.status).toBe(400);
    });

    it('answers 409 when an account is already linked', async () => {
      mockOAuth.completeLinking.mockResolvedValueOnce({
        status: 'discord-already-linked',
      });

      const res = await supertest
        .default(app.getHttpServer())
        .get('/authorize/redirect?code=c&state=s');

      expect(res.status).toBe(409);
      expect(res.text).toContain('<h1>Already linked</h1>');
    });

    it('answers 502 when Meetup fails', async () => {
      mockOAuth.completeLinking.mockRejectedValueOnce(
        new MeetupApiError('Meetup token exchange answered 500', 500),
      );

      const res = await supertest
        .default(app.getHttpServer())
        .get('/authorize/redirect?code=c&state=s');

      expect(res.status).toBe(502);
      expect(res.text).toContain('<h1>Meetup is not responding</h1>');
    });

    it('leaves other errors to Nest', async () => {
      mockOAuth.completeLinking.mockRejectedValueOnce(new Error('redis down'));

      const res = await supertest
        .default(app.getHttpServer())
        .get('/authorize/redirect?code=c&state=s');

      expect(res.status).toBe(500);
    });
  });
});
