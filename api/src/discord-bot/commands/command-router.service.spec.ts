import { CommandRouterService } from './command-router.service';
import { STRINGS } from '../discord-bot.strings';
import { SYNC_REQUEST_EVENTS } from '../discord-bot.constants';

const BOT_ID = '111111111111111111';
const AUTHOR_ID = '222222222222222222';
const TARGET_ID = '333333333333333333';

function createContext() {
  return {
    authorId: AUTHOR_ID,
    channelId: '444444444444444444',
    isDm: false,
    say: jest.fn().mockResolvedValue(undefined),
    dm: jest.fn().mockResolvedValue(undefined),
    react: jest.fn().mockResolvedValue(undefined),
  };
}

describe('CommandRouterService', () => {
  let router: CommandRouterService;
  let ctx: ReturnType<typeof createContext>;
  let mockClient: { isOrganizer: jest.Mock };
  let mockLinking: { linkSelf: jest.Mock; linkOther: jest.Mock; unlink: jest.Mock };
  let mockChannelAdmin: {
    addMember: jest.Mock;
    removeMember: jest.Mock;
    closeChannel: jest.Mock;
  };
  let mockLifecycle: { requestShutdown: jest.Mock };
  let mockEmitter: { emitAsync: jest.Mock };

  beforeEach(() => {
    ctx = createContext();
    mockClient = { isOrganizer: jest.fn().mockResolvedValue(true) };
    mockLinking = {
      linkSelf: jest.fn().mockResolvedValue(undefined),
      linkOther: jest.fn().mockResolvedValue(undefined),
      unlink: jest.fn().mockResolvedValue(undefined),
    };
    mockChannelAdmin = {
      addMember: jest.fn().mockResolvedValue(undefined),
      removeMember: jest.fn().mockResolvedValue(undefined),
      closeChannel: jest.fn().mockResolvedValue(undefined),
    };
    mockLifecycle = { requestShutdown: jest.fn() };
    mockEmitter = { emitAsync: jest.fn().mockResolvedValue([undefined]) };

    router = new CommandRouterService(
      mockClient as never,
      mockLinking as never,
      mockChannelAdmin as never,
      mockLifecycle as never,
      mockEmitter as never,
    );
  });

  it('caches the grammar per bot id', () => {
    const first = router.getPatterns(BOT_ID);

    expect(router.getPatterns(BOT_ID)).toBe(first);
    expect(router.getPatterns('999999999999999999')).not.toBe(first);
  });

  describe('organizer-only commands', () => {
    it.each([
      [{ kind: 'sync-meetup' as const }],
      [{ kind: 'sync-discord' as const }],
      [{ kind: 'remind-expiration' as const }],
      [{ kind: 'stop' as const }],
      [{ kind: 'unlink-meetup-organizer' as const, discordId: TARGET_ID }],
      [
        {
          kind: 'link-meetup-organizer' as const,
          discordId: TARGET_ID,
          meetupId: '42',
        },
      ],
    ])('refuses %j from non-organizers', async (command) => {
      mockClient.isOrganizer.mockResolvedValueOnce(false);

      await router.dispatch(ctx, command, BOT_ID);

      expect(ctx.say).toHaveBeenCalledWith(STRINGS.NOT_AN_ORGANISER);
      expect(mockEmitter.emitAsync).not.toHaveBeenCalled();
      expect(mockLifecycle.requestShutdown).not.toHaveBeenCalled();
      expect(mockLinking.unlink).not.toHaveBeenCalled();
      expect(mockLinking.linkOther).not.toHaveBeenCalled();
    });

    it('treats a failed role check as not an organizer', async () => {
      mockClient.isOrganizer.mockRejectedValueOnce(new Error('Unknown Guild'));

      await router.dispatch(ctx, { kind: 'stop' }, BOT_ID);

      expect(ctx.say).toHaveBeenCalledWith(STRINGS.NOT_AN_ORGANISER);
    });

    it('does not check the role for open commands', async () => {
      await router.dispatch(ctx, { kind: 'link-meetup' }, BOT_ID);

      expect(mockClient.isOrganizer).not.toHaveBeenCalled();
      expect(mockLinking.linkSelf).toHaveBeenCalledWith(ctx, BOT_ID);
    });
  });

  describe('linking', () => {
    it('unlinks the author for the self-service form', async () => {
      await router.dispatch(ctx, { kind: 'unlink-meetup' }, BOT_ID);

      expect(mockLinking.unlink).toHaveBeenCalledWith(ctx, AUTHOR_ID, false);
    });

    it('unlinks the mentioned user for the organizer form', async () => {
      await router.dispatch(
        ctx,
        { kind: 'unlink-meetup-organizer', discordId: TARGET_ID },
        BOT_ID,
      );

      expect(mockLinking.unlink).toHaveBeenCalledWith(ctx, TARGET_ID, true);
    });

    it('passes the bot mention to the organizer link', async () => {
      await router.dispatch(
        ctx,
        { kind: 'link-meetup-organizer', discordId: TARGET_ID, meetupId: '42' },
        BOT_ID,
      );

      expect(mockLinking.linkOther).toHaveBeenCalledWith(
        ctx,
        TARGET_ID,
        '42',
        `<@${BOT_ID}>`,
      );
    });

    it('rejects ids that cannot be Discord or Meetup ids', async () => {
      await router.dispatch(
        ctx,
        { kind: 'link-meetup-organizer', discordId: '12', meetupId: '42' },
        BOT_ID,
      );
      await router.dispatch(
        ctx,
        {
          kind: 'link-meetup-organizer',
          discordId: TARGET_ID,
          meetupId: '12345678901234567890',
        },
        BOT_ID,
      );

      expect(ctx.say.mock.calls).toEqual([
        [STRINGS.INVALID_DISCORD_OR_MEETUP_ID],
        [STRINGS.INVALID_DISCORD_OR_MEETUP_ID],
      ]);
      expect(mockLinking.linkOther).not.toHaveBeenCalled();
    });
  });

  describe('channel administration', () => {
    it.each([
      ['add-user' as const, 'addMember', false],
      ['add-host' as const, 'addMember', true],
      ['remove-user' as const, 'removeMember', false],
      ['remove-host' as const, 'removeMember', true],
    ])('%s calls %s with asHost=%s', async (kind, method, asHost) => {
      await router.dispatch(ctx, { kind, discordId: TARGET_ID }, BOT_ID);

      const handler = method === 'addMember'
        ? mockChannelAdmin.addMember
        : mockChannelAdmin.removeMember;
      expect(handler).toHaveBeenCalledWith(ctx, TARGET_ID, asHost);
    });

    it('rejects invalid user ids', async () => {
      await router.dispatch(ctx, { kind: 'add-user', discordId: '1' }, BOT_ID);

      expect(ctx.say).toHaveBeenCalledWith(STRINGS.INVALID_DISCORD_ID);
      expect(mockChannelAdmin.addMember).not.toHaveBeenCalled();
    });

    it('closes the channel', async () => {
      await router.dispatch(ctx, { kind: 'close-channel' }, BOT_ID);

      expect(mockChannelAdmin.closeChannel).toHaveBeenCalledWith(ctx);
    });
  });

  describe('background tasks', () => {
    it.each([
      ['sync-meetup' as const, SYNC_REQUEST_EVENTS.MEETUP, STRINGS.MEETUP_SYNC_STARTED],
      ['sync-discord' as const, SYNC_REQUEST_EVENTS.DISCORD, STRINGS.DISCORD_SYNC_STARTED],
      [
        'remind-expiration' as const,
        SYNC_REQUEST_EVENTS.END_OF_GAME,
        STRINGS.EXPIRATION_REMINDER_STARTED,
      ],
    ])('%s emits %s', async (kind, event, text) => {
      await router.dispatch(ctx, { kind }, BOT_ID);

      expect(mockEmitter.emitAsync).toHaveBeenCalledWith(event, {
        requestedBy: AUTHOR_ID,
      });
      expect(ctx.say).toHaveBeenCalledWith(text);
    });

    it('reports a failure to enqueue', async () => {
      mockEmitter.emitAsync.mockRejectedValueOnce(new Error('Connection is closed.'));

      await router.dispatch(ctx, { kind: 'sync-discord' }, BOT_ID);

      expect(ctx.say).toHaveBeenCalledWith(
        STRINGS.taskSubmitFailed('Discord synchronization', 'Connection is closed.'),
      );
    });

    it('reports when nobody listens for the request', async () => {
      mockEmitter.emitAsync.mockResolvedValueOnce([]);

      await router.dispatch(ctx, { kind: 'sync-meetup' }, BOT_ID);

      expect(ctx.say).toHaveBeenCalledWith(
        STRINGS.taskSubmitFailed('Meetup synchronization', 'no worker is listening'),
      );
    });
  });

  it('announces and requests shutdown on stop', async () => {
    await router.dispatch(ctx, { kind: 'stop' }, BOT_ID);

    expect(ctx.say).toHaveBeenCalledWith(STRINGS.STOPPING);
    expect(mockLifecycle.requestShutdown).toHaveBeenCalledWith(AUTHOR_ID);
  });

  it('answers help with the bot mention filled in', async () => {
    await router.dispatch(ctx, { kind: 'help' }, BOT_ID);

    expect(ctx.say).toHaveBeenCalledWith(STRINGS.help(`<@${BOT_ID}>`));
  });
});
