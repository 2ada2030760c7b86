import { EmbedBuilder, Events } from 'discord.js';
import { GuildMemberListener } from './guild-member.listener';
import { EMBED_COLORS } from '../discord-bot.constants';
import { STRINGS } from '../discord-bot.strings';

const BOT_ID = '111111111111111111';
const GUILD_ID = '555555555555555555';

function createMember(guildId = GUILD_ID, bot = false) {
  return {
    id: '222222222222222222',
    guild: { id: guildId },
    user: { bot },
    send: jest.fn().mockResolvedValue(undefined),
  };
}

describe('GuildMemberListener', () => {
  let listener: GuildMemberListener;
  let mockClientService: {
    getClient: jest.Mock;
    getBotUserId: jest.Mock;
    getGuildId: jest.Mock;
  };

  beforeEach(() => {
    mockClientService = {
      getClient: jest.fn(),
      getBotUserId: jest.fn().mockReturnValue(BOT_ID),
      getGuildId: jest.fn().mockReturnValue(GUILD_ID),
    };
    listener = new GuildMemberListener(mockClientService as never);
  });

  it('registers a guildMemberAdd listener once', () => {
    const mockOn = jest.fn();
    mockClientService.getClient.mockReturnValue({ on: mockOn });

    listener.handleBotConnected();
    listener.handleBotConnected();

    expect(mockOn).toHaveBeenCalledTimes(1);
    expect(mockOn).toHaveBeenCalledWith(
      Events.GuildMemberAdd,
      expect.any(Function),
    );
  });

  it('sends the welcome message with the linking embed', async () => {
    const member = createMember();

    await listener.handleMemberAdd(member as never);

    expect(member.send).toHaveBeenCalledTimes(1);
    const [payload] = member.send.mock.calls[0] as [
      { content: string; embeds: EmbedBuilder[] },
    ];
    expect(payload.content).toBe(STRINGS.WELCOME_MESSAGE_PART1);
    expect(payload.embeds[0].data).toEqual({
      color: EMBED_COLORS.WELCOME,
      title: STRINGS.WELCOME_MESSAGE_PART2_EMBED_TITLE,
      description: STRINGS.welcomeMessagePart2EmbedContent(BOT_ID),
    });
  });

  it('ignores members joining other guilds', async () => {
    const member = createMember('666666666666666666');

    await listener.handleMemberAdd(member as never);

    expect(member.send).not.toHaveBeenCalled();
  });

  it('ignores bots', async () => {
    const member = createMember(GUILD_ID, true);

    await listener.handleMemberAdd(member as never);

    expect(member.send).not.toHaveBeenCalled();
  });

  it('does not throw when the member has DMs closed', async () => {
    const member = createMember();
    member.send.mockRejectedValueOnce(
      new Error('Cannot send messages to this user'),
    );

    await expect(
      listener.handleMemberAdd(member as never),
    ).resolves.toBeUndefined();
  });
});
