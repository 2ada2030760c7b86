import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  CONNECT_RETRY_DELAYS_MS,
  DiscordBotService,
} from './discord-bot.service';
import { DiscordBotClientService } from './discord-bot-client.service';

describe('DiscordBotService', () => {
  let service: DiscordBotService;
  let clientService: {
    connect: jest.Mock;
    disconnect: jest.Mock;
    isConnected: jest.Mock;
    isConnecting: jest.Mock;
    getGuildId: jest.Mock;
  };

  beforeEach(async () => {
    clientService = {
      connect: jest.fn().mockResolvedValue(undefined),
      disconnect: jest.fn().mockResolvedValue(undefined),
      isConnected: jest.fn().mockReturnValue(true),
      isConnecting: jest.fn().mockReturnValue(false),
      getGuildId: jest.fn().mockReturnValue('555555555555555555'),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DiscordBotService,
        { provide: DiscordBotClientService, useValue: clientService },
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue('test-bot-token') },
        },
      ],
    }).compile();

    service = module.get(DiscordBotService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('onModuleInit', () => {
    it('connects with the configured token', async () => {
      await service.onModuleInit();

      expect(clientService.connect).toHaveBeenCalledWith('test-bot-token');
    });

    it('retries a failed connection after the first delay', async () => {
      jest.useFakeTimers();
      clientService.connect.mockRejectedValueOnce(
        new Error('Discord bot connection timed out after 15s'),
      );

      const init = service.onModuleInit();
      await jest.advanceTimersByTimeAsync(5_000);
      await init;

      expect(clientService.connect).toHaveBeenCalledTimes(2);
    });

    it('rethrows once every attempt has failed', async () => {
      jest.useFakeTimers();
      clientService.connect.mockRejectedValue(
        new Error('Invalid bot token. Check DISCORD_TOKEN.'),
      );

      const init = service.onModuleInit();
      const outcome = expect(init).rejects.toThrow(
        'Invalid bot token. Check DISCORD_TOKEN.',
      );
      await jest.advanceTimersByTimeAsync(5_000 + 15_000 + 45_000);
      await outcome;

      expect(clientService.connect).toHaveBeenCalledTimes(
        CONNECT_RETRY_DELAYS_MS.length + 1,
      );
    });
  });

  it('disconnects on shutdown', async () => {
    await service.onModuleDestroy();

    expect(clientService.disconnect).toHaveBeenCalled();
  });

  it('reports the connection status', () => {
    expect(service.getStatus()).toEqual({
      connected: true,
      connecting: false,
      guildId: '555555555555555555',
    });
  });
});
