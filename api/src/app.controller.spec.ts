import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DiscordBotService } from './discord-bot/discord-bot.service';
import { QueueHealthService } from './queue/queue-health.service';
import { REDIS_CLIENT } from './redis/redis.module';

// Mock Redis client for testing
const mockRedis = {
  ping: jest.fn().mockResolvedValue('PONG'),
};

const mockDiscordBot = {
  getStatus: jest
    .fn()
    .mockReturnValue({ connected: true, connecting: false, guildId: '1' }),
};

const QUEUE_STATUS = {
  name: 'discord-sync',
  waiting: 0,
  active: 1,
  delayed: 0,
  failed: 0,
  lastFailure: null,
};

const mockQueueHealth = {
  getHealthStatus: jest.fn().mockResolvedValue([QUEUE_STATUS]),
};

function mockResponse() {
  return {
    status: jest.fn().mockReturnThis(),
    json: jest.fn(),
  };
}

describe('AppController', () => {
  let appController: AppController;

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        { provide: REDIS_CLIENT, useValue: mockRedis },
        { provide: DiscordBotService, useValue: mockDiscordBot },
        { provide: QueueHealthService, useValue: mockQueueHealth },
      ],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('health', () => {
    it('should return healthy status when redis and discord are connected', async () => {
      const mockRes = mockResponse();

      await appController.getHealth(
        mockRes as unknown as import('express').Response,
      );

      expect(mockRes.status).toHaveBeenCalledWith(200);
      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({
          status: 'ok',
          redis: expect.objectContaining({ connected: true }) as unknown,
          discord: { connected: true },
          queues: [QUEUE_STATUS],
        }),
      );
    });

    it('should return 503 when Redis is down', async () => {
      mockRedis.ping.mockRejectedValueOnce(new Error('Redis connection refused'));
      const mockRes = mockResponse();

      await appController.getHealth(
        mockRes as unknown as import('express').Response,
      );

      expect(mockRes.status).toHaveBeenCalledWith(503);
      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({
          status: 'unhealthy',
          redis: expect.objectContaining({ connected: false }) as unknown,
        }),
      );
    });

    it('should return 503 when the Discord bot is offline', async () => {
      mockDiscordBot.getStatus.mockReturnValueOnce({
        connected: false,
        connecting: true,
        guildId: '1',
      });
      const mockRes = mockResponse();

      await appController.getHealth(
        mockRes as unknown as import('express').Response,
      );

      expect(mockRes.status).toHaveBeenCalledWith(503);
      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({ discord: { connected: false } }),
      );
    });

    it('should report no queues when their counts cannot be read', async () => {
      mockQueueHealth.getHealthStatus.mockRejectedValueOnce(
        new Error('Connection is closed'),
      );
      const mockRes = mockResponse();

      await appController.getHealth(
        mockRes as unknown as import('express').Response,
      );

      expect(mockRes.json).toHaveBeenCalledWith(
        expect.objectContaining({ queues: [] }),
      );
    });
  });
});
