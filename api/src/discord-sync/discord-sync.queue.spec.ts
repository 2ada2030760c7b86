import { Test, TestingModule } from '@nestjs/testing';
import { getQueueToken } from '@nestjs/bullmq';
import { DISCORD_SYNC_QUEUE, DiscordSyncQueueService } from './discord-sync.queue';

describe('DiscordSyncQueueService', () => {
  let service: DiscordSyncQueueService;
  let mockQueue: { name: string; add: jest.Mock };

  beforeEach(async () => {
    mockQueue = {
      name: DISCORD_SYNC_QUEUE,
      add: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DiscordSyncQueueService,
        { provide: getQueueToken(DISCORD_SYNC_QUEUE), useValue: mockQueue },
      ],
    }).compile();

    service = module.get(DiscordSyncQueueService);
  });

  it('retries a scheduled run once after a minute', async () => {
    await service.scheduleSync();

    expect(mockQueue.add).toHaveBeenCalledWith(
      'scheduled',
      { trigger: 'scheduled' },
      {
        jobId: 'discord-sync-scheduled',
        removeOnComplete: true,
        removeOnFail: true,
        attempts: 2,
        backoff: { type: 'fixed', delay: 60_000 },
      },
    );
  });

  it('logs instead of throwing when a scheduled run cannot be added', async () => {
    mockQueue.add.mockRejectedValueOnce(new Error('Connection is closed'));

    await expect(service.scheduleSync()).resolves.toBeUndefined();
  });

  it('schedules a run when the bot connects', async () => {
    await service.handleBotConnected();

    expect(mockQueue.add).toHaveBeenCalledWith(
      'scheduled',
      { trigger: 'scheduled' },
      expect.objectContaining({ jobId: 'discord-sync-scheduled' }),
    );
  });

  it('adds requested runs without retries', async () => {
    await service.handleSyncRequest({ requestedBy: '42' });

    expect(mockQueue.add).toHaveBeenCalledWith(
      'requested',
      { trigger: 'requested', requestedBy: '42' },
      {
        jobId: expect.stringMatching(/^discord-sync-requested-\d+$/),
        removeOnComplete: true,
        removeOnFail: true,
      },
    );
  });

  it('lets requesters see enqueue failures', async () => {
    mockQueue.add.mockRejectedValueOnce(new Error('Connection is closed'));

    await expect(service.handleSyncRequest({ requestedBy: '42' })).rejects.toThrow(
      'Connection is closed',
    );
  });
});
