import { addSyncJob, syncJobId } from './sync-job';

function mockQueue() {
  return { name: 'discord-sync', add: jest.fn().mockResolvedValue({}) };
}

describe('addSyncJob', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('gives each requested run its own job id', async () => {
    const queue = mockQueue();
    jest
      .spyOn(Date, 'now')
      .mockReturnValueOnce(1_000)
      .mockReturnValueOnce(2_000);

    await addSyncJob(queue as never, { trigger: 'requested', requestedBy: '42' });
    await addSyncJob(queue as never, { trigger: 'requested', requestedBy: '42' });

    expect(queue.add).toHaveBeenNthCalledWith(
      1,
      'requested',
      { trigger: 'requested', requestedBy: '42' },
      {
        jobId: 'discord-sync-requested-1000',
        removeOnComplete: true,
        removeOnFail: true,
      },
    );
    expect(queue.add).toHaveBeenNthCalledWith(
      2,
      'requested',
      { trigger: 'requested', requestedBy: '42' },
      {
        jobId: 'discord-sync-requested-2000',
        removeOnComplete: true,
        removeOnFail: true,
      },
    );
  });

  it('keeps one job id for scheduled runs', () => {
    expect(syncJobId('meetup-sync', 'scheduled')).toBe('meetup-sync-scheduled');
    expect(syncJobId('meetup-sync', 'scheduled')).toBe('meetup-sync-scheduled');
  });

  it('adds a fixed backoff when retries are asked for', async () => {
    const queue = mockQueue();

    await addSyncJob(
      queue as never,
      { trigger: 'scheduled' },
      { attempts: 2, delayMs: 60_000 },
    );

    expect(queue.add).toHaveBeenCalledWith(
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
});
