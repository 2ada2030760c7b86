import { Test, TestingModule } from '@nestjs/testing';
import { getQueueToken } from '@nestjs/bullmq';
import type { Job } from 'bullmq';
import { QueueHealthService } from '../queue/queue-health.service';
import { MeetupSyncProcessor } from './meetup-sync.processor';
import { MEETUP_SYNC_QUEUE } from './meetup-sync.queue';
import { MeetupSyncService } from './meetup-sync.service';

describe('MeetupSyncProcessor', () => {
  let processor: MeetupSyncProcessor;
  let mockSyncService: { syncAll: jest.Mock };
  let mockQueue: { name: string };
  let mockQueueHealth: { register: jest.Mock; recordFailure: jest.Mock };

  beforeEach(async () => {
    mockSyncService = { syncAll: jest.fn().mockResolvedValue({ events: 4 }) };
    mockQueue = { name: MEETUP_SYNC_QUEUE };
    mockQueueHealth = { register: jest.fn(), recordFailure: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MeetupSyncProcessor,
        { provide: MeetupSyncService, useValue: mockSyncService },
        { provide: getQueueToken(MEETUP_SYNC_QUEUE), useValue: mockQueue },
        { provide: QueueHealthService, useValue: mockQueueHealth },
      ],
    }).compile();

    processor = module.get(MeetupSyncProcessor);
  });

  it('registers its queue with the health service', () => {
    processor.onModuleInit();

    expect(mockQueueHealth.register).toHaveBeenCalledWith(mockQueue);
  });

  it('runs the sync', async () => {
    const job = { data: { trigger: 'requested', requestedBy: '42' } } as unknown as Job;

    await expect(processor.process(job)).resolves.toEqual({ events: 4 });
  });

  it('propagates sync errors', async () => {
    mockSyncService.syncAll.mockRejectedValueOnce(new Error('aborted'));
    const job = { data: { trigger: 'scheduled' } } as unknown as Job;

    await expect(processor.process(job)).rejects.toThrow('aborted');
  });

  it('records failed runs', () => {
    processor.onFailed(
      { data: { trigger: 'scheduled' } } as unknown as Job,
      new Error('aborted'),
    );

    expect(mockQueueHealth.recordFailure).toHaveBeenCalledWith(
      MEETUP_SYNC_QUEUE,
      'aborted',
    );
  });
});
