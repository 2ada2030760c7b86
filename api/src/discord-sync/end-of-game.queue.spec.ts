import { Test, TestingModule } from '@nestjs/testing';
import { getQueueToken } from '@nestjs/bullmq';
import { END_OF_GAME_QUEUE, EndOfGameQueueService } from './end-of-game.queue';

describe('EndOfGameQueueService', () => {
  let service: EndOfGameQueueService;
  let mockQueue: { name: string; add: jest.Mock };

  beforeEach(async () => {
    mockQueue = {
      name: END_OF_GAME_QUEUE,
      add: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EndOfGameQueueService,
        { provide: getQueueToken(END_OF_GAME_QUEUE), useValue: mockQueue },
      ],
    }).compile();

    service = module.get(EndOfGameQueueService);
  });

  it('adds the hourly run', async () => {
    await service.scheduleRun();

    expect(mockQueue.add).toHaveBeenCalledWith(
      'scheduled',
      { trigger: 'scheduled' },
      { jobId: 'end-of-game-scheduled', removeOnComplete: true, removeOnFail: true },
    );
  });

  it('adds a run on request', async () => {
    await service.handleRunRequest({ requestedBy: '42' });

    expect(mockQueue.add).toHaveBeenCalledWith(
      'requested',
      { trigger: 'requested', requestedBy: '42' },
      expect.objectContaining({
        jobId: expect.stringMatching(/^end-of-game-requested-\d+$/),
      }),
    );
  });
});
