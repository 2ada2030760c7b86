import { BotLifecycleService } from './bot-lifecycle.service';

describe('BotLifecycleService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sends SIGTERM to its own process', () => {
    const kill = jest.spyOn(process, 'kill').mockImplementation(() => true);

    new BotLifecycleService().requestShutdown('222222222222222222');

    expect(kill).toHaveBeenCalledWith(process.pid, 'SIGTERM');
  });
});
