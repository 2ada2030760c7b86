import { Injectable, Logger } from '@nestjs/common';

/**
 * Process-level actions triggered from Discord.
 */
@Injectable()
export class BotLifecycleService {
  private readonly logger = new Logger(BotLifecycleService.name);

  /**
   * Ask the process to exit. SIGTERM runs Nest's shutdown hooks (gateway
   * disconnect, queue workers, Redis); systemd counts a SIGTERM exit as
   * clean, so `Restart=on-failure` leaves the service stopped.
   */
  requestShutdown(requestedBy: string): void {
    this.logger.warn(`Shutdown requested by Discord user ${requestedBy}`);
    process.kill(process.pid, 'SIGTERM');
  }
}
