import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Env } from '@swissrpg-bot/contract';
import { DiscordBotClientService } from './discord-bot-client.service';

/** Waits between startup connection attempts */
export const CONNECT_RETRY_DELAYS_MS: readonly number[] = [5_000, 15_000, 45_000];

export interface DiscordBotStatus {
  connected: boolean;
  connecting: boolean;
  guildId: string;
}

@Injectable()
export class DiscordBotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DiscordBotService.name);

  constructor(
    private readonly clientService: DiscordBotClientService,
    private readonly configService: ConfigService<Env, true>,
  ) {}

  /**
   * Connect on startup, retrying after each delay in
   * `CONNECT_RETRY_DELAYS_MS`. The last failure is rethrown so the process
   * exits non-zero and systemd restarts it.
   */
  async onModuleInit(): Promise<void> {
    const token = this.configService.get('DISCORD_TOKEN', { infer: true });
    for (let attempt = 0; ; attempt++) {
      try {
        this.logger.log('Connecting Discord bot...');
        await this.clientService.connect(token);
        return;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const delayMs = CONNECT_RETRY_DELAYS_MS[attempt];
        if (delayMs === undefined) {
          this.logger.error(
            `Failed to connect Discord bot after ${attempt + 1} attempts: ${message}`,
          );
          throw error;
        }
        this.logger.warn(
          `Failed to connect Discord bot (${message}), retrying in ${delayMs / 1000}s`,
        );
        await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.clientService.disconnect();
  }

  getStatus(): DiscordBotStatus {
    return {
      connected: this.clientService.isConnected(),
      connecting: this.clientService.isConnecting(),
      guildId: this.clientService.getGuildId(),
    };
  }
}
