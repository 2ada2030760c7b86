import { Injectable, Inject } from '@nestjs/common';
import type Redis from 'ioredis';
import { DiscordBotService } from './discord-bot/discord-bot.service';
import { QueueHealthService, type QueueHealthStatus } from './queue/queue-health.service';
import { REDIS_CLIENT } from './redis/redis.module';

@Injectable()
export class AppService {
  constructor(
    @Inject(REDIS_CLIENT)
    private redis: Redis,
    private discordBot: DiscordBotService,
    private queueHealth: QueueHealthService,
  ) {}

  async checkRedisHealth(): Promise<{
    connected: boolean;
    latencyMs: number;
  }> {
    const start = Date.now();
    try {
      await this.redis.ping();
      return { connected: true, latencyMs: Date.now() - start };
    } catch {
      return { connected: false, latencyMs: Date.now() - start };
    }
  }

  checkDiscordHealth(): { connected: boolean } {
    return { connected: this.discordBot.getStatus().connected };
  }

  /** Queue counts need Redis; an unreachable Redis yields no queues */
  async getQueueHealth(): Promise<QueueHealthStatus[]> {
    try {
      return await this.queueHealth.getHealthStatus();
    } catch {
      return [];
    }
  }
}
