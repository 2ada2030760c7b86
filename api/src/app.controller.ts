import { Controller, Get, Res } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import type { HealthCheckDto } from '@swissrpg-bot/contract';
import type { Response } from 'express';
import { AppService } from './app.service';

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @SkipThrottle()
  @Get('health')
  async getHealth(@Res() res: Response): Promise<void> {
    const [redisHealth, queues] = await Promise.all([
      this.appService.checkRedisHealth(),
      this.appService.getQueueHealth(),
    ]);
    const discordHealth = this.appService.checkDiscordHealth();

    const allHealthy = redisHealth.connected && discordHealth.connected;

    const health: HealthCheckDto = {
      status: allHealthy ? 'ok' : 'unhealthy',
      timestamp: new Date().toISOString(),
      redis: {
        connected: redisHealth.connected,
        latencyMs: redisHealth.latencyMs,
      },
      discord: discordHealth,
      queues,
    };

    res.status(allHealthy ? 200 : 503).json(health);
  }
}
