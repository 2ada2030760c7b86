import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type { Env } from '@swissrpg-bot/contract';
import { redisConnectionOptions } from './redis-connection';

export const REDIS_CLIENT = 'REDIS_CLIENT';

/**
 * Global Redis module. Redis is the bot's only store: account links,
 * event series, channel and role mappings all live here.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Env, true>) => {
        const url = configService.get('REDIS_URL', { infer: true });
        return new Redis(redisConnectionOptions(url));
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnApplicationShutdown {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async onApplicationShutdown(): Promise<void> {
    await this.redis.quit();
  }
}
