import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule } from '@nestjs/throttler';
import type { Env } from '@swissrpg-bot/contract';
import { RATE_LIMIT_WINDOW_MS } from './rate-limit.decorator';
import { RealIpThrottlerGuard } from './real-ip-throttler.guard';

/** Global per-visitor limit of THROTTLE_DEFAULT_LIMIT requests a minute */
@Module({
  imports: [
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<Env, true>) => [
        {
          name: 'default',
          ttl: RATE_LIMIT_WINDOW_MS,
          limit: config.get('THROTTLE_DEFAULT_LIMIT', { infer: true }),
        },
      ],
    }),
  ],
  providers: [{ provide: APP_GUARD, useClass: RealIpThrottlerGuard }],
})
export class RateLimitModule {}
