import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import type { Env } from '@swissrpg-bot/contract';
import { redisConnectionOptions } from '../redis/redis-connection';
import { QueueHealthService } from './queue-health.service';

/**
 * BullMQ on the same Redis as the bot's data, under its own `sync` key
 * prefix so queue keys never mix with account or channel mappings.
 */
@Global()
@Module({
  imports: [
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<Env, true>) => ({
        connection: redisConnectionOptions(config.get('REDIS_URL', { infer: true })),
        prefix: 'sync',
      }),
    }),
  ],
  providers: [QueueHealthService],
  exports: [BullModule, QueueHealthService],
})
export class QueueModule {}
