import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { validateEnv } from './config/env.validation';
import { DiscordBotModule } from './discord-bot/discord-bot.module';
import { DiscordSyncModule } from './discord-sync/discord-sync.module';
import { LinkingModule } from './linking/linking.module';
import { MeetupSyncModule } from './meetup/meetup-sync.module';
import { QueueModule } from './queue/queue.module';
import { RedisModule } from './redis/redis.module';
import { RateLimitModule } from './throttler/throttler.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    RateLimitModule,
    QueueModule,
    RedisModule,
    LinkingModule,
    DiscordBotModule,
    DiscordSyncModule,
    MeetupSyncModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
