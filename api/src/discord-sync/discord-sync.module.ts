import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { DiscordBotModule } from '../discord-bot/discord-bot.module';
import { DiscordSyncProcessor } from './discord-sync.processor';
import { DISCORD_SYNC_QUEUE, DiscordSyncQueueService } from './discord-sync.queue';
import { DiscordSyncService } from './discord-sync.service';
import { EndOfGameProcessor } from './end-of-game.processor';
import { END_OF_GAME_QUEUE, EndOfGameQueueService } from './end-of-game.queue';
import { EndOfGameService } from './end-of-game.service';

@Module({
  imports: [
    DiscordBotModule,
    BullModule.registerQueue(
      { name: DISCORD_SYNC_QUEUE },
      { name: END_OF_GAME_QUEUE },
    ),
  ],
  providers: [
    DiscordSyncService,
    DiscordSyncQueueService,
    DiscordSyncProcessor,
    EndOfGameService,
    EndOfGameQueueService,
    EndOfGameProcessor,
  ],
})
export class DiscordSyncModule {}
