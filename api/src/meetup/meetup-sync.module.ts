import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { MeetupModule } from './meetup.module';
import { MeetupSyncProcessor } from './meetup-sync.processor';
import { MEETUP_SYNC_QUEUE, MeetupSyncQueueService } from './meetup-sync.queue';
import { MeetupSyncService } from './meetup-sync.service';

@Module({
  imports: [MeetupModule, BullModule.registerQueue({ name: MEETUP_SYNC_QUEUE })],
  providers: [MeetupSyncService, MeetupSyncQueueService, MeetupSyncProcessor],
})
export class MeetupSyncModule {}
