import { Module } from '@nestjs/common';
import { MeetupClientService } from './meetup-client.service';

@Module({
  providers: [MeetupClientService],
  exports: [MeetupClientService],
})
export class MeetupModule {}
