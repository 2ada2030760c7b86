import { Module } from '@nestjs/common';
import { MeetupModule } from '../meetup/meetup.module';
import { LinkingController } from './linking.controller';
import { LinkingService } from './linking.service';
import { MeetupOAuthService } from './meetup-oauth.service';

@Module({
  imports: [MeetupModule],
  controllers: [LinkingController],
  providers: [LinkingService, MeetupOAuthService],
  exports: [LinkingService],
})
export class LinkingModule {}
