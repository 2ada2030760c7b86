import { Module } from '@nestjs/common';
import { LinkingModule } from '../linking/linking.module';
import { MeetupModule } from '../meetup/meetup.module';
import { DiscordBotService } from './discord-bot.service';
import { DiscordBotClientService } from './discord-bot-client.service';
import { CommandRouterService } from './commands/command-router.service';
import { MemberLinkingService } from './services/member-linking.service';
import { ChannelAdminService } from './services/channel-admin.service';
import { BotLifecycleService } from './services/bot-lifecycle.service';
import { MessageListener } from './listeners/message.listener';
import { GuildMemberListener } from './listeners/guild-member.listener';

@Module({
  imports: [LinkingModule, MeetupModule],
  providers: [
    DiscordBotService,
    DiscordBotClientService,
    CommandRouterService,
    MemberLinkingService,
    ChannelAdminService,
    BotLifecycleService,
    MessageListener,
    GuildMemberListener,
  ],
  exports: [DiscordBotService, DiscordBotClientService],
})
export class DiscordBotModule {}
