import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ChannelType,
  Client,
  DiscordAPIError,
  Events,
  GatewayIntentBits,
  OverwriteType,
  Partials,
  RESTJSONErrorCodes,
  Routes,
  type Guild,
  type MessageCreateOptions,
  type PermissionOverwriteOptions,
  type PermissionsString,
} from 'discord.js';
import type { Env } from '@swissrpg-bot/contract';
import {
  DISCORD_BOT_EVENTS,
  friendlyDiscordErrorMessage,
} from './discord-bot.constants';

/** Connection attempts that take longer than this are abandoned */
const CONNECT_TIMEOUT_MS = 15_000;

export type MessagePayload = string | MessageCreateOptions;

/**
 * One permission overwrite of a channel. Applying it replaces any
 * existing overwrite for the same role or member.
 */
export interface ChannelPermissionOverwrite {
  id: string;
  type: 'role' | 'member';
  allow: PermissionsString[];
  deny: PermissionsString[];
}

export interface CreatedGuildObject {
  id: string;
  name: string;
}

export interface TextChannelState {
  topic: string | null;
  parentId: string | null;
}

function isNotFound(error: unknown): boolean {
  return error instanceof DiscordAPIError && error.status === 404;
}

function toOverwriteOptions(
  overwrite: ChannelPermissionOverwrite,
): PermissionOverwriteOptions {
  const options: PermissionOverwriteOptions = {};
  for (const permission of overwrite.allow) options[permission] = true;
  for (const permission of overwrite.deny) options[permission] = false;
  return options;
}

/**
 * Owns the discord.js gateway client and wraps every Discord call the bot
 * makes against its single configured guild.
 */
@Injectable()
export class DiscordBotClientService {
  private readonly logger = new Logger(DiscordBotClientService.name);
  private client: Client | null = null;
  private connecting = false;

  constructor(
    private readonly eventEmitter: EventEmitter2,
    private readonly configService: ConfigService<Env, true>,
  ) {}

  async connect(token: string): Promise<void> {
    // Disconnect any existing client first
    if (this.client) {
      await this.disconnect();
    }

    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
      // DM channels are not cached until a message arrives in them
      partials: [Partials.Channel],
    });
    this.client = client;
    this.connecting = true;

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.connecting = false;
        reject(
          new Error(
            `Discord bot connection timed out after ${CONNECT_TIMEOUT_MS / 1000}s`,
          ),
        );
      }, CONNECT_TIMEOUT_MS);

      client.once(Events.ClientReady, (readyClient) => {
        clearTimeout(timeout);
        this.connecting = false;
        this.logger.log(`${readyClient.user.tag} is connected!`);

        // emitAsync so listeners attach before connect() resolves.
        // Errors in handlers are logged but do not reject connect().
        this.eventEmitter
          .emitAsync(DISCORD_BOT_EVENTS.CONNECTED)
          .catch((err: unknown) => {
            this.logger.error(
              'Error in CONNECTED event handlers:',
              err instanceof Error ? err.message : err,
            );
          })
          .finally(() => {
            resolve();
          });
      });

      client.once(Events.Error, (error: Error) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(error);
        this.logger.error('Discord bot connection error:', message);
        this.eventEmitter.emit(DISCORD_BOT_EVENTS.ERROR, error);
        reject(new Error(message));
      });

      client.login(token).catch((err: unknown) => {
        clearTimeout(timeout);
        this.connecting = false;
        const message = friendlyDiscordErrorMessage(err);
        this.logger.error('Discord bot login failed:', message);
        this.client = null;
        reject(new Error(message));
      });
    });
  }

  async disconnect(): Promise<void> {
    this.connecting = false;

    if (!this.client) return;

    try {
      await this.client.destroy();
      this.logger.log('Discord bot disconnected');
      this.eventEmitter.emit(DISCORD_BOT_EVENTS.DISCONNECTED);
    } catch (error) {
      this.logger.error('Error disconnecting Discord bot:', error);
    } finally {
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.isReady() ?? false;
  }

  isConnecting(): boolean {
    return this.connecting;
  }

  /**
   * Get the underlying discord.js Client instance.
   * Used by listeners to attach gateway event handlers.
   */
  getClient(): Client | null {
    return this.client;
  }

  /** The bot's own user id, once connected */
  getBotUserId(): string | null {
    if (!this.client?.isReady()) return null;
    return this.client.user.id;
  }

  getGuildId(): string {
    return this.configService.get('DISCORD_GUILD_ID', { infer: true });
  }

  private requireClient(): Client<true> {
    if (!this.client?.isReady()) {
      throw new Error('Discord bot is not connected');
    }
    return this.client;
  }

  private async getGuild(): Promise<Guild> {
    return this.requireClient().guilds.fetch(this.getGuildId());
  }

  async memberHasRole(userId: string, roleId: string): Promise<boolean> {
    const guild = await this.getGuild();
    try {
      const member = await guild.members.fetch(userId);
      return member.roles.cache.has(roleId);
    } catch (error) {
      if (
        error instanceof DiscordAPIError &&
        error.code === RESTJSONErrorCodes.UnknownMember
      ) {
        return false;
      }
      throw error;
    }
  }

  /** Whether the user holds the configured organizer role */
  async isOrganizer(userId: string): Promise<boolean> {
    return this.memberHasRole(
      userId,
      this.configService.get('DISCORD_ORGANIZER_ROLE_ID', { infer: true }),
    );
  }

  async addMemberRole(userId: string, roleId: string): Promise<void> {
    await this.requireClient().rest.put(
      Routes.guildMemberRole(this.getGuildId(), userId, roleId),
    );
  }

  async removeMemberRole(userId: string, roleId: string): Promise<void> {
    await this.requireClient().rest.delete(
      Routes.guildMemberRole(this.getGuildId(), userId, roleId),
    );
  }

  async sendDirectMessage(
    userId: string,
    payload: MessagePayload,
  ): Promise<void> {
    const user = await this.requireClient().users.fetch(userId);
    await user.send(payload);
  }

  async sendChannelMessage(
    channelId: string,
    payload: MessagePayload,
  ): Promise<void> {
    const channel = await this.requireClient().channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new Error(`Channel ${channelId} not found or not a text channel`);
    }
    await channel.send(payload);
  }

  async createTextChannel(
    name: string,
    overwrites: ChannelPermissionOverwrite[],
  ): Promise<CreatedGuildObject> {
    const guild = await this.getGuild();
    const channel = await guild.channels.create({
      name,
      type: ChannelType.GuildText,
      permissionOverwrites: overwrites.map((overwrite) => ({
        id: overwrite.id,
        type:
          overwrite.type === 'role' ? OverwriteType.Role : OverwriteType.Member,
        allow: overwrite.allow,
        deny: overwrite.deny,
      })),
    });
    return { id: channel.id, name: channel.name };
  }

  /**
   * Whether the channel still exists on Discord.
   * Only a 404 counts as "gone"; any other failure is rethrown.
   */
  async channelExists(channelId: string): Promise<boolean> {
    try {
      const channel = await this.requireClient().channels.fetch(channelId);
      return channel !== null;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async deleteChannel(channelId: string): Promise<void> {
    await this.requireClient().rest.delete(Routes.channel(channelId));
  }

  async createRole(name: string): Promise<CreatedGuildObject> {
    const guild = await this.getGuild();
    const role = await guild.roles.create({ name, permissions: [] });
    return { id: role.id, name: role.name };
  }

  /** Checks the role cache first and only then asks Discord */
  async roleExists(roleId: string): Promise<boolean> {
    const guild = await this.getGuild();
    if (guild.roles.cache.has(roleId)) return true;
    const role = await guild.roles.fetch(roleId);
    return role !== null;
  }

  async deleteRole(roleId: string): Promise<void> {
    const guild = await this.getGuild();
    await guild.roles.delete(roleId);
  }

  async setPermissionOverwrite(
    channelId: string,
    overwrite: ChannelPermissionOverwrite,
  ): Promise<void> {
    const channel = await this.requireClient().channels.fetch(channelId);
    if (!channel || channel.type !== ChannelType.GuildText) {
      throw new Error(`Channel ${channelId} not found or not a text channel`);
    }
    await channel.permissionOverwrites.create(
      overwrite.id,
      toOverwriteOptions(overwrite),
      {
        type:
          overwrite.type === 'role' ? OverwriteType.Role : OverwriteType.Member,
      },
    );
  }

  /** Topic and category of a guild text channel, or null for other channels */
  async getTextChannelState(
    channelId: string,
  ): Promise<TextChannelState | null> {
    const channel = await this.requireClient().channels.fetch(channelId);
    if (!channel || channel.type !== ChannelType.GuildText) return null;
    return { topic: channel.topic, parentId: channel.parentId };
  }

  async editTextChannel(
    channelId: string,
    changes: { topic: string; parentId?: string },
  ): Promise<void> {
    const channel = await this.requireClient().channels.fetch(channelId);
    if (!channel || channel.type !== ChannelType.GuildText) {
      throw new Error(`Channel ${channelId} not found or not a text channel`);
    }
    await channel.edit({
      topic: changes.topic,
      ...(changes.parentId ? { parent: changes.parentId } : {}),
    });
  }
}
