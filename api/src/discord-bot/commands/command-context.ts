import type { MessagePayload } from '../discord-bot-client.service';

/**
 * The message a command arrived in, reduced to what handlers need.
 * Built by MessageListener from a discord.js Message.
 */
export interface CommandContext {
  authorId: string;
  channelId: string;
  isDm: boolean;
  /** Post in the channel the command was written in */
  say(payload: MessagePayload): Promise<void>;
  /** Send a direct message to the author */
  dm(payload: MessagePayload): Promise<void>;
  /** React to the command message */
  react(emoji: string): Promise<void>;
}
