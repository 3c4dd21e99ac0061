import type { MessageType } from "./messages.js";

/** Client → Server commands */

export interface SessionIdentifyCommand {
  participant: string;
}

export interface ChannelSubscribeCommand {
  channel: string;
}

export interface ChannelUnsubscribeCommand {
  channel: string;
}

export interface ChannelMessageCommand {
  channel: string;
  content: string;
  type?: MessageType;
  metadata?: Record<string, unknown>;
}

export interface ChannelFetchHistoryCommand {
  channel: string;
  limit?: number;
  since?: number;
  before?: number; // Unix ms timestamp; fetch messages older than this
}

export interface ChannelUnreadCommand {
  channel: string;
}

export interface ChannelMarkReadCommand {
  channel: string;
  messageId?: string;
}

export interface MessageEditCommand {
  channel: string;
  messageId: string;
  content: string;
}

export interface MessageDeleteCommand {
  channel: string;
  messageId: string;
}

/** Payload carried by each command type */
export interface CommandPayloads {
  "session:identify": SessionIdentifyCommand;
  "channel:subscribe": ChannelSubscribeCommand;
  "channel:unsubscribe": ChannelUnsubscribeCommand;
  "channel:message": ChannelMessageCommand;
  "channel:fetch-history": ChannelFetchHistoryCommand;
  "channel:unread": ChannelUnreadCommand;
  "channel:mark-read": ChannelMarkReadCommand;
  "message:edit": MessageEditCommand;
  "message:delete": MessageDeleteCommand;
}

/** Union of all command types for the type field */
export type CommandType = keyof CommandPayloads;
