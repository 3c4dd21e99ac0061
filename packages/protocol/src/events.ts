import type { Channel } from "./channel.js";
import type { ChatMessage, ReadPosition } from "./messages.js";

/** Server → Client events */

export interface SessionWelcomeEvent {
  participant: string;
  channels: Channel[];
  /** channel name → unread count */
  unread: Record<string, number>;
}

export interface ChatErrorEvent {
  code: string;
  message: string;
  field?: string;
}

export interface ChannelHistoryEvent {
  channel: string;
  messages: ChatMessage[];
  hasMore: boolean;
}

export interface ChannelMessageEvent {
  channel: string;
  message: ChatMessage;
}

export interface ChannelUnreadEvent {
  channel: string;
  messages: ChatMessage[];
  count: number;
}

export interface ChannelReadEvent {
  channel: string;
  position: ReadPosition;
}

export interface ChannelSubscribedEvent {
  channel: string;
}

/** Union of all event types for the type field */
export type EventType =
  | "session:welcome"
  | "chat:error"
  | "channel:subscribed"
  | "channel:unsubscribed"
  | "channel:history"
  | "channel:message"
  | "message:edited"
  | "message:deleted"
  | "channel:unread"
  | "channel:read";
