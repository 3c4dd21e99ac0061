import type { Channel, ChatEvent, ChatMessage, MessageType, ReadPosition } from "@triad/protocol";
import type { Clock, Store } from "../db/store.js";
import { Broadcaster, type Subscription, type SubscriptionOptions } from "./broadcaster.js";
import { buildHandleTable, resolveChannelName, type ChannelHandle } from "./naming.js";
import { isParticipant, SYSTEM_SENDER, type Roster } from "./roster.js";
import {
  ChannelNotFoundError,
  MessageNotFoundError,
  MessageNotInChannelError,
  ValidationError,
} from "./errors.js";

export const DEFAULT_PAGE_SIZE = 50;

export interface SendOptions {
  type?: MessageType;
  metadata?: Record<string, unknown>;
}

export interface GetMessagesOptions {
  limit?: number;
  since?: number;
  before?: number;
  includeDeleted?: boolean;
}

export interface ChatServiceOptions {
  store: Store;
  roster: Roster;
  broadcaster?: Broadcaster;
  now?: Clock;
  /** Largest page any history request may return */
  maxPageSize?: number;
}

/**
 * Send, read and track messages across the fixed set of channels.
 *
 * Every operation resolves the channel handle first and fails with
 * ChannelNotFoundError when nothing matches. Mutations are persisted before
 * they are published, so a subscriber never sees a message that is not stored.
 */
export class ChatService {
  readonly roster: Roster;
  readonly broadcaster: Broadcaster;
  private store: Store;
  private now: Clock;
  private maxPageSize: number;
  private handles: ReadonlyMap<string, string>;

  constructor(options: ChatServiceOptions) {
    this.store = options.store;
    this.roster = options.roster;
    this.broadcaster = options.broadcaster ?? new Broadcaster();
    this.now = options.now ?? Date.now;
    this.maxPageSize = options.maxPageSize ?? 500;
    this.handles = buildHandleTable(options.roster);
  }

  resolve(handle: ChannelHandle): string {
    return resolveChannelName(handle, this.handles);
  }

  getChannel(handle: ChannelHandle): Channel {
    const name = this.resolve(handle);
    const channel = this.store.channels.get(name);
    if (!channel) {
      throw new ChannelNotFoundError(name);
    }
    return channel;
  }

  listChannels(): Channel[] {
    return this.store.channels.list();
  }

  listChannelsFor(participant: string): Channel[] {
    this.assertRecognized(participant);
    return this.store.channels.listFor(participant);
  }

  sendMessage(
    handle: ChannelHandle,
    sender: string,
    content: string,
    options: SendOptions = {}
  ): ChatMessage {
    const channel = this.getChannel(handle);
    const message = this.store.messages.insert(channel, {
      sender,
      content,
      type: options.type,
      metadata: options.metadata,
    });

    try {
      this.store.channels.touch(channel.id, message.createdAt);
    } catch (err) {
      console.warn(`[chat] Failed to update activity for ${channel.name}:`, err);
    }

    this.publish({ type: "message:new", channel: channel.name, message });
    return message;
  }

  /** Announce something in a channel as the system pseudo-participant */
  broadcastSystem(handle: ChannelHandle, content: string): ChatMessage {
    return this.sendMessage(handle, SYSTEM_SENDER, content, { type: "system" });
  }

  getMessages(handle: ChannelHandle, options: GetMessagesOptions = {}): ChatMessage[] {
    const channel = this.getChannel(handle);
    return this.store.messages.query(channel.id, {
      limit: this.pageSize(options.limit),
      since: options.since,
      before: options.before,
      includeDeleted: options.includeDeleted ?? false,
    });
  }

  getUnread(handle: ChannelHandle, participant: string): ChatMessage[] {
    const channel = this.getChannel(handle);
    const position = this.positionFor(channel, participant);
    return this.store.messages.unread(channel.id, position);
  }

  unreadCount(handle: ChannelHandle, participant: string): number {
    const channel = this.getChannel(handle);
    const position = this.positionFor(channel, participant);
    return this.store.messages.countUnread(channel.id, position);
  }

  /** Unread counts across every channel the participant belongs to */
  unreadSummary(participant: string): Record<string, number> {
    const summary: Record<string, number> = {};
    for (const channel of this.listChannelsFor(participant)) {
      const position = this.store.reads.getOrCreate(channel.id, participant);
      summary[channel.name] = this.store.messages.countUnread(channel.id, position);
    }
    return summary;
  }

  /**
   * Move the participant's cursor to a message, or to now when no message is
   * given. The cursor never moves backward.
   */
  markRead(handle: ChannelHandle, participant: string, messageId?: string): ReadPosition {
    const channel = this.getChannel(handle);
    this.assertMember(channel, participant);

    if (messageId !== undefined) {
      const message = this.messageIn(channel, messageId);
      return this.store.reads.advance(channel.id, participant, {
        at: message.createdAt,
        messageId: message.id,
      });
    }

    const newest = this.store.messages.newest(channel.id);
    const now = this.now();
    return this.store.reads.advance(channel.id, participant, {
      at: newest && newest.createdAt > now ? newest.createdAt : now,
      messageId: newest?.id ?? null,
    });
  }

  /** channel name → last read timestamp (null when nothing was read yet) */
  getReadPositions(participant: string): Record<string, number | null> {
    this.assertRecognized(participant);
    const positions: Record<string, number | null> = {};
    for (const { channel, position } of this.store.reads.listFor(participant)) {
      positions[channel] = position.lastReadAt;
    }
    return positions;
  }

  getMessage(handle: ChannelHandle, messageId: string): ChatMessage {
    return this.messageIn(this.getChannel(handle), messageId);
  }

  editMessage(handle: ChannelHandle, messageId: string, content: string): ChatMessage {
    const channel = this.getChannel(handle);
    this.messageIn(channel, messageId);
    const edited = this.store.messages.edit(messageId, content);
    if (!edited) {
      throw new MessageNotFoundError(messageId);
    }
    this.publish({ type: "message:edited", channel: channel.name, message: edited });
    return edited;
  }

  /** Soft delete: hidden from default reads, kept in storage */
  deleteMessage(handle: ChannelHandle, messageId: string): ChatMessage {
    const channel = this.getChannel(handle);
    this.messageIn(channel, messageId);
    const deleted = this.store.messages.softDelete(messageId);
    if (!deleted) {
      throw new MessageNotFoundError(messageId);
    }
    this.publish({ type: "message:deleted", channel: channel.name, message: deleted });
    return deleted;
  }

  subscribe(handle: ChannelHandle, options?: SubscriptionOptions): Subscription {
    const channel = this.getChannel(handle);
    return this.broadcaster.subscribe(channel.name, options);
  }

  unsubscribe(subscription: Subscription): void {
    this.broadcaster.unsubscribe(subscription);
  }

  /** The page size a history request actually gets: the default, or the requested size capped at the maximum */
  pageSize(limit: number | undefined): number {
    if (limit === undefined) return Math.min(DEFAULT_PAGE_SIZE, this.maxPageSize);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError("limit", "must be a positive integer");
    }
    return Math.min(limit, this.maxPageSize);
  }

  private publish(event: ChatEvent): void {
    this.broadcaster.publish(event.channel, event);
  }

  private messageIn(channel: Channel, messageId: string): ChatMessage {
    const message = this.store.messages.get(messageId);
    if (!message) {
      throw new MessageNotFoundError(messageId);
    }
    if (message.channelId !== channel.id) {
      throw new MessageNotInChannelError(messageId, channel.name);
    }
    return message;
  }

  private positionFor(channel: Channel, participant: string): ReadPosition {
    this.assertMember(channel, participant);
    return this.store.reads.getOrCreate(channel.id, participant);
  }

  private assertRecognized(participant: string): void {
    if (!isParticipant(this.roster, participant)) {
      throw new ValidationError("participant", `not recognized: ${participant}`);
    }
  }

  private assertMember(channel: Channel, participant: string): void {
    this.assertRecognized(participant);
    if (!channel.participants.includes(participant)) {
      throw new ValidationError("participant", `${participant} is not a member of ${channel.name}`);
    }
  }
}
