import type { WebSocket, RawData } from "ws";
import { z, ZodError } from "zod";
import type {
  Channel,
  ChannelHistoryEvent,
  ChannelMessageEvent,
  ChannelReadEvent,
  ChannelSubscribedEvent,
  ChannelUnreadEvent,
  ChatEvent,
  CommandPayloads,
  CommandType,
  EventType,
  SessionWelcomeEvent,
} from "@triad/protocol";
import type { ChatService } from "../chat/service.js";
import type { Subscription } from "../chat/broadcaster.js";
import { ChatError, ValidationError } from "../chat/errors.js";
import type { Clock } from "../db/store.js";
import {
  addConnection,
  envelope,
  getAllConnections,
  removeConnection,
  send,
  sendError,
  type Connection,
  type Socket,
} from "./connections.js";
import { RateLimiter } from "./rate-limit.js";

const HISTORY_PAGE = 100;

export interface GatewayOptions {
  rateLimitMax: number;
  rateLimitWindowMs: number;
  now?: Clock;
}

const EnvelopeSchema = z.object({
  type: z.string(),
  id: z.string().optional(),
  timestamp: z.number().optional(),
  payload: z.unknown(),
});

const channelRef = z.object({ channel: z.string().min(1) });

const commandSchemas = {
  "session:identify": z.object({ participant: z.string().min(1) }),
  "channel:subscribe": channelRef,
  "channel:unsubscribe": channelRef,
  "channel:message": channelRef.extend({
    content: z.string(),
    type: z.enum(["text", "system", "code"]).optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  }),
  "channel:fetch-history": channelRef.extend({
    limit: z.number().int().positive().optional(),
    since: z.number().optional(),
    before: z.number().optional(),
  }),
  "channel:unread": channelRef,
  "channel:mark-read": channelRef.extend({ messageId: z.string().min(1).optional() }),
  "message:edit": channelRef.extend({ messageId: z.string().min(1), content: z.string() }),
  "message:delete": channelRef.extend({ messageId: z.string().min(1) }),
} satisfies { [K in CommandType]: z.ZodType<CommandPayloads[K]> };

type Command = {
  [K in CommandType]: { type: K; payload: CommandPayloads[K] };
}[CommandType];

/** Refusal raised by the gateway itself rather than the chat core */
class GatewayError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

function isCommandType(type: string): type is CommandType {
  return Object.prototype.hasOwnProperty.call(commandSchemas, type);
}

function parseCommand(raw: string): Command {
  const { type, payload } = EnvelopeSchema.parse(JSON.parse(raw));
  if (!isCommandType(type)) {
    throw new GatewayError("UNKNOWN_TYPE", `Unknown message type: ${type}`);
  }
  switch (type) {
    case "session:identify":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "channel:subscribe":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "channel:unsubscribe":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "channel:message":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "channel:fetch-history":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "channel:unread":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "channel:mark-read":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "message:edit":
      return { type, payload: commandSchemas[type].parse(payload) };
    case "message:delete":
      return { type, payload: commandSchemas[type].parse(payload) };
  }
}

function eventType(event: ChatEvent): EventType {
  return event.type === "message:new" ? "channel:message" : event.type;
}

/**
 * WebSocket front end of the chat core. Each connection identifies as one
 * participant, then subscribes to channels and issues commands.
 */
export class ChatGateway {
  constructor(
    private chat: ChatService,
    private options: GatewayOptions
  ) {}

  /** Wire a live WebSocket into the gateway */
  handleConnection(ws: WebSocket): void {
    const conn = this.open(ws);
    ws.on("message", (data: RawData) => {
      this.receive(conn, data.toString());
    });
    ws.on("close", () => {
      this.close(conn);
    });
  }

  open(socket: Socket): Connection {
    return addConnection(
      socket,
      new RateLimiter(this.options.rateLimitMax, this.options.rateLimitWindowMs, this.options.now)
    );
  }

  receive(conn: Connection, raw: string): void {
    if (!conn.rateLimiter.check()) {
      sendError(conn.socket, "RATE_LIMITED", "Too many messages, slow down");
      return;
    }

    let command: Command;
    try {
      command = parseCommand(raw);
    } catch (err) {
      this.reject(conn, err, "INVALID_MESSAGE");
      return;
    }

    try {
      this.dispatch(conn, command);
    } catch (err) {
      this.reject(conn, err, "INTERNAL");
    }
  }

  /** Drop the connection and release every subscription it holds */
  close(conn: Connection): void {
    for (const subscription of conn.subscriptions.values()) {
      this.chat.unsubscribe(subscription);
    }
    conn.subscriptions.clear();
    removeConnection(conn.socket);
  }

  /** Close every open connection; used on shutdown */
  closeAll(): void {
    for (const conn of getAllConnections()) {
      this.close(conn);
      conn.socket.close(1001, "Server shutting down");
    }
  }

  private dispatch(conn: Connection, command: Command): void {
    if (command.type === "session:identify") {
      this.identify(conn, command.payload.participant);
      return;
    }

    const participant = conn.participant;
    if (participant === undefined) {
      throw new GatewayError("NOT_IDENTIFIED", "Identify with session:identify first");
    }

    switch (command.type) {
      case "channel:subscribe":
        this.subscribe(conn, participant, command.payload.channel);
        break;
      case "channel:unsubscribe":
        this.unsubscribe(conn, command.payload.channel);
        break;
      case "channel:message": {
        const { channel, content, type, metadata } = command.payload;
        this.chat.sendMessage(channel, participant, content, { type, metadata });
        break;
      }
      case "channel:fetch-history": {
        const { channel, ...range } = command.payload;
        const name = this.chat.resolve(channel);
        if (!conn.subscriptions.has(name)) {
          throw new GatewayError("NOT_JOINED", "Subscribe to the channel first");
        }
        const limit = this.chat.pageSize(range.limit ?? HISTORY_PAGE);
        const messages = this.chat.getMessages(name, { ...range, limit });
        send(
          conn.socket,
          envelope<ChannelHistoryEvent>("channel:history", {
            channel: name,
            messages,
            hasMore: messages.length >= limit,
          })
        );
        break;
      }
      case "channel:unread": {
        const channel = this.memberChannel(participant, command.payload.channel);
        const messages = this.chat.getUnread(channel.name, participant);
        send(
          conn.socket,
          envelope<ChannelUnreadEvent>("channel:unread", {
            channel: channel.name,
            messages,
            count: messages.length,
          })
        );
        break;
      }
      case "channel:mark-read": {
        const channel = this.memberChannel(participant, command.payload.channel);
        const position = this.chat.markRead(channel.name, participant, command.payload.messageId);
        send(conn.socket, envelope<ChannelReadEvent>("channel:read", { channel: channel.name, position }));
        break;
      }
      case "message:edit": {
        const { channel, messageId, content } = command.payload;
        this.assertAuthor(participant, channel, messageId);
        this.chat.editMessage(channel, messageId, content);
        break;
      }
      case "message:delete": {
        const { channel, messageId } = command.payload;
        this.assertAuthor(participant, channel, messageId);
        this.chat.deleteMessage(channel, messageId);
        break;
      }
    }
  }

  private identify(conn: Connection, participant: string): void {
    if (conn.participant !== undefined && conn.participant !== participant) {
      throw new GatewayError("IDENTITY_MISMATCH", "Cannot change identity on an open connection");
    }
    const channels = this.chat.listChannelsFor(participant);
    const unread = this.chat.unreadSummary(participant);
    conn.participant = participant;
    console.log(`[ws] ${participant} connected`);
    send(conn.socket, envelope<SessionWelcomeEvent>("session:welcome", { participant, channels, unread }));
  }

  private subscribe(conn: Connection, participant: string, handle: string): void {
    const channel = this.memberChannel(participant, handle);

    if (!conn.subscriptions.has(channel.name)) {
      const subscription = this.chat.subscribe(channel.name);
      conn.subscriptions.set(channel.name, subscription);
      this.pump(conn, subscription);
    }

    send(conn.socket, envelope<ChannelSubscribedEvent>("channel:subscribed", { channel: channel.name }));

    const limit = this.chat.pageSize(HISTORY_PAGE);
    const messages = this.chat.getMessages(channel.name, { limit });
    send(
      conn.socket,
      envelope<ChannelHistoryEvent>("channel:history", {
        channel: channel.name,
        messages,
        hasMore: messages.length >= limit,
      })
    );
  }

  private unsubscribe(conn: Connection, handle: string): void {
    const name = this.chat.resolve(handle);
    const subscription = conn.subscriptions.get(name);
    if (subscription) {
      conn.subscriptions.delete(name);
      this.chat.unsubscribe(subscription);
    }
    send(conn.socket, envelope<ChannelSubscribedEvent>("channel:unsubscribed", { channel: name }));
  }

  /** Forward broadcast events to the socket until the subscription closes */
  private pump(conn: Connection, subscription: Subscription): void {
    const run = async (): Promise<void> => {
      for await (const event of subscription) {
        send(
          conn.socket,
          envelope<ChannelMessageEvent>(eventType(event), { channel: event.channel, message: event.message })
        );
      }
      if (subscription.overflowed) {
        conn.subscriptions.delete(subscription.topic);
        sendError(conn.socket, "SUBSCRIPTION_OVERFLOW", `Dropped subscription to ${subscription.topic}; resubscribe to catch up`);
      }
    };
    run().catch((err: unknown) => {
      console.error(`[ws] Delivery to ${conn.participant ?? "anonymous"} failed:`, err);
    });
  }

  private memberChannel(participant: string, handle: string): Channel {
    const channel = this.chat.getChannel(handle);
    if (!channel.participants.includes(participant)) {
      throw new GatewayError("FORBIDDEN", `You are not a participant of ${channel.name}`);
    }
    return channel;
  }

  private assertAuthor(participant: string, handle: string, messageId: string): void {
    const message = this.chat.getMessage(handle, messageId);
    if (message.sender !== participant) {
      throw new GatewayError("FORBIDDEN", "Only the sender can change a message");
    }
  }

  private reject(conn: Connection, err: unknown, fallbackCode: string): void {
    if (err instanceof GatewayError || err instanceof ChatError) {
      sendError(conn.socket, err.code, err.message, err instanceof ValidationError ? err.field : undefined);
      return;
    }
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const field = issue?.path.join(".") || "payload";
      sendError(conn.socket, "VALIDATION_FAILED", `Invalid ${field}: ${issue?.message ?? "malformed"}`, field);
      return;
    }
    if (err instanceof SyntaxError) {
      sendError(conn.socket, "INVALID_MESSAGE", "Failed to parse message");
      return;
    }
    console.error(`[ws] Command failed:`, err);
    sendError(conn.socket, fallbackCode, "Command failed");
  }
}
