import { v4 as uuid } from "uuid";
import type { ChatErrorEvent, Envelope, EventType } from "@triad/protocol";
import type { Subscription } from "../chat/broadcaster.js";
import { RateLimiter } from "./rate-limit.js";

/** The part of a WebSocket the gateway relies on */
export interface Socket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Connection {
  socket: Socket;
  /** Set once the client has identified itself */
  participant?: string;
  /** canonical channel name → live subscription */
  subscriptions: Map<string, Subscription>;
  rateLimiter: RateLimiter;
}

const connections = new Map<Socket, Connection>();

export function addConnection(socket: Socket, rateLimiter: RateLimiter): Connection {
  const conn: Connection = {
    socket,
    subscriptions: new Map(),
    rateLimiter,
  };
  connections.set(socket, conn);
  return conn;
}

export function removeConnection(socket: Socket): Connection | undefined {
  const conn = connections.get(socket);
  connections.delete(socket);
  return conn;
}

export function getConnection(socket: Socket): Connection | undefined {
  return connections.get(socket);
}

export function getAllConnections(): Connection[] {
  return Array.from(connections.values());
}

export function envelope<T>(type: EventType, payload: T): Envelope<T> {
  return { type, id: uuid(), timestamp: Date.now(), payload };
}

/** Send an envelope to a single connection */
export function send(socket: Socket, message: Envelope): void {
  if (socket.readyState === socket.OPEN) {
    socket.send(JSON.stringify(message));
  }
}

export function sendError(socket: Socket, code: string, message: string, field?: string): void {
  const payload: ChatErrorEvent = field === undefined ? { code, message } : { code, message, field };
  send(socket, envelope<ChatErrorEvent>("chat:error", payload));
}
