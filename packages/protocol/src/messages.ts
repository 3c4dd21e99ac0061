/** Every WebSocket message follows this envelope shape */
export interface Envelope<T = unknown> {
  type: string;
  id: string;
  timestamp: number;
  payload: T;
}

export type MessageType = "text" | "system" | "code";

/** A stored/transmitted chat message */
export interface ChatMessage {
  id: string;
  channelId: string;
  sender: string;
  content: string;
  type: MessageType;
  metadata: Record<string, unknown>;
  deleted: boolean;
  editedAt: number | null;
  createdAt: number;
}

/** Where a participant last read in a channel */
export interface ReadPosition {
  id: string;
  channelId: string;
  participant: string;
  /** null means nothing has been read yet */
  lastReadAt: number | null;
  lastReadMessageId: string | null;
  updatedAt: number;
}

/** Fan-out payload published on a channel topic */
export type ChatEvent =
  | { type: "message:new"; channel: string; message: ChatMessage }
  | { type: "message:edited"; channel: string; message: ChatMessage }
  | { type: "message:deleted"; channel: string; message: ChatMessage };

export type ChatErrorCode =
  | "CHANNEL_NOT_FOUND"
  | "SENDER_NOT_IN_CHANNEL"
  | "VALIDATION_FAILED"
  | "MESSAGE_NOT_FOUND"
  | "MESSAGE_NOT_IN_CHANNEL"
  | "ALREADY_EXISTS";
