import { v4 as uuid } from "uuid";
import type { Channel, ChatMessage, MessageType, ReadPosition } from "@triad/protocol";
import { isRecord, parseRecord, type Db } from "../db/database.js";
import type { Clock } from "../db/store.js";
import { isParticipant, SYSTEM_SENDER, type Roster } from "../chat/roster.js";
import { SenderNotInChannelError, ValidationError } from "../chat/errors.js";

export const MAX_CONTENT_LENGTH = 50_000;
export const MESSAGE_TYPES: readonly MessageType[] = ["text", "system", "code"];

export interface NewMessage {
  sender: string;
  content: string;
  type?: MessageType;
  metadata?: Record<string, unknown>;
}

export interface MessageQuery {
  /** Exclusive lower bound on createdAt */
  since?: number;
  /** Exclusive upper bound on createdAt */
  before?: number;
  /** Keep the newest N matches */
  limit: number;
  includeDeleted?: boolean;
}

interface MessageRow {
  seq: number;
  id: string;
  channel_id: string;
  sender: string;
  content: string;
  type: MessageType;
  metadata: string;
  is_deleted: number;
  edited_at: number | null;
  created_at: number;
}

export function validateContent(content: unknown): string {
  if (typeof content !== "string") {
    throw new ValidationError("content", "must be a string");
  }
  if (content.length === 0) {
    throw new ValidationError("content", "must not be empty");
  }
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new ValidationError("content", `must be at most ${MAX_CONTENT_LENGTH} characters`);
  }
  return content;
}

export class MessageStore {
  constructor(
    private db: Db,
    private roster: Roster,
    private now: Clock
  ) {}

  /**
   * Append a message to a channel. The sender must be on the roster and a
   * participant of the channel, or the system pseudo-sender.
   */
  insert(channel: Channel, input: NewMessage): ChatMessage {
    if (input.sender !== SYSTEM_SENDER) {
      if (!isParticipant(this.roster, input.sender)) {
        throw new ValidationError("sender", `not recognized: ${input.sender}`);
      }
      if (!channel.participants.includes(input.sender)) {
        throw new SenderNotInChannelError(input.sender, channel.name);
      }
    }
    const content = validateContent(input.content);
    const type = input.type ?? "text";
    if (!MESSAGE_TYPES.includes(type)) {
      throw new ValidationError("type", `must be one of ${MESSAGE_TYPES.join(", ")}`);
    }
    const supplied = input.metadata ?? {};
    if (!isRecord(supplied)) {
      throw new ValidationError("metadata", "must be an object");
    }
    // Detached from the caller's object; matches what a later read returns
    const serializedMetadata = JSON.stringify(supplied);
    const metadata = parseRecord(serializedMetadata);

    const append = this.db.transaction((): ChatMessage => {
      const message: ChatMessage = {
        id: uuid(),
        channelId: channel.id,
        sender: input.sender,
        content,
        type,
        metadata,
        deleted: false,
        editedAt: null,
        createdAt: this.now(),
      };
      this.db
        .prepare(
          `INSERT INTO messages (id, channel_id, sender, content, type, metadata, is_deleted, edited_at, created_at)
           VALUES (?, ?, ?, ?, ?, ?, 0, NULL, ?)`
        )
        .run(
          message.id,
          message.channelId,
          message.sender,
          message.content,
          message.type,
          serializedMetadata,
          message.createdAt
        );
      return message;
    });

    return append();
  }

  get(id: string): ChatMessage | undefined {
    const row = this.db
      .prepare<[string], MessageRow>("SELECT * FROM messages WHERE id = ?")
      .get(id);
    return row ? rowToMessage(row) : undefined;
  }

  /** Messages within the bounds, ascending; `limit` keeps the most recent ones */
  query(channelId: string, query: MessageQuery): ChatMessage[] {
    const conditions = ["channel_id = ?"];
    const params: Array<string | number> = [channelId];
    if (!query.includeDeleted) {
      conditions.push("is_deleted = 0");
    }
    if (query.since !== undefined) {
      conditions.push("created_at > ?");
      params.push(query.since);
    }
    if (query.before !== undefined) {
      conditions.push("created_at < ?");
      params.push(query.before);
    }
    params.push(query.limit);

    const rows = this.db
      .prepare<Array<string | number>, MessageRow>(
        `SELECT * FROM messages WHERE ${conditions.join(" AND ")}
         ORDER BY created_at DESC, seq DESC LIMIT ?`
      )
      .all(...params);

    return rows.map(rowToMessage).reverse();
  }

  /** Newest message of a channel, soft-deleted ones included */
  newest(channelId: string): ChatMessage | undefined {
    const row = this.db
      .prepare<[string], MessageRow>(
        "SELECT * FROM messages WHERE channel_id = ? ORDER BY created_at DESC, seq DESC LIMIT 1"
      )
      .get(channelId);
    return row ? rowToMessage(row) : undefined;
  }

  /** Non-deleted messages after the read cursor, ascending */
  unread(channelId: string, position: ReadPosition): ChatMessage[] {
    const [where, params] = this.unreadFilter(channelId, position);
    return this.db
      .prepare<Array<string | number>, MessageRow>(
        `SELECT * FROM messages WHERE ${where} ORDER BY created_at ASC, seq ASC`
      )
      .all(...params)
      .map(rowToMessage);
  }

  countUnread(channelId: string, position: ReadPosition): number {
    const [where, params] = this.unreadFilter(channelId, position);
    const row = this.db
      .prepare<Array<string | number>, { count: number }>(
        `SELECT COUNT(*) AS count FROM messages WHERE ${where}`
      )
      .get(...params);
    return row?.count ?? 0;
  }

  /** Insertion sequence of a message, 0 when there is none */
  private seqOf(id: string | null): number {
    if (id === null) return 0;
    const row = this.db
      .prepare<[string], { seq: number }>("SELECT seq FROM messages WHERE id = ?")
      .get(id);
    return row?.seq ?? 0;
  }

  edit(id: string, content: string): ChatMessage | undefined {
    const checked = validateContent(content);
    this.db
      .prepare("UPDATE messages SET content = ?, edited_at = ? WHERE id = ?")
      .run(checked, this.now(), id);
    return this.get(id);
  }

  /** Mark a message deleted; the row and its ordering slot stay */
  softDelete(id: string): ChatMessage | undefined {
    this.db.prepare("UPDATE messages SET is_deleted = 1 WHERE id = ?").run(id);
    return this.get(id);
  }

  private unreadFilter(
    channelId: string,
    position: ReadPosition
  ): [string, Array<string | number>] {
    if (position.lastReadAt === null) {
      return ["channel_id = ? AND is_deleted = 0", [channelId]];
    }
    // Messages stamped in the same millisecond as the cursor are ordered by seq
    const cursorSeq = this.seqOf(position.lastReadMessageId);
    return [
      "channel_id = ? AND is_deleted = 0 AND (created_at > ? OR (created_at = ? AND seq > ?))",
      [channelId, position.lastReadAt, position.lastReadAt, cursorSeq],
    ];
  }
}

function rowToMessage(row: MessageRow): ChatMessage {
  return {
    id: row.id,
    channelId: row.channel_id,
    sender: row.sender,
    content: row.content,
    type: row.type,
    metadata: parseRecord(row.metadata),
    deleted: row.is_deleted === 1,
    editedAt: row.edited_at,
    createdAt: row.created_at,
  };
}
