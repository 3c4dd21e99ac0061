import { v4 as uuid } from "uuid";
import type { ReadPosition } from "@triad/protocol";
import type { Db } from "../db/database.js";
import type { Clock } from "../db/store.js";
import { isParticipant, type Roster } from "../chat/roster.js";
import { ValidationError } from "../chat/errors.js";

export interface ReadCursor {
  at: number;
  messageId: string | null;
}

interface ReadPositionRow {
  id: string;
  channel_id: string;
  participant: string;
  last_read_at: number | null;
  last_read_message_id: string | null;
  created_at: number;
  updated_at: number;
}

/**
 * Per-participant read cursors. At most one row exists per
 * (channel, participant); rows are created lazily on first use.
 */
export class ReadPositionStore {
  constructor(
    private db: Db,
    private roster: Roster,
    private now: Clock
  ) {}

  get(channelId: string, participant: string): ReadPosition | undefined {
    const row = this.db
      .prepare<[string, string], ReadPositionRow>(
        "SELECT * FROM read_positions WHERE channel_id = ? AND participant = ?"
      )
      .get(channelId, participant);
    return row ? rowToReadPosition(row) : undefined;
  }

  /** Insert-or-get; concurrent first use resolves to the same row */
  getOrCreate(channelId: string, participant: string): ReadPosition {
    if (!isParticipant(this.roster, participant)) {
      throw new ValidationError("participant", `not recognized: ${participant}`);
    }
    const now = this.now();
    this.db
      .prepare(
        `INSERT INTO read_positions (id, channel_id, participant, last_read_at, last_read_message_id, created_at, updated_at)
         VALUES (?, ?, ?, NULL, NULL, ?, ?)
         ON CONFLICT(channel_id, participant) DO NOTHING`
      )
      .run(uuid(), channelId, participant, now, now);

    const position = this.get(channelId, participant);
    if (!position) {
      throw new Error(`Read position for ${participant} in ${channelId} vanished after insert`);
    }
    return position;
  }

  /**
   * Move the cursor forward to `cursor`. A cursor older than the stored one
   * leaves the row unchanged. Returns the resulting position.
   */
  advance(channelId: string, participant: string, cursor: ReadCursor): ReadPosition {
    const run = this.db.transaction((): ReadPosition => {
      this.getOrCreate(channelId, participant);
      const cursorSeq = this.seqOf(cursor.messageId);
      this.db
        .prepare(
          `UPDATE read_positions
           SET last_read_at = ?, last_read_message_id = ?, updated_at = ?
           WHERE channel_id = ? AND participant = ?
             AND (
               last_read_at IS NULL
               OR last_read_at < ?
               OR (last_read_at = ?
                   AND COALESCE((SELECT seq FROM messages WHERE id = read_positions.last_read_message_id), 0) <= ?)
             )`
        )
        .run(
          cursor.at,
          cursor.messageId,
          this.now(),
          channelId,
          participant,
          cursor.at,
          cursor.at,
          cursorSeq
        );
      return this.getOrCreate(channelId, participant);
    });
    return run();
  }

  /** Every read position of a participant, keyed by channel name */
  listFor(participant: string): Array<{ channel: string; position: ReadPosition }> {
    return this.db
      .prepare<[string], ReadPositionRow & { channel_name: string }>(
        `SELECT rp.*, c.name AS channel_name FROM read_positions rp
         JOIN channels c ON c.id = rp.channel_id
         WHERE rp.participant = ?
         ORDER BY c.name ASC`
      )
      .all(participant)
      .map((row) => ({ channel: row.channel_name, position: rowToReadPosition(row) }));
  }

  private seqOf(messageId: string | null): number {
    if (messageId === null) return 0;
    const row = this.db
      .prepare<[string], { seq: number }>("SELECT seq FROM messages WHERE id = ?")
      .get(messageId);
    return row?.seq ?? 0;
  }
}

function rowToReadPosition(row: ReadPositionRow): ReadPosition {
  return {
    id: row.id,
    channelId: row.channel_id,
    participant: row.participant,
    lastReadAt: row.last_read_at,
    lastReadMessageId: row.last_read_message_id,
    updatedAt: row.updated_at,
  };
}
