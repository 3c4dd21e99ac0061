import { v4 as uuid } from "uuid";
import type { Channel, ChannelType } from "@triad/protocol";
import { isUniqueViolation, parseStringArray, type Db } from "../db/database.js";
import type { Clock } from "../db/store.js";
import { canonicalDmName, type ChannelShape } from "../chat/naming.js";
import { isParticipant, type Roster } from "../chat/roster.js";
import { AlreadyExistsError, ChannelNotFoundError, ValidationError } from "../chat/errors.js";

const CHANNEL_TYPES: readonly ChannelType[] = ["group", "dm"];

interface ChannelRow {
  id: string;
  name: string;
  type: ChannelType;
  participants: string;
  description: string | null;
  last_activity_at: number | null;
  created_at: number;
}

export class ChannelStore {
  constructor(
    private db: Db,
    private roster: Roster,
    private now: Clock
  ) {}

  get(name: string): Channel | undefined {
    const row = this.db
      .prepare<[string], ChannelRow>("SELECT * FROM channels WHERE name = ?")
      .get(name);
    return row ? rowToChannel(row) : undefined;
  }

  /** All channels, ordered by name */
  list(): Channel[] {
    return this.db
      .prepare<[], ChannelRow>("SELECT * FROM channels ORDER BY name ASC")
      .all()
      .map(rowToChannel);
  }

  /** Channels the participant belongs to, most recently active first */
  listFor(participant: string): Channel[] {
    return this.db
      .prepare<[string], ChannelRow>(
        `SELECT * FROM channels c
         WHERE EXISTS (SELECT 1 FROM json_each(c.participants) WHERE value = ?)
         ORDER BY c.last_activity_at DESC, c.name ASC`
      )
      .all(participant)
      .map(rowToChannel);
  }

  create(shape: ChannelShape): Channel {
    this.validate(shape);
    const channel: Channel = {
      id: uuid(),
      name: shape.name,
      type: shape.type,
      participants: [...shape.participants],
      description: shape.description,
      lastActivityAt: null,
      createdAt: this.now(),
    };

    try {
      this.db
        .prepare(
          "INSERT INTO channels (id, name, type, participants, description, last_activity_at, created_at) VALUES (?, ?, ?, ?, ?, NULL, ?)"
        )
        .run(
          channel.id,
          channel.name,
          channel.type,
          JSON.stringify(channel.participants),
          shape.description,
          channel.createdAt
        );
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new AlreadyExistsError("channel", shape.name);
      }
      throw err;
    }

    return channel;
  }

  /** Insert-or-get: an existing channel with the same name is returned untouched */
  ensure(shape: ChannelShape): Channel {
    const existing = this.get(shape.name);
    if (existing) return existing;
    try {
      return this.create(shape);
    } catch (err) {
      const raced = err instanceof AlreadyExistsError ? this.get(shape.name) : undefined;
      if (raced) return raced;
      throw err;
    }
  }

  /** Replace the member list of a group channel */
  updateParticipants(name: string, participants: readonly string[]): Channel {
    const existing = this.get(name);
    if (!existing) {
      throw new ChannelNotFoundError(name);
    }
    const shape: ChannelShape = {
      name,
      type: existing.type,
      participants: [...participants],
      description: existing.description ?? "",
    };
    if (shape.type !== "group") {
      throw new ValidationError("type", "only group membership can change");
    }
    this.validate(shape);
    this.db
      .prepare("UPDATE channels SET participants = ? WHERE id = ?")
      .run(JSON.stringify(shape.participants), existing.id);
    return { ...existing, participants: shape.participants };
  }

  /** Record activity; last write wins */
  touch(id: string, at: number): void {
    this.db.prepare("UPDATE channels SET last_activity_at = ? WHERE id = ?").run(at, id);
  }

  /** Delete a channel together with its messages and read positions */
  delete(name: string): boolean {
    const result = this.db.prepare("DELETE FROM channels WHERE name = ?").run(name);
    return result.changes > 0;
  }

  private validate(shape: ChannelShape): void {
    if (!CHANNEL_TYPES.includes(shape.type)) {
      throw new ValidationError("type", `must be one of ${CHANNEL_TYPES.join(", ")}`);
    }
    if (shape.name.trim() === "") {
      throw new ValidationError("name", "must not be empty");
    }
    if (shape.participants.length === 0) {
      throw new ValidationError("participants", "must not be empty");
    }
    if (new Set(shape.participants).size !== shape.participants.length) {
      throw new ValidationError("participants", "must not contain duplicates");
    }
    const unknown = shape.participants.filter((p) => !isParticipant(this.roster, p));
    if (unknown.length > 0) {
      throw new ValidationError("participants", `not recognized: ${unknown.join(", ")}`);
    }
    if (shape.type === "dm") {
      if (shape.participants.length !== 2) {
        throw new ValidationError("participants", "a DM has exactly two participants");
      }
      const expected = canonicalDmName(shape.participants[0], shape.participants[1]);
      if (shape.name !== expected) {
        throw new ValidationError("name", `DM between these participants must be named "${expected}"`);
      }
    }
  }
}

function rowToChannel(row: ChannelRow): Channel {
  const channel: Channel = {
    id: row.id,
    name: row.name,
    type: row.type,
    participants: parseStringArray(row.participants),
    lastActivityAt: row.last_activity_at,
    createdAt: row.created_at,
  };
  if (row.description) {
    channel.description = row.description;
  }
  return channel;
}
