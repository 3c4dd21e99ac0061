import type { Db } from "./database.js";
import type { Roster } from "../chat/roster.js";
import { ChannelStore } from "../channels/store.js";
import { MessageStore } from "../messages/store.js";
import { ReadPositionStore } from "../reads/store.js";

/** Millisecond clock; injected so tests control ordering */
export type Clock = () => number;

export interface StoreOptions {
  roster: Roster;
  now?: Clock;
}

export interface Store {
  db: Db;
  channels: ChannelStore;
  messages: MessageStore;
  reads: ReadPositionStore;
}

export function createStore(db: Db, options: StoreOptions): Store {
  const now = options.now ?? Date.now;
  return {
    db,
    channels: new ChannelStore(db, options.roster, now),
    messages: new MessageStore(db, options.roster, now),
    reads: new ReadPositionStore(db, options.roster, now),
  };
}
