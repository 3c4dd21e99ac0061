import type { Channel } from "@triad/protocol";
import type { ChannelStore } from "./store.js";
import { canonicalGroupName, channelShapes } from "../chat/naming.js";
import { isParticipant, type Roster } from "../chat/roster.js";
import { ValidationError } from "../chat/errors.js";

/**
 * Bring stored channels in line with the roster: the group gets exactly the
 * roster's members and every pair gets its DM. A stored channel (other than
 * the group) with a member outside the roster stops startup.
 */
export function ensureDefaultChannels(channels: ChannelStore, roster: Roster): Channel[] {
  const existing = channels.list();
  const groupName = canonicalGroupName();

  const stale = existing.filter(
    (c) => c.name !== groupName && c.participants.some((p) => !isParticipant(roster, p))
  );
  if (stale.length > 0) {
    const names = stale.map((c) => c.name).join(", ");
    throw new ValidationError("participants", `stored channels have members outside the roster: ${names}`);
  }

  const seeded = channelShapes(roster).map((shape) => {
    const channel = channels.ensure(shape);
    if (channel.name === groupName && !sameMembers(channel.participants, roster.participants)) {
      console.log(`[chat] Updating ${groupName} members to ${roster.participants.join(", ")}`);
      return channels.updateParticipants(groupName, roster.participants);
    }
    return channel;
  });

  const created = channels.list().length - existing.length;
  if (created > 0) {
    console.log(`[chat] Seeded ${created} channel(s) for ${roster.participants.join(", ")}`);
  }
  return seeded;
}

function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const sorted = [...b].sort();
  return a.length === b.length && [...a].sort().every((id, i) => id === sorted[i]);
}
