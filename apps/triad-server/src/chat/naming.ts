import type { ChannelType } from "@triad/protocol";
import type { Roster } from "./roster.js";

const GROUP_NAME = "group";
const DM_PREFIX = "dm:";
const DM_SEPARATOR = "-";

/**
 * How callers address a channel. Plain strings are treated as shorthands
 * (see {@link buildHandleTable}) or, failing that, as raw canonical names.
 */
export type ChannelHandle =
  | { kind: "group" }
  | { kind: "dm"; between: readonly [string, string] }
  | { kind: "name"; name: string }
  | string;

export interface ChannelShape {
  name: string;
  type: ChannelType;
  participants: string[];
  description: string;
}

export function canonicalGroupName(): string {
  return GROUP_NAME;
}

/** Order-independent name for the DM between two participants */
export function canonicalDmName(a: string, b: string): string {
  const [first, second] = a < b ? [a, b] : [b, a];
  return `${DM_PREFIX}${first}${DM_SEPARATOR}${second}`;
}

export function dmShorthand(a: string, b: string): string {
  const [first, second] = a < b ? [a, b] : [b, a];
  return `dm_${first}_${second}`;
}

/** Unordered pairs of the roster, each pair sorted */
function rosterPairs(roster: Roster): Array<[string, string]> {
  const ids = [...roster.participants].sort();
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      pairs.push([ids[i], ids[j]]);
    }
  }
  return pairs;
}

/** Shorthand → canonical name lookup: "group" plus one "dm_<a>_<b>" per pair */
export function buildHandleTable(roster: Roster): ReadonlyMap<string, string> {
  const table = new Map<string, string>([[GROUP_NAME, GROUP_NAME]]);
  for (const [a, b] of rosterPairs(roster)) {
    table.set(dmShorthand(a, b), canonicalDmName(a, b));
  }
  return table;
}

export function resolveChannelName(
  handle: ChannelHandle,
  table: ReadonlyMap<string, string>
): string {
  if (typeof handle === "string") {
    return table.get(handle) ?? handle;
  }
  switch (handle.kind) {
    case "group":
      return canonicalGroupName();
    case "dm":
      return canonicalDmName(handle.between[0], handle.between[1]);
    case "name":
      return handle.name;
  }
}

/** Every channel that exists for a roster: the group and one DM per pair */
export function channelShapes(roster: Roster): ChannelShape[] {
  const shapes: ChannelShape[] = [
    {
      name: canonicalGroupName(),
      type: "group",
      participants: [...roster.participants],
      description: "Group chat for all participants",
    },
  ];
  for (const [a, b] of rosterPairs(roster)) {
    shapes.push({
      name: canonicalDmName(a, b),
      type: "dm",
      participants: [a, b],
      description: `Direct messages: ${a} ↔ ${b}`,
    });
  }
  return shapes;
}
