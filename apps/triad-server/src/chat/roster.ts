import { ValidationError } from "./errors.js";

/** Pseudo-participant used for system announcements; never part of a roster */
export const SYSTEM_SENDER = "system";

const PARTICIPANT_ID = /^[a-z0-9]+$/;

/** The closed, immutable set of recognized participants */
export interface Roster {
  readonly participants: readonly string[];
}

export function parseRoster(ids: readonly string[]): Roster {
  if (ids.length === 0) {
    throw new ValidationError("participants", "roster must not be empty");
  }
  const seen = new Set<string>();
  for (const id of ids) {
    if (!PARTICIPANT_ID.test(id)) {
      throw new ValidationError("participants", `"${id}" must match ${PARTICIPANT_ID}`);
    }
    if (id === SYSTEM_SENDER) {
      throw new ValidationError("participants", `"${SYSTEM_SENDER}" is reserved`);
    }
    if (seen.has(id)) {
      throw new ValidationError("participants", `"${id}" is listed twice`);
    }
    seen.add(id);
  }
  return Object.freeze({ participants: Object.freeze([...ids].sort()) });
}

export function isParticipant(roster: Roster, id: string): boolean {
  return roster.participants.includes(id);
}
