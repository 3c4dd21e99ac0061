import { parseRoster, type Roster } from "./chat/roster.js";
import type { OverflowPolicy } from "./chat/broadcaster.js";

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  roster: Roster;
  /** Upper bound applied to every history page */
  maxPageSize: number;
  subscriberBuffer: number;
  subscriberOverflow: OverflowPolicy;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

function parseOverflow(raw: string | undefined): OverflowPolicy {
  if (raw === undefined || raw === "" || raw === "drop-oldest") return "drop-oldest";
  if (raw === "disconnect") return "disconnect";
  throw new Error(`SUBSCRIBER_OVERFLOW must be "drop-oldest" or "disconnect", got "${raw}"`);
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** Build the server configuration from an environment map */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT ?? "9000", 10),
    host: env.HOST ?? "0.0.0.0",
    dataDir: env.DATA_DIR ?? "./data",
    roster: parseRoster(
      (env.CHAT_PARTICIPANTS ?? "ana,ben,cleo")
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    ),
    maxPageSize: parsePositiveInt("MAX_PAGE_SIZE", env.MAX_PAGE_SIZE, 500),
    subscriberBuffer: parsePositiveInt("SUBSCRIBER_BUFFER", env.SUBSCRIBER_BUFFER, 256),
    subscriberOverflow: parseOverflow(env.SUBSCRIBER_OVERFLOW),
    rateLimitMax: parsePositiveInt("RATE_LIMIT_MAX", env.RATE_LIMIT_MAX, 30),
    rateLimitWindowMs: parsePositiveInt("RATE_LIMIT_WINDOW_MS", env.RATE_LIMIT_WINDOW_MS, 10000),
  };
}
