import { describe, it, expect } from "vitest";
import {
  buildHandleTable,
  canonicalDmName,
  canonicalGroupName,
  channelShapes,
  resolveChannelName,
} from "./naming.js";
import { parseRoster } from "./roster.js";

const roster = parseRoster(["cleo", "ana", "ben"]);

describe("canonicalDmName", () => {
  it("is independent of argument order for every pair", () => {
    for (const a of roster.participants) {
      for (const b of roster.participants) {
        expect(canonicalDmName(a, b)).toBe(canonicalDmName(b, a));
      }
    }
  });

  it("sorts the pair and joins it under the dm prefix", () => {
    expect(canonicalDmName("ben", "ana")).toBe("dm:ana-ben");
    expect(canonicalDmName("ana", "cleo")).toBe("dm:ana-cleo");
  });
});

describe("resolveChannelName", () => {
  const table = buildHandleTable(roster);

  it("maps shorthands to canonical names", () => {
    expect(resolveChannelName("group", table)).toBe("group");
    expect(resolveChannelName("dm_ana_ben", table)).toBe("dm:ana-ben");
    expect(resolveChannelName("dm_ben_cleo", table)).toBe("dm:ben-cleo");
  });

  it("resolves tagged handles", () => {
    expect(resolveChannelName({ kind: "group" }, table)).toBe(canonicalGroupName());
    expect(resolveChannelName({ kind: "dm", between: ["cleo", "ana"] }, table)).toBe("dm:ana-cleo");
    expect(resolveChannelName({ kind: "name", name: "dm:ana-ben" }, table)).toBe("dm:ana-ben");
  });

  it("passes unknown strings through unchanged", () => {
    expect(resolveChannelName("dm:ana-ben", table)).toBe("dm:ana-ben");
    expect(resolveChannelName("lobby", table)).toBe("lobby");
  });

  it("has one shorthand per unordered pair plus the group", () => {
    expect([...table.keys()]).toEqual(["group", "dm_ana_ben", "dm_ana_cleo", "dm_ben_cleo"]);
  });

  it("keeps shorthands distinct for a larger roster", () => {
    const larger = buildHandleTable(parseRoster(["a", "ab", "b", "bc", "c"]));

    expect(larger.size).toBe(11);
    expect(new Set(larger.values()).size).toBe(11);
    expect(resolveChannelName("dm_a_bc", larger)).toBe("dm:a-bc");
    expect(resolveChannelName("dm_ab_c", larger)).toBe("dm:ab-c");
  });
});

describe("channelShapes", () => {
  it("lists the group and one DM per pair", () => {
    const shapes = channelShapes(roster);
    expect(shapes.map((s) => s.name)).toEqual(["group", "dm:ana-ben", "dm:ana-cleo", "dm:ben-cleo"]);
    expect(shapes[0]).toMatchObject({ type: "group", participants: ["ana", "ben", "cleo"] });
    expect(shapes[1]).toMatchObject({ type: "dm", participants: ["ana", "ben"] });
  });
});

describe("parseRoster", () => {
  it("rejects identifiers that could collide with the name separators", () => {
    expect(() => parseRoster(["ana", "ben-c"])).toThrow('Invalid participants: "ben-c" must match');
  });

  it("rejects underscores, which would make DM shorthands ambiguous", () => {
    expect(() => parseRoster(["a", "a_b", "b_c", "c"])).toThrow('Invalid participants: "a_b" must match');
  });

  it("rejects the reserved system sender", () => {
    expect(() => parseRoster(["ana", "system"])).toThrow('"system" is reserved');
  });

  it("rejects an empty roster and duplicates", () => {
    expect(() => parseRoster([])).toThrow("roster must not be empty");
    expect(() => parseRoster(["ana", "ana"])).toThrow('"ana" is listed twice');
  });
});
