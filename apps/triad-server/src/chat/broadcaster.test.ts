import { describe, it, expect } from "vitest";
import type { ChatEvent, ChatMessage } from "@triad/protocol";
import { Broadcaster } from "./broadcaster.js";

function event(channel: string, content: string): ChatEvent {
  const message: ChatMessage = {
    id: `id-${content}`,
    channelId: `channel-${channel}`,
    sender: "ana",
    content,
    type: "text",
    metadata: {},
    deleted: false,
    editedAt: null,
    createdAt: 1_000,
  };
  return { type: "message:new", channel, message };
}

describe("Broadcaster", () => {
  describe("publish / subscribe", () => {
    it("delivers to every subscriber of the topic in publish order", async () => {
      const bus = new Broadcaster();
      const a = bus.subscribe("group");
      const b = bus.subscribe("group");

      expect(bus.publish("group", event("group", "one"))).toBe(2);
      bus.publish("group", event("group", "two"));

      expect(a.pending).toBe(2);
      expect((await a.next()).value?.message.content).toBe("one");
      expect((await a.next()).value?.message.content).toBe("two");
      expect((await b.next()).value?.message.content).toBe("one");
    });

    it("hands events to a waiting consumer", async () => {
      const bus = new Broadcaster();
      const sub = bus.subscribe("group");

      const pending = sub.next();
      bus.publish("group", event("group", "hello"));

      const result = await pending;
      expect(result.done).toBe(false);
      expect(result.value?.message.content).toBe("hello");
    });

    it("keeps topics apart", () => {
      const bus = new Broadcaster();
      const group = bus.subscribe("group");
      const dm = bus.subscribe("dm:ana-ben");

      bus.publish("dm:ana-ben", event("dm:ana-ben", "private"));

      expect(group.pending).toBe(0);
      expect(dm.pending).toBe(1);
    });

    it("returns 0 when nobody listens", () => {
      const bus = new Broadcaster();
      expect(bus.publish("group", event("group", "void"))).toBe(0);
    });

    it("preserves order for a consumer iterating with for await", async () => {
      const bus = new Broadcaster();
      const sub = bus.subscribe("group");
      const seen: string[] = [];

      const consumer = (async () => {
        for await (const e of sub) {
          seen.push(e.message.content);
          if (seen.length === 3) break;
        }
      })();

      bus.publish("group", event("group", "1"));
      bus.publish("group", event("group", "2"));
      bus.publish("group", event("group", "3"));
      await consumer;

      expect(seen).toEqual(["1", "2", "3"]);
      expect(sub.isClosed).toBe(true);
      expect(bus.subscriberCount("group")).toBe(0);
    });
  });

  describe("unsubscribe", () => {
    it("stops delivery and releases the registry entry", async () => {
      const bus = new Broadcaster();
      const sub = bus.subscribe("group");
      const pending = sub.next();

      bus.unsubscribe(sub);
      bus.publish("group", event("group", "missed"));

      expect(await pending).toEqual({ done: true, value: undefined });
      expect(bus.subscriberCount("group")).toBe(0);
    });

    it("closeAll ends every subscription", () => {
      const bus = new Broadcaster();
      const a = bus.subscribe("group");
      const b = bus.subscribe("dm:ana-ben");

      bus.closeAll();

      expect(a.isClosed && b.isClosed).toBe(true);
      expect(bus.subscriberCount("group") + bus.subscriberCount("dm:ana-ben")).toBe(0);
    });
  });

  describe("overflow", () => {
    it("drops the oldest events when the buffer is full", async () => {
      const bus = new Broadcaster({ bufferSize: 2 });
      const sub = bus.subscribe("group");

      for (const content of ["a", "b", "c", "d"]) {
        bus.publish("group", event("group", content));
      }

      expect(sub.dropped).toBe(2);
      expect((await sub.next()).value?.message.content).toBe("c");
      expect((await sub.next()).value?.message.content).toBe("d");
    });

    it("disconnects a slow subscriber under the disconnect policy", async () => {
      const bus = new Broadcaster();
      const sub = bus.subscribe("group", { bufferSize: 1, overflow: "disconnect" });

      bus.publish("group", event("group", "a"));
      bus.publish("group", event("group", "b"));

      expect(sub.overflowed).toBe(true);
      expect(sub.isClosed).toBe(true);
      expect(bus.subscriberCount("group")).toBe(0);
      expect(await sub.next()).toEqual({ done: true, value: undefined });
    });
  });
});
