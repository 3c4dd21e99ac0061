import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Envelope } from "@triad/protocol";
import { storeOpenTest } from "../db/storeOpenTest.js";
import type { Store } from "../db/store.js";
import { ChatService } from "../chat/service.js";
import { Broadcaster } from "../chat/broadcaster.js";
import { ChatGateway } from "./handler.js";
import { getConnection, type Connection, type Socket } from "./connections.js";

class FakeSocket implements Socket {
  readonly OPEN = 1;
  readyState = 1;
  sent: Envelope[] = [];
  closedWith: number | undefined;

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(code?: number): void {
    this.closedWith = code;
    this.readyState = 3;
  }

  ofType(type: string): Envelope[] {
    return this.sent.filter((e) => e.type === type);
  }
}

function command(type: string, payload: unknown): string {
  return JSON.stringify({ type, id: "cmd-1", timestamp: 0, payload });
}

describe("ChatGateway", () => {
  let store: Store;
  let chat: ChatService;
  let gateway: ChatGateway;
  let opened: Connection[];

  beforeEach(() => {
    const test = storeOpenTest();
    store = test.store;
    chat = new ChatService({ store, roster: test.roster, now: test.clock.now });
    gateway = new ChatGateway(chat, { rateLimitMax: 100, rateLimitWindowMs: 10_000 });
    opened = [];
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    for (const conn of opened) gateway.close(conn);
    store.db.close();
    vi.restoreAllMocks();
  });

  function connect(participant?: string): { socket: FakeSocket; conn: Connection } {
    const socket = new FakeSocket();
    const conn = gateway.open(socket);
    opened.push(conn);
    if (participant) {
      gateway.receive(conn, command("session:identify", { participant }));
    }
    return { socket, conn };
  }

  it("welcomes an identified participant with channels and unread counts", () => {
    chat.sendMessage("dm_ana_ben", "ana", "waiting for you");

    const { socket } = connect("ben");

    const [welcome] = socket.ofType("session:welcome");
    expect(welcome.payload).toMatchObject({
      participant: "ben",
      unread: { "dm:ana-ben": 1, group: 0, "dm:ben-cleo": 0 },
    });
  });

  it("requires identification before other commands", () => {
    const { socket, conn } = connect();

    gateway.receive(conn, command("channel:subscribe", { channel: "group" }));

    expect(socket.ofType("chat:error")[0].payload).toEqual({
      code: "NOT_IDENTIFIED",
      message: "Identify with session:identify first",
    });
  });

  it("forwards new messages to subscribers of the channel", async () => {
    const ana = connect("ana");
    const ben = connect("ben");
    gateway.receive(ben.conn, command("channel:subscribe", { channel: "dm_ana_ben" }));

    expect(ben.socket.ofType("channel:subscribed")[0].payload).toEqual({ channel: "dm:ana-ben" });
    expect(ben.socket.ofType("channel:history")[0].payload).toEqual({
      channel: "dm:ana-ben",
      messages: [],
      hasMore: false,
    });

    gateway.receive(ana.conn, command("channel:message", { channel: "dm:ana-ben", content: "hey ben" }));

    await vi.waitFor(() => {
      expect(ben.socket.ofType("channel:message")).toHaveLength(1);
    });
    expect(ben.socket.ofType("channel:message")[0].payload).toMatchObject({
      channel: "dm:ana-ben",
      message: { sender: "ana", content: "hey ben" },
    });
    expect(ana.socket.ofType("channel:message")).toHaveLength(0);
  });

  it("forbids subscribing to a DM between other participants", () => {
    const { socket, conn } = connect("cleo");

    gateway.receive(conn, command("channel:subscribe", { channel: "dm_ana_ben" }));

    expect(socket.ofType("chat:error")[0].payload).toEqual({
      code: "FORBIDDEN",
      message: "You are not a participant of dm:ana-ben",
    });
    expect(chat.broadcaster.subscriberCount("dm:ana-ben")).toBe(0);
  });

  it("reports unread messages and marks them read", () => {
    const first = chat.sendMessage("group", "ana", "one");
    chat.sendMessage("group", "ana", "two");
    const { socket, conn } = connect("cleo");

    gateway.receive(conn, command("channel:unread", { channel: "group" }));
    expect(socket.ofType("channel:unread")[0].payload).toMatchObject({ channel: "group", count: 2 });

    gateway.receive(conn, command("channel:mark-read", { channel: "group", messageId: first.id }));
    expect(socket.ofType("channel:read")[0].payload).toMatchObject({
      channel: "group",
      position: { participant: "cleo", lastReadMessageId: first.id },
    });
    expect(chat.unreadCount("group", "cleo")).toBe(1);
  });

  it("surfaces core errors with their code", () => {
    const { socket, conn } = connect("ana");

    gateway.receive(conn, command("channel:message", { channel: "group", content: "" }));

    expect(socket.ofType("chat:error")[0].payload).toEqual({
      code: "VALIDATION_FAILED",
      message: "Invalid content: must not be empty",
      field: "content",
    });
  });

  it("rejects malformed and unknown commands", () => {
    const { socket, conn } = connect("ana");

    gateway.receive(conn, "{not json");
    gateway.receive(conn, command("voice:join", {}));
    gateway.receive(conn, command("channel:message", { channel: "group" }));

    expect(socket.ofType("chat:error").map((e) => e.payload)).toEqual([
      { code: "INVALID_MESSAGE", message: "Failed to parse message" },
      { code: "UNKNOWN_TYPE", message: "Unknown message type: voice:join" },
      { code: "VALIDATION_FAILED", message: "Invalid content: Required", field: "content" },
    ]);
  });

  it("only lets the sender edit or delete a message", () => {
    const sent = chat.sendMessage("group", "ana", "mine");
    const ben = connect("ben");
    const ana = connect("ana");

    gateway.receive(ben.conn, command("message:delete", { channel: "group", messageId: sent.id }));
    expect(ben.socket.ofType("chat:error")[0].payload).toMatchObject({ code: "FORBIDDEN" });

    gateway.receive(ana.conn, command("message:edit", { channel: "group", messageId: sent.id, content: "ours" }));
    expect(chat.getMessage("group", sent.id).content).toBe("ours");
  });

  it("requires a subscription before fetching history", () => {
    const { socket, conn } = connect("ana");

    gateway.receive(conn, command("channel:fetch-history", { channel: "group" }));

    expect(socket.ofType("chat:error")[0].payload).toEqual({
      code: "NOT_JOINED",
      message: "Subscribe to the channel first",
    });
  });

  it("reports more history when the page size cap trims a request", () => {
    const capped = new ChatService({ store, roster: chat.roster, maxPageSize: 2 });
    const cappedGateway = new ChatGateway(capped, { rateLimitMax: 100, rateLimitWindowMs: 10_000 });
    capped.sendMessage("group", "ana", "1");
    capped.sendMessage("group", "ana", "2");
    capped.sendMessage("group", "ana", "3");
    const socket = new FakeSocket();
    const conn = cappedGateway.open(socket);
    opened.push(conn);
    cappedGateway.receive(conn, command("session:identify", { participant: "ben" }));

    cappedGateway.receive(conn, command("channel:subscribe", { channel: "group" }));
    cappedGateway.receive(conn, command("channel:fetch-history", { channel: "group", limit: 100 }));

    const pages = socket.ofType("channel:history").map((e) => e.payload);
    expect(pages).toHaveLength(2);
    for (const page of pages) {
      expect(page).toMatchObject({ channel: "group", hasMore: true });
      expect(page).toHaveProperty("messages.length", 2);
    }
  });

  it("releases subscriptions when the connection closes", () => {
    const { socket, conn } = connect("ana");
    gateway.receive(conn, command("channel:subscribe", { channel: "group" }));
    expect(chat.broadcaster.subscriberCount("group")).toBe(1);

    gateway.close(conn);

    expect(chat.broadcaster.subscriberCount("group")).toBe(0);
    expect(getConnection(socket)).toBeUndefined();
  });

  it("rate limits a chatty connection", () => {
    const limited = new ChatGateway(chat, { rateLimitMax: 2, rateLimitWindowMs: 10_000, now: () => 0 });
    const socket = new FakeSocket();
    const conn = limited.open(socket);
    opened.push(conn);

    limited.receive(conn, command("session:identify", { participant: "ana" }));
    limited.receive(conn, command("channel:unread", { channel: "group" }));
    limited.receive(conn, command("channel:unread", { channel: "group" }));

    expect(socket.ofType("chat:error")[0].payload).toEqual({
      code: "RATE_LIMITED",
      message: "Too many messages, slow down",
    });
    expect(socket.ofType("channel:unread")).toHaveLength(1);
  });

  it("tells the client when a slow subscription is dropped", async () => {
    const strict = new ChatService({
      store,
      roster: chat.roster,
      broadcaster: new Broadcaster({ bufferSize: 1, overflow: "disconnect" }),
    });
    const strictGateway = new ChatGateway(strict, { rateLimitMax: 100, rateLimitWindowMs: 10_000 });
    const socket = new FakeSocket();
    const conn = strictGateway.open(socket);
    opened.push(conn);
    strictGateway.receive(conn, command("session:identify", { participant: "ben" }));
    strictGateway.receive(conn, command("channel:subscribe", { channel: "group" }));

    // Three publishes in one tick: one is handed to the waiting pump, one is
    // buffered, the third overflows the buffer.
    strict.sendMessage("group", "ana", "1");
    strict.sendMessage("group", "ana", "2");
    strict.sendMessage("group", "ana", "3");

    await vi.waitFor(() => {
      expect(socket.ofType("chat:error")).toHaveLength(1);
    });
    expect(socket.ofType("chat:error")[0].payload).toMatchObject({ code: "SUBSCRIPTION_OVERFLOW" });
    expect(conn.subscriptions.has("group")).toBe(false);
  });
});
