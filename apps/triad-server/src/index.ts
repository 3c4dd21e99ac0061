import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { initDb } from "./db/database.js";
import { createStore } from "./db/store.js";
import { ensureDefaultChannels } from "./channels/seed.js";
import { Broadcaster } from "./chat/broadcaster.js";
import { ChatService } from "./chat/service.js";
import { registerChatRoutes } from "./http/routes.js";
import { ChatGateway } from "./ws/handler.js";
import { getAllConnections } from "./ws/connections.js";
import { loadConfig } from "./config.js";

async function main() {
  const config = loadConfig();

  // Initialize database
  const db = initDb(config.dataDir);
  const store = createStore(db, { roster: config.roster });
  const channels = ensureDefaultChannels(store.channels, config.roster);
  console.log(`[db] ${channels.length} channel(s) ready in ${config.dataDir}`);

  const broadcaster = new Broadcaster({
    bufferSize: config.subscriberBuffer,
    overflow: config.subscriberOverflow,
  });
  const chat = new ChatService({
    store,
    roster: config.roster,
    broadcaster,
    maxPageSize: config.maxPageSize,
  });
  const gateway = new ChatGateway(chat, {
    rateLimitMax: config.rateLimitMax,
    rateLimitWindowMs: config.rateLimitWindowMs,
  });

  // Create Fastify server
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  // WebSocket endpoint
  app.get("/ws", { websocket: true }, (socket) => {
    gateway.handleConnection(socket);
  });

  registerChatRoutes(app, chat);

  // Health check
  app.get("/health", async () => ({
    status: "ok",
    channels: chat.listChannels().length,
    connections: getAllConnections().length,
  }));

  // Start server
  await app.listen({ port: config.port, host: config.host });
  console.log(`[server] Listening on ${config.host}:${config.port}`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\n[server] Shutting down...");
    gateway.closeAll();
    broadcaster.closeAll();
    await app.close();
    db.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((err: unknown) => {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((err: unknown) => {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  console.error("[server] Fatal error:", err);
  process.exit(1);
});
