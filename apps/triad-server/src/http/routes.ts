import type { FastifyInstance, FastifyReply } from "fastify";
import { z, ZodError } from "zod";
import type { ChatErrorCode } from "@triad/protocol";
import type { ChatService } from "../chat/service.js";
import { ChatError, ValidationError } from "../chat/errors.js";

const STATUS_BY_CODE: Record<ChatErrorCode, number> = {
  CHANNEL_NOT_FOUND: 404,
  SENDER_NOT_IN_CHANNEL: 403,
  VALIDATION_FAILED: 400,
  MESSAGE_NOT_FOUND: 404,
  MESSAGE_NOT_IN_CHANNEL: 404,
  ALREADY_EXISTS: 409,
};

const messageType = z.enum(["text", "system", "code"]);
const metadata = z.record(z.string(), z.unknown());
const timestamp = z.coerce.number().int().nonnegative();

const ChannelParams = z.object({ channel: z.string().min(1) });
const MessageParams = ChannelParams.extend({ id: z.string().min(1) });
const ParticipantParams = z.object({ participant: z.string().min(1) });
const ChannelParticipantParams = ChannelParams.extend({ participant: z.string().min(1) });

const ListChannelsQuery = z.object({ participant: z.string().min(1).optional() });

const HistoryQuery = z.object({
  limit: z.coerce.number().int().positive().optional(),
  since: timestamp.optional(),
  before: timestamp.optional(),
  includeDeleted: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

const SendBody = z.object({
  sender: z.string().min(1),
  content: z.string(),
  type: messageType.optional(),
  metadata: metadata.optional(),
});

const SystemBody = z.object({ content: z.string() });
const EditBody = z.object({ content: z.string() });
const MarkReadBody = z.object({ messageId: z.string().min(1).optional() }).default({});

/** Translate a thrown error into a JSON reply; unknown errors become 500 */
export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ChatError) {
    return reply.status(STATUS_BY_CODE[err.code]).send({
      ok: false,
      code: err.code,
      error: err.message,
      ...(err instanceof ValidationError ? { field: err.field } : {}),
    });
  }
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    const field = issue?.path.join(".") || "request";
    return reply.status(400).send({
      ok: false,
      code: "VALIDATION_FAILED",
      error: `Invalid ${field}: ${issue?.message ?? "malformed request"}`,
      field,
    });
  }
  if (err instanceof Error && "statusCode" in err && typeof err.statusCode === "number" && err.statusCode < 500) {
    return reply.status(err.statusCode).send({ ok: false, code: "BAD_REQUEST", error: err.message });
  }
  console.error("[http] Unhandled error:", err);
  return reply.status(500).send({ ok: false, code: "INTERNAL", error: "Internal server error" });
}

/**
 * Registers the chat REST API.
 * Expects: channels already seeded in the service's store.
 */
export function registerChatRoutes(app: FastifyInstance, chat: ChatService): void {
  app.setErrorHandler((err, _request, reply) => sendError(reply, err));

  app.get("/channels", async (request) => {
    const { participant } = ListChannelsQuery.parse(request.query);
    const channels = participant ? chat.listChannelsFor(participant) : chat.listChannels();
    return { ok: true, channels };
  });

  app.get("/channels/:channel", async (request) => {
    const { channel } = ChannelParams.parse(request.params);
    return { ok: true, channel: chat.getChannel(channel) };
  });

  app.get("/channels/:channel/messages", async (request) => {
    const { channel } = ChannelParams.parse(request.params);
    const query = HistoryQuery.parse(request.query);
    const messages = chat.getMessages(channel, query);
    return { ok: true, messages };
  });

  app.post("/channels/:channel/messages", async (request, reply) => {
    const { channel } = ChannelParams.parse(request.params);
    const body = SendBody.parse(request.body);
    const message = chat.sendMessage(channel, body.sender, body.content, {
      type: body.type,
      metadata: body.metadata,
    });
    return reply.status(201).send({ ok: true, message });
  });

  app.post("/channels/:channel/system", async (request, reply) => {
    const { channel } = ChannelParams.parse(request.params);
    const { content } = SystemBody.parse(request.body);
    const message = chat.broadcastSystem(channel, content);
    return reply.status(201).send({ ok: true, message });
  });

  app.patch("/channels/:channel/messages/:id", async (request) => {
    const { channel, id } = MessageParams.parse(request.params);
    const { content } = EditBody.parse(request.body);
    return { ok: true, message: chat.editMessage(channel, id, content) };
  });

  app.delete("/channels/:channel/messages/:id", async (request) => {
    const { channel, id } = MessageParams.parse(request.params);
    return { ok: true, message: chat.deleteMessage(channel, id) };
  });

  app.get("/channels/:channel/unread/:participant", async (request) => {
    const { channel, participant } = ChannelParticipantParams.parse(request.params);
    const messages = chat.getUnread(channel, participant);
    return { ok: true, messages, count: messages.length };
  });

  app.post("/channels/:channel/read/:participant", async (request) => {
    const { channel, participant } = ChannelParticipantParams.parse(request.params);
    const { messageId } = MarkReadBody.parse(request.body ?? {});
    return { ok: true, position: chat.markRead(channel, participant, messageId) };
  });

  app.get("/participants/:participant/reads", async (request) => {
    const { participant } = ParticipantParams.parse(request.params);
    return { ok: true, positions: chat.getReadPositions(participant) };
  });

  app.get("/participants/:participant/unread", async (request) => {
    const { participant } = ParticipantParams.parse(request.params);
    return { ok: true, unread: chat.unreadSummary(participant) };
  });
}
