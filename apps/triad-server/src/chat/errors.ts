import type { ChatErrorCode } from "@triad/protocol";

/** Base class for every domain error raised by the chat core */
export abstract class ChatError extends Error {
  abstract readonly code: ChatErrorCode;
}

export class ChannelNotFoundError extends ChatError {
  readonly code = "CHANNEL_NOT_FOUND";

  constructor(readonly channel: string) {
    super(`Channel not found: ${channel}`);
    this.name = "ChannelNotFoundError";
  }
}

export class SenderNotInChannelError extends ChatError {
  readonly code = "SENDER_NOT_IN_CHANNEL";

  constructor(
    readonly sender: string,
    readonly channel: string
  ) {
    super(`${sender} is not a participant of ${channel}`);
    this.name = "SenderNotInChannelError";
  }
}

export class ValidationError extends ChatError {
  readonly code = "VALIDATION_FAILED";

  constructor(
    readonly field: string,
    readonly reason: string
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = "ValidationError";
  }
}

export class MessageNotFoundError extends ChatError {
  readonly code = "MESSAGE_NOT_FOUND";

  constructor(readonly messageId: string) {
    super(`Message not found: ${messageId}`);
    this.name = "MessageNotFoundError";
  }
}

/** The message exists, but in a different channel than the one addressed */
export class MessageNotInChannelError extends ChatError {
  readonly code = "MESSAGE_NOT_IN_CHANNEL";

  constructor(
    readonly messageId: string,
    readonly channel: string
  ) {
    super(`Message ${messageId} does not belong to ${channel}`);
    this.name = "MessageNotInChannelError";
  }
}

export class AlreadyExistsError extends ChatError {
  readonly code = "ALREADY_EXISTS";

  constructor(
    readonly entity: string,
    readonly key: string
  ) {
    super(`${entity} already exists: ${key}`);
    this.name = "AlreadyExistsError";
  }
}
