import { ERROR_CODES, type ErrorCode } from "@tandem/shared";

/**
 * Failure raised by the session coordinator or the agent service. Carries the
 * same `code` and `retryable` fields as the wire `error` message.
 */
export class CollaborationError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    retryable = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollaborationError";
    this.code = code;
    this.retryable = retryable;
  }
}

export class SessionFullError extends CollaborationError {
  readonly sessionId: string;
  readonly maxParticipants: number;

  constructor(sessionId: string, maxParticipants: number) {
    super(
      ERROR_CODES.SESSION_FULL,
      `session ${sessionId} is full (${maxParticipants} participants)`,
      true,
    );
    this.name = "SessionFullError";
    this.sessionId = sessionId;
    this.maxParticipants = maxParticipants;
  }
}

export class SessionNotFoundError extends CollaborationError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(ERROR_CODES.SESSION_NOT_FOUND, `session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class DocumentNotFoundError extends CollaborationError {
  readonly documentId: string;

  constructor(documentId: string) {
    super(ERROR_CODES.DOCUMENT_NOT_FOUND, `document ${documentId} not found`);
    this.name = "DocumentNotFoundError";
    this.documentId = documentId;
  }
}

export class DocumentInUseError extends CollaborationError {
  readonly documentId: string;
  readonly openSessionId: string;

  constructor(documentId: string, openSessionId: string) {
    super(
      ERROR_CODES.DOCUMENT_IN_USE,
      `document ${documentId} is already open in session ${openSessionId}`,
      true,
    );
    this.name = "DocumentInUseError";
    this.documentId = documentId;
    this.openSessionId = openSessionId;
  }
}

export class EditNotPermittedError extends CollaborationError {
  readonly sessionId: string;
  readonly userId: string;

  constructor(sessionId: string, userId: string) {
    super(
      ERROR_CODES.EDIT_NOT_PERMITTED,
      `user ${userId} may not edit in session ${sessionId}`,
    );
    this.name = "EditNotPermittedError";
    this.sessionId = sessionId;
    this.userId = userId;
  }
}

export class AgentInvocationError extends CollaborationError {
  readonly queryId: string;

  constructor(queryId: string, message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.AGENT_INVOCATION_FAILED, message, true, options);
    this.name = "AgentInvocationError";
    this.queryId = queryId;
  }
}

export class ConfigError extends CollaborationError {
  readonly keys: readonly string[];

  constructor(keys: readonly string[], message: string) {
    super(ERROR_CODES.INVALID_CONFIG, message);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

export function isCollaborationError(value: unknown): value is CollaborationError {
  return value instanceof CollaborationError;
}
