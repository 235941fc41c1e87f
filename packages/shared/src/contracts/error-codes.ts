// Error codes, kept in step with contracts/error-codes.json.

export const ERROR_CODES = {
  INVALID_VALUE: "INVALID_VALUE",
  INVALID_SESSION: "INVALID_SESSION",
  INVALID_DOCUMENT: "INVALID_DOCUMENT",
  INVALID_STATE_TRANSITION: "INVALID_STATE_TRANSITION",
  SESSION_FULL: "SESSION_FULL",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  DOCUMENT_NOT_FOUND: "DOCUMENT_NOT_FOUND",
  DOCUMENT_IN_USE: "DOCUMENT_IN_USE",
  EDIT_NOT_PERMITTED: "EDIT_NOT_PERMITTED",
  AGENT_INVOCATION_FAILED: "AGENT_INVOCATION_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
