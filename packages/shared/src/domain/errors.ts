import { ERROR_CODES, type ErrorCode } from "../contracts/error-codes";

/** Base class for every failure raised by the domain core. */
export class DomainError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "DomainError";
    this.code = code;
  }
}

export class InvalidValueError extends DomainError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_VALUE, message);
    this.name = "InvalidValueError";
  }
}

export class InvalidSessionError extends DomainError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_SESSION, message);
    this.name = "InvalidSessionError";
  }
}

export class InvalidDocumentError extends DomainError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_DOCUMENT, message);
    this.name = "InvalidDocumentError";
  }
}

export class InvalidStateTransitionError extends DomainError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(
      ERROR_CODES.INVALID_STATE_TRANSITION,
      `cannot move from ${from} to ${to}`,
    );
    this.name = "InvalidStateTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}
