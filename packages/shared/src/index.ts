export {
  AGENT_QUERY_STATUSES,
  CHANGE_KINDS,
  DEFAULT_AGENT_TIMEOUT_MS,
  DEFAULT_AGENT_USER_ID,
  DEFAULT_MAX_PARTICIPANTS,
  DEFAULT_MENTION_TRIGGER,
  ERROR_CODES,
  type AgentQueryStatus,
  type ChangeKind,
  type ErrorCode,
} from "./contracts";
export {
  DomainError,
  InvalidDocumentError,
  InvalidSessionError,
  InvalidStateTransitionError,
  InvalidValueError,
  isDomainError,
} from "./domain/errors";
export { DocumentContent } from "./domain/value-objects/document-content";
export { DocumentId } from "./domain/value-objects/document-id";
export { MentionPattern } from "./domain/value-objects/mention-pattern";
export { UserColor } from "./domain/value-objects/user-color";
export { UserId } from "./domain/value-objects/user-id";
export { UserName } from "./domain/value-objects/user-name";
export { AgentQuery } from "./domain/entities/agent-query";
export { CollaborationSession } from "./domain/entities/collaboration-session";
export {
  Document,
  type DocumentChangeSnapshot,
  type DocumentSnapshot,
} from "./domain/entities/document";
export { DocumentChange } from "./domain/entities/document-change";
export { Participant } from "./domain/entities/participant";
export {
  canParticipantJoin,
  canUserEdit,
  isSessionFull,
} from "./domain/policies/edit-permissions";
export {
  createMentionDetectionPolicy,
  detectAtCursor,
  extractQuestion,
  isValidForQuery,
  type MentionDetection,
  type MentionDetectionPolicy,
} from "./domain/policies/mention-detection";
export {
  parseAgentCommand,
  type AgentCommand,
} from "./domain/parsers/agent-command";
export type {
  AgentDoneMessage,
  AgentErrorMessage,
  CursorMovedEvent,
  DocumentEditedEvent,
  ErrorMessage,
  InboundEvent,
  InboundEventType,
  MentionDetectedMessage,
  OutboundEventType,
  OutboundMessage,
  ParticipantDisconnectedEvent,
  ParticipantJoinedEvent,
  ParticipantLeftEvent,
  SessionParticipantView,
  SessionStateMessage,
} from "./protocol/events";
export type { AgentInvocationRequest, AgentInvoker } from "./types/agent";
