import type { ErrorCode } from "../contracts/error-codes";

// Messages exchanged between a connection and the session coordinator.

export type InboundEventType =
  | "participant_joined"
  | "participant_left"
  | "participant_disconnected"
  | "document_edited"
  | "cursor_moved";

export type OutboundEventType =
  | "session_state"
  | "mention_detected"
  | "agent_done"
  | "agent_error"
  | "error";

export interface ParticipantJoinedEvent {
  type: "participant_joined";
  session_id: string;
  user_id: string;
  user_name: string;
  user_color: string;
}

export interface ParticipantLeftEvent {
  type: "participant_left";
  session_id: string;
  user_id: string;
}

export interface ParticipantDisconnectedEvent {
  type: "participant_disconnected";
  session_id: string;
  user_id: string;
}

export interface DocumentEditedEvent {
  type: "document_edited";
  session_id: string;
  user_id: string;
  content: string;
}

export interface CursorMovedEvent {
  type: "cursor_moved";
  session_id: string;
  user_id: string;
  text: string;
  cursor: number;
}

export type InboundEvent =
  | ParticipantJoinedEvent
  | ParticipantLeftEvent
  | ParticipantDisconnectedEvent
  | DocumentEditedEvent
  | CursorMovedEvent;

export interface SessionParticipantView {
  user_id: string;
  user_name: string;
  user_color: string;
  is_active: boolean;
}

export interface SessionStateMessage {
  type: "session_state";
  session_id: string;
  doc_id: string;
  version: number;
  participants: SessionParticipantView[];
}

export interface MentionDetectedMessage {
  type: "mention_detected";
  session_id: string;
  user_id: string;
  from: number;
  to: number;
  text: string;
  ready: boolean;
}

export interface AgentDoneMessage {
  type: "agent_done";
  session_id: string;
  query_id: string;
  response: string;
  version: number;
}

export interface AgentErrorMessage {
  type: "agent_error";
  session_id: string;
  query_id: string;
  error: string;
}

export interface ErrorMessage {
  type: "error";
  code: ErrorCode;
  message: string;
  retryable: boolean;
  session_id?: string;
}

export type OutboundMessage =
  | SessionStateMessage
  | MentionDetectedMessage
  | AgentDoneMessage
  | AgentErrorMessage
  | ErrorMessage;
