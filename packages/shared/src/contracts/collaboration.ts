// Collaboration defaults shared by the editor and the session coordinator.

export const DEFAULT_MENTION_TRIGGER = "@j";

export const DEFAULT_MAX_PARTICIPANTS = 10;

export const DEFAULT_AGENT_TIMEOUT_MS = 60_000;

export const DEFAULT_AGENT_USER_ID = "agent";

export const CHANGE_KINDS = ["create", "update"] as const;

export type ChangeKind = (typeof CHANGE_KINDS)[number];

export const AGENT_QUERY_STATUSES = [
  "pending",
  "streaming",
  "completed",
  "failed",
] as const;

export type AgentQueryStatus = (typeof AGENT_QUERY_STATUSES)[number];
