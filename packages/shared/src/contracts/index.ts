export {
  AGENT_QUERY_STATUSES,
  CHANGE_KINDS,
  DEFAULT_AGENT_TIMEOUT_MS,
  DEFAULT_AGENT_USER_ID,
  DEFAULT_MAX_PARTICIPANTS,
  DEFAULT_MENTION_TRIGGER,
  type AgentQueryStatus,
  type ChangeKind,
} from "./collaboration";
export { ERROR_CODES, type ErrorCode } from "./error-codes";
