export {
  activeAgentMention,
  agentMentionExtension,
  agentMentionState,
  mentionPatternFacet,
  submitAgentMention,
  type AgentMentionOptions,
  type AgentMentionQuery,
} from "./agent-mention/extension";
export {
  AWARENESS_TIMEOUT_ORIGIN,
  bindAwarenessToSession,
  type AwarenessBridgeOptions,
  type AwarenessSessionHandlers,
} from "./collaboration/awareness-bridge";
export { colorForName } from "./collaboration/colors";
export {
  participantFromAwarenessState,
  readAwarenessParticipants,
  type ReadAwarenessParticipantsOptions,
} from "./collaboration/presence";
