export {
  AgentInvocationService,
  landAgentResponse,
  RESPONSE_PARAGRAPH_SEPARATOR,
  type AgentInvocationResult,
  type AgentInvocationServiceOptions,
  type AgentSubmission,
} from "./agent-invocation";
export {
  defaultSessionConfig,
  loadSessionConfig,
  MAX_TIMER_DELAY_MS,
  type SessionConfig,
  type SessionEnv,
} from "./config";
export {
  AgentInvocationError,
  CollaborationError,
  ConfigError,
  DocumentInUseError,
  DocumentNotFoundError,
  EditNotPermittedError,
  isCollaborationError,
  SessionFullError,
  SessionNotFoundError,
} from "./errors";
export {
  createConsoleLogger,
  LOG_LEVELS,
  silentLogger,
  type ConsoleLoggerOptions,
  type LogContext,
  type Logger,
  type LogLevel,
  type LogSink,
} from "./logger";
export {
  InMemoryDocumentRepository,
  InMemorySessionRepository,
  type DocumentRepository,
  type SessionRepository,
} from "./repositories";
export { KeyedSerialQueue } from "./serial-queue";
export {
  SessionCoordinator,
  type MentionCheck,
  type SessionCoordinatorOptions,
} from "./session-coordinator";
export {
  createSessionRegistryStore,
  type SessionRegistryState,
  type SessionRegistryStore,
} from "./store";
