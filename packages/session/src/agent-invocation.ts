import {
  AgentQuery,
  DocumentContent,
  extractQuestion,
  InvalidValueError,
  parseAgentCommand,
  type AgentDoneMessage,
  type AgentErrorMessage,
  type AgentInvoker,
  type Document,
  type MentionDetection,
} from "@tandem/shared";
import {
  AgentInvocationError,
  DocumentNotFoundError,
  SessionNotFoundError,
} from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { SessionCoordinator } from "./session-coordinator";

export interface AgentSubmission {
  readonly sessionId: string;
  readonly detection: MentionDetection;
  readonly knownAgents?: readonly string[];
}

export interface AgentInvocationResult {
  readonly query: AgentQuery;
  readonly document: Document;
}

export interface AgentInvocationServiceOptions {
  coordinator: SessionCoordinator;
  invoker: AgentInvoker;
  logger?: Logger;
  now?: () => Date;
  /** Called with every state the query passes through. */
  onQueryChange?: (query: AgentQuery) => void;
}

/** Separator placed before a response appended to the end of a document. */
export const RESPONSE_PARAGRAPH_SEPARATOR = "\n\n";

/**
 * Lands an agent response in `content`:
 *
 * - the command text is still at the detected span: the response replaces it;
 * - the span was removed (the editor deletes it on submit): `from` now sits at
 *   a line end, and the response goes in there;
 * - anything else: the response is appended as a new paragraph.
 */
export function landAgentResponse(
  content: string,
  detection: MentionDetection,
  response: string,
): string {
  const { from, to, text } = detection;
  if (content.slice(from, to) === text) {
    return content.slice(0, from) + response + content.slice(to);
  }
  if (wasRemovedAt(content, from)) {
    return content.slice(0, from) + response + content.slice(from);
  }
  if (content.length === 0) {
    return response;
  }
  return content + RESPONSE_PARAGRAPH_SEPARATOR + response;
}

// A mention runs to the end of its line, so once it is deleted its start
// offset is a line end.
function wasRemovedAt(content: string, from: number): boolean {
  if (from > content.length) {
    return false;
  }
  return from === content.length || content.charAt(from) === "\n";
}

/**
 * Runs validated mentions against the agent and writes the answers back into
 * the session document, authored by the configured agent user.
 */
export class AgentInvocationService {
  private readonly coordinator: SessionCoordinator;
  private readonly invoker: AgentInvoker;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly onQueryChange: (query: AgentQuery) => void;

  constructor(options: AgentInvocationServiceOptions) {
    this.coordinator = options.coordinator;
    this.invoker = options.invoker;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.onQueryChange = options.onQueryChange ?? (() => {});
  }

  async submit(submission: AgentSubmission): Promise<AgentInvocationResult> {
    const { sessionId, detection } = submission;
    const question = extractQuestion(this.coordinator.config.mentionPattern, detection);
    const command =
      question === null ? null : parseAgentCommand(question, submission.knownAgents);
    if (!command) {
      throw new InvalidValueError("Mention carries no question");
    }

    let query = this.track(
      AgentQuery.create(command.question, command.agentName, this.now()),
    );
    query = this.track(query.markAsStreaming());

    let response: string;
    try {
      response = await this.invokeWithTimeout(query);
    } catch (error) {
      throw this.fail(query, sessionId, describeFailure(error), error);
    }
    if (response.trim().length === 0) {
      throw this.fail(query, sessionId, "agent returned an empty response");
    }

    let document: Document;
    try {
      document = await this.coordinator.applyToDocument(
        sessionId,
        this.coordinator.config.agentUserId,
        (current) =>
          new DocumentContent(landAgentResponse(current.value, detection, response)),
      );
    } catch (error) {
      if (error instanceof SessionNotFoundError || error instanceof DocumentNotFoundError) {
        throw this.fail(
          query,
          sessionId,
          `session ${sessionId} closed before the response landed`,
          error,
        );
      }
      throw error;
    }

    query = this.track(query.markAsCompleted(response, this.now()));
    this.logger.info("agent response landed", {
      durationMs: query.getDuration(),
      queryId: query.queryId,
      sessionId,
      version: document.version,
    });
    return { query, document };
  }

  /**
   * `submit` for a transport: resolves with the `agent_done` or `agent_error`
   * message for the session. Mentions without a question still reject, since
   * no query exists to report on.
   */
  async respond(
    submission: AgentSubmission,
  ): Promise<AgentDoneMessage | AgentErrorMessage> {
    try {
      const { document, query } = await this.submit(submission);
      return {
        type: "agent_done",
        session_id: submission.sessionId,
        query_id: query.queryId,
        response: query.response ?? "",
        version: document.version,
      };
    } catch (error) {
      if (error instanceof AgentInvocationError) {
        return {
          type: "agent_error",
          session_id: submission.sessionId,
          query_id: error.queryId,
          error: error.message,
        };
      }
      throw error;
    }
  }

  private async invokeWithTimeout(query: AgentQuery): Promise<string> {
    const timeoutMs = this.coordinator.config.agentTimeoutMs;
    const controller = new AbortController();
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new Error(`agent timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.invoker.invoke({
          agentName: query.agentName,
          question: query.question,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private fail(
    query: AgentQuery,
    sessionId: string,
    message: string,
    cause?: unknown,
  ): AgentInvocationError {
    const failed = this.track(query.markAsFailed(message, this.now()));
    this.logger.error("agent query failed", {
      error: message,
      queryId: failed.queryId,
      sessionId,
    });
    return new AgentInvocationError(failed.queryId, message, { cause });
  }

  private track(query: AgentQuery): AgentQuery {
    this.onQueryChange(query);
    return query;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return "agent invocation failed";
}
