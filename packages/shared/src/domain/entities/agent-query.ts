import type { AgentQueryStatus } from "../../contracts/collaboration";
import { InvalidStateTransitionError } from "../errors";
import { requireNonEmpty } from "../value-objects/identifier";

interface AgentQueryFields {
  readonly queryId: string;
  readonly question: string;
  readonly agentName: string | null;
  readonly status: AgentQueryStatus;
  readonly startedAt: Date;
  readonly endedAt: Date | null;
  readonly response: string | null;
  readonly error: string | null;
}

/**
 * One agent invocation triggered from a mention.
 * pending → streaming → completed, or pending|streaming → failed.
 */
export class AgentQuery implements AgentQueryFields {
  readonly queryId: string;
  readonly question: string;
  readonly agentName: string | null;
  readonly status: AgentQueryStatus;
  readonly startedAt: Date;
  readonly endedAt: Date | null;
  readonly response: string | null;
  readonly error: string | null;

  private constructor(fields: AgentQueryFields) {
    this.queryId = requireNonEmpty(fields.queryId, "Query ID");
    this.question = requireNonEmpty(fields.question, "Question");
    this.agentName = fields.agentName;
    this.status = fields.status;
    this.startedAt = fields.startedAt;
    this.endedAt = fields.endedAt;
    this.response = fields.response;
    this.error = fields.error;
    Object.freeze(this);
  }

  static create(
    question: string,
    agentName: string | null = null,
    now: Date = new Date(),
  ): AgentQuery {
    return new AgentQuery({
      queryId: crypto.randomUUID(),
      question: question.trim(),
      agentName,
      status: "pending",
      startedAt: now,
      endedAt: null,
      response: null,
      error: null,
    });
  }

  markAsStreaming(): AgentQuery {
    if (this.status !== "pending") {
      throw new InvalidStateTransitionError(this.status, "streaming");
    }
    return new AgentQuery({ ...this.fields(), status: "streaming" });
  }

  markAsCompleted(response: string, now: Date = new Date()): AgentQuery {
    if (this.status !== "streaming") {
      throw new InvalidStateTransitionError(this.status, "completed");
    }
    return new AgentQuery({
      ...this.fields(),
      status: "completed",
      response: requireNonEmpty(response, "Response"),
      endedAt: now,
    });
  }

  markAsFailed(message: string, now: Date = new Date()): AgentQuery {
    if (this.status !== "pending" && this.status !== "streaming") {
      throw new InvalidStateTransitionError(this.status, "failed");
    }
    return new AgentQuery({
      ...this.fields(),
      status: "failed",
      error: requireNonEmpty(message, "Error message"),
      endedAt: now,
    });
  }

  isFinished(): boolean {
    return this.status === "completed" || this.status === "failed";
  }

  /** Milliseconds from start to finish, or null while the query is running. */
  getDuration(): number | null {
    if (this.endedAt === null) {
      return null;
    }
    return this.endedAt.getTime() - this.startedAt.getTime();
  }

  private fields(): AgentQueryFields {
    return {
      queryId: this.queryId,
      question: this.question,
      agentName: this.agentName,
      status: this.status,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      response: this.response,
      error: this.error,
    };
  }
}
