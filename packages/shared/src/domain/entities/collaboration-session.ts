import { InvalidDocumentError, InvalidSessionError } from "../errors";
import type { DocumentId } from "../value-objects/document-id";
import type { UserId } from "../value-objects/user-id";
import type { Participant } from "./participant";

/**
 * A live editing context binding participants to one document.
 *
 * Membership is keyed by `UserId` only: adding a participant whose user is
 * already a member replaces that entry, so reconnects collapse into one
 * member. Every operation is copy-on-write and leaves the receiver as it was.
 *
 * ```ts
 * const session = CollaborationSession.create("session-1", new DocumentId("doc-1"))
 *   .addParticipant(alice)
 *   .deactivateParticipant(alice.userId);
 *
 * session.getParticipantCount(); // 1
 * session.getActiveParticipants(); // []
 * ```
 */
export class CollaborationSession {
  readonly sessionId: string;
  readonly documentId: DocumentId;
  readonly createdAt: Date;

  // Keyed by participant.userId.value; only this class writes to it.
  private readonly participants: ReadonlyMap<string, Participant>;

  /**
   * An empty session id raises `InvalidSessionError`. The `InvalidDocumentError`
   * check only catches untyped callers: a `DocumentId` cannot be built from an
   * empty string (its constructor raises `InvalidValueError`), so typed code
   * never reaches it.
   */
  private constructor(
    sessionId: string,
    documentId: DocumentId,
    createdAt: Date,
    participants: ReadonlyMap<string, Participant>,
  ) {
    if (typeof sessionId !== "string" || sessionId.trim().length === 0) {
      throw new InvalidSessionError("Session ID cannot be empty");
    }
    if (!documentId || documentId.value.trim().length === 0) {
      throw new InvalidDocumentError("Document ID cannot be empty");
    }

    this.sessionId = sessionId;
    this.documentId = documentId;
    this.createdAt = createdAt;
    this.participants = participants;
    Object.freeze(this);
  }

  static create(
    sessionId: string,
    documentId: DocumentId,
    now: Date = new Date(),
  ): CollaborationSession {
    return new CollaborationSession(
      sessionId,
      documentId,
      new Date(now.getTime()),
      new Map(),
    );
  }

  /** Reconstructs a session from stored members; later duplicates of a user win. */
  static restore(
    sessionId: string,
    documentId: DocumentId,
    createdAt: Date,
    participants: Iterable<Participant>,
  ): CollaborationSession {
    const byUser = new Map<string, Participant>();
    for (const participant of participants) {
      byUser.set(participant.userId.value, participant);
    }
    return new CollaborationSession(
      sessionId,
      documentId,
      new Date(createdAt.getTime()),
      byUser,
    );
  }

  addParticipant(participant: Participant): CollaborationSession {
    const next = new Map(this.participants);
    next.set(participant.userId.value, participant);
    return this.withParticipants(next);
  }

  removeParticipant(userId: UserId): CollaborationSession {
    const next = new Map(this.participants);
    next.delete(userId.value);
    return this.withParticipants(next);
  }

  /** Marks a member inactive. The member keeps its slot; only removal frees it. */
  deactivateParticipant(userId: UserId): CollaborationSession {
    const next = new Map(this.participants);
    const participant = next.get(userId.value);
    if (participant) {
      next.set(userId.value, participant.deactivate());
    }
    return this.withParticipants(next);
  }

  getParticipant(userId: UserId): Participant | null {
    return this.participants.get(userId.value) ?? null;
  }

  hasParticipant(userId: UserId): boolean {
    return this.participants.has(userId.value);
  }

  getParticipants(): readonly Participant[] {
    return [...this.participants.values()];
  }

  getActiveParticipants(): readonly Participant[] {
    return this.getParticipants().filter((participant) => participant.isActive);
  }

  getParticipantCount(): number {
    return this.participants.size;
  }

  private withParticipants(
    participants: ReadonlyMap<string, Participant>,
  ): CollaborationSession {
    return new CollaborationSession(
      this.sessionId,
      this.documentId,
      this.createdAt,
      participants,
    );
  }
}
