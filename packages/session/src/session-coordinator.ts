import {
  canParticipantJoin,
  canUserEdit,
  CollaborationSession,
  createMentionDetectionPolicy,
  Document,
  DocumentContent,
  isDomainError,
  Participant,
  UserColor,
  UserId,
  UserName,
  type DocumentId,
  type InboundEvent,
  type MentionDetection,
  type MentionDetectionPolicy,
  type OutboundMessage,
  type SessionParticipantView,
  type SessionStateMessage,
} from "@tandem/shared";
import { defaultSessionConfig, type SessionConfig } from "./config";
import {
  DocumentInUseError,
  DocumentNotFoundError,
  EditNotPermittedError,
  isCollaborationError,
  SessionFullError,
  SessionNotFoundError,
} from "./errors";
import { silentLogger, type Logger } from "./logger";
import {
  InMemoryDocumentRepository,
  InMemorySessionRepository,
  type DocumentRepository,
  type SessionRepository,
} from "./repositories";
import { KeyedSerialQueue } from "./serial-queue";
import { createSessionRegistryStore, type SessionRegistryStore } from "./store";

export interface SessionCoordinatorOptions {
  config?: SessionConfig;
  sessions?: SessionRepository;
  documents?: DocumentRepository;
  store?: SessionRegistryStore;
  logger?: Logger;
  now?: () => Date;
}

/** A detected mention and whether it carries a question yet. */
export interface MentionCheck {
  readonly detection: MentionDetection;
  readonly ready: boolean;
}

/**
 * Owns the open sessions and their documents.
 *
 * Every mutation of a session, including edits to its document, runs through
 * a queue keyed by session id, so each session sees one total order of
 * copy-on-write updates. A document belongs to at most one open session, so
 * its history is ordered by that same queue. Reads come from the registry
 * store and never wait.
 */
export class SessionCoordinator {
  readonly config: SessionConfig;
  readonly store: SessionRegistryStore;
  private readonly sessions: SessionRepository;
  private readonly documents: DocumentRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly mentions: MentionDetectionPolicy;
  private readonly queue = new KeyedSerialQueue();

  constructor(options: SessionCoordinatorOptions = {}) {
    this.config = options.config ?? defaultSessionConfig();
    this.store = options.store ?? createSessionRegistryStore();
    this.sessions = options.sessions ?? new InMemorySessionRepository();
    this.documents = options.documents ?? new InMemoryDocumentRepository();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.mentions = createMentionDetectionPolicy(this.config.mentionPattern);
  }

  /**
   * Opens a session over a document, creating the document with
   * `initialContent` if the repository has none. Opening an already open
   * session returns it unchanged. A session found in the session repository
   * resumes with its stored members and its stored document id.
   *
   * A document is open in at most one session at a time; opening a second
   * session over it fails with `DocumentInUseError`.
   */
  openSession(
    sessionId: string,
    documentId: DocumentId,
    initialContent: DocumentContent,
    actorId: UserId,
  ): Promise<CollaborationSession> {
    return this.queue.run(sessionId, async () => {
      const existing = this.getSession(sessionId);
      if (existing) {
        return existing;
      }

      const stored = await this.sessions.findById(sessionId);
      const session =
        stored ?? CollaborationSession.create(sessionId, documentId, this.now());
      const loaded = await this.documents.findById(session.documentId);
      const document =
        loaded ??
        Document.create(session.documentId, initialContent, actorId, this.now());

      // Checked and registered without yielding, so concurrent opens over one
      // document cannot both get through.
      const holder = this.findSessionForDocument(session.documentId);
      if (holder) {
        this.logger.warn("open rejected: document in use", {
          documentId: session.documentId.value,
          openSessionId: holder.sessionId,
          sessionId,
        });
        throw new DocumentInUseError(session.documentId.value, holder.sessionId);
      }
      const state = this.store.getState();
      state.putDocument(document);
      state.putSession(session);

      if (!loaded) {
        await this.documents.save(document);
      }
      if (!stored) {
        await this.sessions.save(session);
      }
      this.logger.info(stored ? "session resumed" : "session opened", {
        documentId: session.documentId.value,
        sessionId,
      });
      return session;
    });
  }

  /** Adds or replaces a member. Rejoining never counts against capacity. */
  join(sessionId: string, participant: Participant): Promise<CollaborationSession> {
    return this.queue.run(sessionId, async () => {
      const session = this.requireSession(sessionId);
      if (
        !canParticipantJoin(
          session.getParticipants(),
          participant,
          this.config.maxParticipants,
        )
      ) {
        this.logger.warn("join rejected: session full", {
          maxParticipants: this.config.maxParticipants,
          sessionId,
          userId: participant.userId.value,
        });
        throw new SessionFullError(sessionId, this.config.maxParticipants);
      }

      const next = session.addParticipant(participant);
      await this.commitSession(next);
      this.logger.info("participant joined", {
        sessionId,
        userId: participant.userId.value,
      });
      return next;
    });
  }

  /**
   * Removes a member and frees their slot. Closes the session when nobody is
   * left and resolves with null in that case.
   */
  leave(sessionId: string, userId: UserId): Promise<CollaborationSession | null> {
    return this.queue.run(sessionId, async () => {
      const next = this.requireSession(sessionId).removeParticipant(userId);
      this.logger.info("participant left", { sessionId, userId: userId.value });
      if (next.getParticipantCount() === 0) {
        await this.dropSession(next);
        return null;
      }
      await this.commitSession(next);
      return next;
    });
  }

  /** Marks a member inactive. The member keeps their slot. */
  disconnect(sessionId: string, userId: UserId): Promise<CollaborationSession> {
    return this.queue.run(sessionId, async () => {
      const next = this.requireSession(sessionId).deactivateParticipant(userId);
      await this.commitSession(next);
      this.logger.info("participant disconnected", {
        sessionId,
        userId: userId.value,
      });
      return next;
    });
  }

  /** Replaces the session document's content on behalf of an active member. */
  edit(sessionId: string, userId: UserId, content: DocumentContent): Promise<Document> {
    return this.queue.run(sessionId, async () => {
      const session = this.requireSession(sessionId);
      const participant = session.getParticipant(userId);
      if (!participant || !canUserEdit(participant)) {
        this.logger.warn("edit rejected", { sessionId, userId: userId.value });
        throw new EditNotPermittedError(sessionId, userId.value);
      }

      const next = this.requireDocument(session.documentId).updateContent(
        content,
        userId,
        this.now(),
      );
      await this.commitDocument(next);
      return next;
    });
  }

  /**
   * Applies a document update on behalf of a non-member actor, such as the
   * agent. `compute` sees the latest content at the moment the update runs.
   * Fails if the session or its document has gone away.
   */
  applyToDocument(
    sessionId: string,
    actorId: UserId,
    compute: (current: DocumentContent) => DocumentContent,
  ): Promise<Document> {
    return this.queue.run(sessionId, async () => {
      const session = this.requireSession(sessionId);
      const document = this.requireDocument(session.documentId);
      const next = document.updateContent(
        compute(document.content),
        actorId,
        this.now(),
      );
      await this.commitDocument(next);
      return next;
    });
  }

  detectMention(text: string, cursorOffset: number): MentionCheck | null {
    const detection = this.mentions.detectAtCursor(text, cursorOffset);
    if (!detection) {
      return null;
    }
    return { detection, ready: this.mentions.isValidForQuery(detection) };
  }

  /** Closes a session regardless of its members. Closing an unknown id is a no-op. */
  closeSession(sessionId: string): Promise<void> {
    return this.queue.run(sessionId, async () => {
      const session = this.getSession(sessionId);
      if (session) {
        await this.dropSession(session);
      }
    });
  }

  getSession(sessionId: string): CollaborationSession | null {
    return this.store.getState().sessions.get(sessionId) ?? null;
  }

  getDocument(documentId: DocumentId): Document | null {
    return this.store.getState().documents.get(documentId.value) ?? null;
  }

  /** Resolves once every operation queued so far for the session has settled. */
  settled(sessionId: string): Promise<void> {
    return this.queue.drain(sessionId);
  }

  /**
   * Applies one transport event and returns the messages to send back to the
   * originating connection. Domain and collaboration failures become `error`
   * messages; anything else propagates.
   */
  async handle(event: InboundEvent): Promise<OutboundMessage[]> {
    try {
      return await this.dispatch(event);
    } catch (error) {
      if (isCollaborationError(error)) {
        return [
          {
            type: "error",
            code: error.code,
            message: error.message,
            retryable: error.retryable,
            session_id: event.session_id,
          },
        ];
      }
      if (isDomainError(error)) {
        return [
          {
            type: "error",
            code: error.code,
            message: error.message,
            retryable: false,
            session_id: event.session_id,
          },
        ];
      }
      throw error;
    }
  }

  sessionState(session: CollaborationSession): SessionStateMessage {
    return {
      type: "session_state",
      session_id: session.sessionId,
      doc_id: session.documentId.value,
      version: this.getDocument(session.documentId)?.version ?? 0,
      participants: session.getParticipants().map(toParticipantView),
    };
  }

  private async dispatch(event: InboundEvent): Promise<OutboundMessage[]> {
    switch (event.type) {
      case "participant_joined": {
        const participant = Participant.join(
          new UserId(event.user_id),
          new UserName(event.user_name),
          new UserColor(event.user_color),
        );
        return [this.sessionState(await this.join(event.session_id, participant))];
      }
      case "participant_left": {
        const session = await this.leave(event.session_id, new UserId(event.user_id));
        return session ? [this.sessionState(session)] : [];
      }
      case "participant_disconnected": {
        const session = await this.disconnect(
          event.session_id,
          new UserId(event.user_id),
        );
        return [this.sessionState(session)];
      }
      case "document_edited": {
        await this.edit(
          event.session_id,
          new UserId(event.user_id),
          new DocumentContent(event.content),
        );
        return [this.sessionState(this.requireSession(event.session_id))];
      }
      case "cursor_moved": {
        this.requireSession(event.session_id);
        const check = this.detectMention(event.text, event.cursor);
        if (!check) {
          return [];
        }
        return [
          {
            type: "mention_detected",
            session_id: event.session_id,
            user_id: event.user_id,
            from: check.detection.from,
            to: check.detection.to,
            text: check.detection.text,
            ready: check.ready,
          },
        ];
      }
    }
  }

  private requireSession(sessionId: string): CollaborationSession {
    const session = this.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private requireDocument(documentId: DocumentId): Document {
    const document = this.getDocument(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId.value);
    }
    return document;
  }

  private async commitSession(session: CollaborationSession): Promise<void> {
    await this.sessions.save(session);
    this.store.getState().putSession(session);
  }

  private async commitDocument(document: Document): Promise<void> {
    await this.documents.save(document);
    this.store.getState().putDocument(document);
  }

  private async dropSession(session: CollaborationSession): Promise<void> {
    await this.sessions.delete(session.sessionId);
    const state = this.store.getState();
    state.removeSession(session.sessionId);
    state.removeDocument(session.documentId.value);
    this.logger.info("session closed", { sessionId: session.sessionId });
  }

  private findSessionForDocument(documentId: DocumentId): CollaborationSession | null {
    for (const session of this.store.getState().sessions.values()) {
      if (session.documentId.equals(documentId)) {
        return session;
      }
    }
    return null;
  }
}

function toParticipantView(participant: Participant): SessionParticipantView {
  return {
    user_id: participant.userId.value,
    user_name: participant.userName.value,
    user_color: participant.userColor.value,
    is_active: participant.isActive,
  };
}
