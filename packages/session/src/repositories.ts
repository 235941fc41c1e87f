import {
  CollaborationSession,
  Document,
  type DocumentId,
  type DocumentSnapshot,
} from "@tandem/shared";

/** Persistence port for session aggregates. */
export interface SessionRepository {
  findById(sessionId: string): Promise<CollaborationSession | null>;
  save(session: CollaborationSession): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

/** Persistence port for documents. Implementations store `toSnapshot()` output. */
export interface DocumentRepository {
  findById(documentId: DocumentId): Promise<Document | null>;
  save(document: Document): Promise<void>;
}

export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, CollaborationSession>();

  async findById(sessionId: string): Promise<CollaborationSession | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async save(session: CollaborationSession): Promise<void> {
    this.sessions.set(session.sessionId, session);
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Keeps snapshots rather than live aggregates, so every load goes through
 * `Document.restore` the way a real store would.
 */
export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly snapshots = new Map<string, DocumentSnapshot>();

  async findById(documentId: DocumentId): Promise<Document | null> {
    const snapshot = this.snapshots.get(documentId.value);
    return snapshot ? Document.restore(snapshot) : null;
  }

  async save(document: Document): Promise<void> {
    this.snapshots.set(document.id.value, document.toSnapshot());
  }

  getSnapshot(documentId: DocumentId): DocumentSnapshot | null {
    return this.snapshots.get(documentId.value) ?? null;
  }
}
