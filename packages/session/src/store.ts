import type { CollaborationSession, Document } from "@tandem/shared";
import { createStore, type StoreApi } from "zustand/vanilla";

interface RegistrySnapshot {
  /** Open sessions keyed by session id. */
  sessions: ReadonlyMap<string, CollaborationSession>;
  /** Documents of open sessions keyed by document id. */
  documents: ReadonlyMap<string, Document>;
}

export interface SessionRegistryState extends RegistrySnapshot {
  putSession: (session: CollaborationSession) => void;
  removeSession: (sessionId: string) => void;
  putDocument: (document: Document) => void;
  removeDocument: (documentId: string) => void;
  reset: () => void;
}

export type SessionRegistryStore = StoreApi<SessionRegistryState>;

// Maps rather than records: ids are user input and may shadow
// Object.prototype members such as "constructor".
function withEntry<T>(
  map: ReadonlyMap<string, T>,
  key: string,
  value: T,
): ReadonlyMap<string, T> {
  const next = new Map(map);
  next.set(key, value);
  return next;
}

function withoutEntry<T>(
  map: ReadonlyMap<string, T>,
  key: string,
): ReadonlyMap<string, T> {
  const next = new Map(map);
  next.delete(key);
  return next;
}

export function createSessionRegistryStore(
  initial: Partial<RegistrySnapshot> = {},
): SessionRegistryStore {
  return createStore<SessionRegistryState>()((set) => ({
    sessions: initial.sessions ?? new Map(),
    documents: initial.documents ?? new Map(),
    putSession: (session) =>
      set((previous) => ({
        sessions: withEntry(previous.sessions, session.sessionId, session),
      })),
    removeSession: (sessionId) =>
      set((previous) => ({
        sessions: withoutEntry(previous.sessions, sessionId),
      })),
    putDocument: (document) =>
      set((previous) => ({
        documents: withEntry(previous.documents, document.id.value, document),
      })),
    removeDocument: (documentId) =>
      set((previous) => ({
        documents: withoutEntry(previous.documents, documentId),
      })),
    reset: () => set({ sessions: new Map(), documents: new Map() }),
  }));
}
