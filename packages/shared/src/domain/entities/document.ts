import { CHANGE_KINDS, type ChangeKind } from "../../contracts/collaboration";
import { InvalidDocumentError } from "../errors";
import { DocumentContent } from "../value-objects/document-content";
import { DocumentId } from "../value-objects/document-id";
import { UserId } from "../value-objects/user-id";
import { DocumentChange } from "./document-change";

/** Persisted shape of a document, as handed to and returned by storage. */
export interface DocumentSnapshot {
  readonly id: string;
  readonly content: string;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly version: number;
  readonly changes: readonly DocumentChangeSnapshot[];
}

export interface DocumentChangeSnapshot {
  readonly changeId: string;
  readonly kind: ChangeKind;
  readonly actorId: string;
  readonly occurredAt: string;
}

const HEADING_MARKERS = /^[ \t]*#+/gm;

/**
 * Versioned markdown document with its full change log.
 *
 * Every operation returns a new Document; the receiver never changes.
 * `version` always equals the number of recorded changes and the first
 * change is always the create.
 */
export class Document {
  readonly id: DocumentId;
  readonly content: DocumentContent;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly version: number;
  private readonly changes: readonly DocumentChange[];

  private constructor(
    id: DocumentId,
    content: DocumentContent,
    createdAt: Date,
    updatedAt: Date,
    changes: readonly DocumentChange[],
  ) {
    this.id = id;
    this.content = content;
    this.createdAt = createdAt;
    this.updatedAt = updatedAt;
    this.version = changes.length;
    this.changes = Object.freeze([...changes]);
    Object.freeze(this);
  }

  static create(
    id: DocumentId,
    content: DocumentContent,
    actorId: UserId,
    now: Date = new Date(),
  ): Document {
    const at = new Date(now.getTime());
    return new Document(id, content, at, at, [DocumentChange.create(actorId, at)]);
  }

  /** Rebuilds a document from storage, rejecting snapshots that break the history invariants. */
  static restore(snapshot: DocumentSnapshot): Document {
    const id = new DocumentId(snapshot.id);
    const createdAt = parseTimestamp(snapshot.createdAt, "createdAt");
    const updatedAt = parseTimestamp(snapshot.updatedAt, "updatedAt");
    const changes = snapshot.changes.map(restoreChange);

    if (changes.length === 0 || !changes[0].isCreate()) {
      throw new InvalidDocumentError(
        `document ${snapshot.id} history must start with a create change`,
      );
    }
    if (changes.slice(1).some((change) => change.isCreate())) {
      throw new InvalidDocumentError(
        `document ${snapshot.id} history has more than one create change`,
      );
    }
    if (snapshot.version !== changes.length) {
      throw new InvalidDocumentError(
        `document ${snapshot.id} version ${snapshot.version} does not match ${changes.length} changes`,
      );
    }
    if (updatedAt.getTime() < createdAt.getTime()) {
      throw new InvalidDocumentError(
        `document ${snapshot.id} was updated before it was created`,
      );
    }

    return new Document(
      id,
      new DocumentContent(snapshot.content),
      createdAt,
      updatedAt,
      changes,
    );
  }

  updateContent(
    newContent: DocumentContent,
    actorId: UserId,
    now: Date = new Date(),
  ): Document {
    const at = new Date(Math.max(now.getTime(), this.updatedAt.getTime()));
    return new Document(this.id, newContent, this.createdAt, at, [
      ...this.changes,
      DocumentChange.update(actorId, at),
    ]);
  }

  isEmpty(): boolean {
    return this.content.isEmpty();
  }

  /** Whitespace-delimited words, ignoring the leading `#` run of heading lines. */
  getWordCount(): number {
    if (this.content.isEmpty()) {
      return 0;
    }

    return this.content.value
      .replace(HEADING_MARKERS, " ")
      .split(/\s+/)
      .filter((word) => word.length > 0).length;
  }

  hasBeenModified(): boolean {
    return this.changes.some((change) => change.isUpdate());
  }

  getChangeHistory(): readonly DocumentChange[] {
    return this.changes;
  }

  toSnapshot(): DocumentSnapshot {
    return {
      id: this.id.value,
      content: this.content.value,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.updatedAt.toISOString(),
      version: this.version,
      changes: this.changes.map((change) => ({
        changeId: change.changeId,
        kind: change.kind,
        actorId: change.actorId.value,
        occurredAt: change.occurredAt.toISOString(),
      })),
    };
  }
}

function parseTimestamp(value: string, field: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDocumentError(`invalid ${field} timestamp: ${value}`);
  }
  return date;
}

function restoreChange(change: DocumentChangeSnapshot): DocumentChange {
  if (!CHANGE_KINDS.includes(change.kind)) {
    throw new InvalidDocumentError(`unknown change kind: ${String(change.kind)}`);
  }
  return new DocumentChange(
    change.changeId,
    change.kind,
    new UserId(change.actorId),
    parseTimestamp(change.occurredAt, "occurredAt"),
  );
}
