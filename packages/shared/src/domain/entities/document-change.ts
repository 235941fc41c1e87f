import type { ChangeKind } from "../../contracts/collaboration";
import { requireNonEmpty } from "../value-objects/identifier";
import type { UserId } from "../value-objects/user-id";

/** One immutable, append-only audit entry in a document's history. */
export class DocumentChange {
  readonly changeId: string;
  readonly kind: ChangeKind;
  readonly actorId: UserId;
  readonly occurredAt: Date;

  constructor(
    changeId: string,
    kind: ChangeKind,
    actorId: UserId,
    occurredAt: Date,
  ) {
    this.changeId = requireNonEmpty(changeId, "Change ID");
    this.kind = kind;
    this.actorId = actorId;
    this.occurredAt = new Date(occurredAt.getTime());
    Object.freeze(this);
  }

  static create(actorId: UserId, occurredAt: Date = new Date()): DocumentChange {
    return new DocumentChange(crypto.randomUUID(), "create", actorId, occurredAt);
  }

  static update(actorId: UserId, occurredAt: Date = new Date()): DocumentChange {
    return new DocumentChange(crypto.randomUUID(), "update", actorId, occurredAt);
  }

  isCreate(): boolean {
    return this.kind === "create";
  }

  isUpdate(): boolean {
    return this.kind === "update";
  }
}
