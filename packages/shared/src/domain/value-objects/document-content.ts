import { InvalidValueError } from "../errors";

/** Markdown body of a document. Empty content is valid. */
export class DocumentContent {
  readonly value: string;

  constructor(value: string) {
    if (typeof value !== "string") {
      throw new InvalidValueError("Document content must be a string");
    }
    this.value = value;
    Object.freeze(this);
  }

  static empty(): DocumentContent {
    return new DocumentContent("");
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }

  equals(other: DocumentContent | null | undefined): boolean {
    return other instanceof DocumentContent && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
