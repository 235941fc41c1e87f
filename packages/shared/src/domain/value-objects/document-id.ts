import { requireNonEmpty, StringValue } from "./identifier";

export class DocumentId extends StringValue {
  constructor(value: string) {
    super(requireNonEmpty(value, "Document ID"));
    Object.freeze(this);
  }
}
