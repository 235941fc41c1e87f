import { requireNonEmpty, StringValue } from "./identifier";

/** Stable identity of a user; session membership is keyed by it. */
export class UserId extends StringValue {
  constructor(value: string) {
    super(requireNonEmpty(value, "User ID"));
    Object.freeze(this);
  }
}
