import { requireNonEmpty, StringValue } from "./identifier";

export class UserName extends StringValue {
  constructor(value: string) {
    super(requireNonEmpty(value, "User name"));
    Object.freeze(this);
  }
}
