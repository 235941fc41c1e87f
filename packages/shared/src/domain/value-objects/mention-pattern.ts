import { DEFAULT_MENTION_TRIGGER } from "../../contracts/collaboration";
import { InvalidValueError } from "../errors";
import { requireNonEmpty, StringValue } from "./identifier";

/**
 * Literal trigger token that starts an agent mention, e.g. `@j`.
 * Matching is case-insensitive.
 */
export class MentionPattern extends StringValue {
  constructor(value: string) {
    const trigger = requireNonEmpty(value, "Mention pattern");
    if (/\s/.test(trigger)) {
      throw new InvalidValueError(
        `Mention pattern cannot contain whitespace: ${JSON.stringify(trigger)}`,
      );
    }
    super(trigger);
    Object.freeze(this);
  }

  static default(): MentionPattern {
    return new MentionPattern(DEFAULT_MENTION_TRIGGER);
  }

  get length(): number {
    return this.value.length;
  }

  /** True if `text` carries the trigger at `offset`, ignoring case. */
  matchesAt(text: string, offset: number): boolean {
    return (
      text.slice(offset, offset + this.value.length).toLowerCase() ===
      this.value.toLowerCase()
    );
  }
}
