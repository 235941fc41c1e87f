import { InvalidValueError } from "../errors";

/**
 * Validates that `value` is a string with at least one non-whitespace
 * character. The raw string is returned unchanged.
 */
export function requireNonEmpty(value: string, label: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new InvalidValueError(`${label} cannot be empty`);
  }
  return value;
}

/**
 * Shared shape for the string-backed identity values. Equality is by value
 * and by concrete class, so a `UserId("a")` never equals a `DocumentId("a")`.
 */
export abstract class StringValue {
  readonly value: string;

  protected constructor(value: string) {
    this.value = value;
  }

  equals(other: StringValue | null | undefined): boolean {
    if (!other || other.constructor !== this.constructor) {
      return false;
    }
    return other.value === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
