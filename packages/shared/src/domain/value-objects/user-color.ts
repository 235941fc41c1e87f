import { InvalidValueError } from "../errors";
import { requireNonEmpty, StringValue } from "./identifier";

const HEX_COLOR = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

/** Display color for a participant's cursor and avatar, as `#rgb` or `#rrggbb`. */
export class UserColor extends StringValue {
  constructor(value: string) {
    const color = requireNonEmpty(value, "User color");
    if (!HEX_COLOR.test(color)) {
      throw new InvalidValueError(`User color must be a hex color: ${color}`);
    }
    super(color);
    Object.freeze(this);
  }

  static isValid(value: string): boolean {
    return typeof value === "string" && HEX_COLOR.test(value);
  }
}
