import type { UserColor } from "../value-objects/user-color";
import type { UserId } from "../value-objects/user-id";
import type { UserName } from "../value-objects/user-name";

/** A session member. Immutable: state changes produce a replacement value. */
export class Participant {
  readonly userId: UserId;
  readonly userName: UserName;
  readonly userColor: UserColor;
  readonly isActive: boolean;

  constructor(
    userId: UserId,
    userName: UserName,
    userColor: UserColor,
    isActive: boolean,
  ) {
    this.userId = userId;
    this.userName = userName;
    this.userColor = userColor;
    this.isActive = isActive;
    Object.freeze(this);
  }

  static join(userId: UserId, userName: UserName, userColor: UserColor): Participant {
    return new Participant(userId, userName, userColor, true);
  }

  deactivate(): Participant {
    return new Participant(this.userId, this.userName, this.userColor, false);
  }

  equals(other: Participant | null | undefined): boolean {
    return (
      other instanceof Participant &&
      other.userId.equals(this.userId) &&
      other.userName.equals(this.userName) &&
      other.userColor.equals(this.userColor) &&
      other.isActive === this.isActive
    );
  }
}
