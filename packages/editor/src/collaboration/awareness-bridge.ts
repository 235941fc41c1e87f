import { UserId, type Participant, type UserColor } from "@tandem/shared";
import type { Awareness } from "y-protocols/awareness";
import { participantFromAwarenessState } from "./presence";

/** Origin y-protocols uses when it drops a client that stopped renewing its state. */
export const AWARENESS_TIMEOUT_ORIGIN = "timeout";

export interface AwarenessSessionHandlers {
  /** A user appeared or changed their name or color. */
  onJoin(participant: Participant): void;
  /** The user's last client closed. */
  onLeave(userId: UserId): void;
  /** The user's last client timed out; the user keeps their session slot. */
  onDisconnect(userId: UserId): void;
}

export interface AwarenessBridgeOptions {
  readonly fallbackColor?: (name: string) => UserColor;
}

interface AwarenessChange {
  readonly added: readonly number[];
  readonly updated: readonly number[];
  readonly removed: readonly number[];
}

/**
 * Translates Yjs awareness changes into session membership calls.
 *
 * Clients are mapped to the user id they publish; a user is reported as gone
 * only once none of their clients remain. Returns a function that detaches
 * the listener.
 */
export function bindAwarenessToSession(
  awareness: Awareness,
  handlers: AwarenessSessionHandlers,
  options: AwarenessBridgeOptions = {},
): () => void {
  const userByClient = new Map<number, string>();
  const lastJoined = new Map<string, Participant>();

  const userStillConnected = (userId: string): boolean => {
    for (const value of userByClient.values()) {
      if (value === userId) {
        return true;
      }
    }
    return false;
  };

  const release = (clientId: number, origin: unknown) => {
    const userId = userByClient.get(clientId);
    if (userId === undefined) {
      return;
    }
    userByClient.delete(clientId);
    if (userStillConnected(userId)) {
      return;
    }

    lastJoined.delete(userId);
    if (origin === AWARENESS_TIMEOUT_ORIGIN) {
      handlers.onDisconnect(new UserId(userId));
    } else {
      handlers.onLeave(new UserId(userId));
    }
  };

  const track = (clientId: number, origin: unknown) => {
    const participant = participantFromAwarenessState(
      clientId,
      awareness.getStates().get(clientId),
      options.fallbackColor,
    );
    if (!participant) {
      release(clientId, origin);
      return;
    }

    const previousUser = userByClient.get(clientId);
    if (previousUser !== undefined && previousUser !== participant.userId.value) {
      release(clientId, origin);
    }
    userByClient.set(clientId, participant.userId.value);

    const last = lastJoined.get(participant.userId.value);
    if (last?.equals(participant)) {
      return;
    }
    lastJoined.set(participant.userId.value, participant);
    handlers.onJoin(participant);
  };

  const onChange = (change: AwarenessChange, origin: unknown) => {
    for (const clientId of change.added) {
      track(clientId, origin);
    }
    for (const clientId of change.updated) {
      track(clientId, origin);
    }
    for (const clientId of change.removed) {
      release(clientId, origin);
    }
  };

  for (const clientId of awareness.getStates().keys()) {
    track(clientId, null);
  }
  awareness.on("change", onChange);

  return () => {
    awareness.off("change", onChange);
  };
}
