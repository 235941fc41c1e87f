import {
  Participant,
  UserColor,
  UserId,
  UserName,
} from "@tandem/shared";
import { colorForName } from "./colors";

export interface ReadAwarenessParticipantsOptions {
  fallbackColor?: (name: string) => UserColor;
  includeLocal?: boolean;
  localClientId?: number;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

function asNonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

/**
 * Normalizes one awareness payload (`{ user: { id, name, color } }`) into an
 * active participant. Clients that publish no user id are not members: the
 * awareness client id is per-connection and must never stand in for it.
 */
export function participantFromAwarenessState(
  clientId: number,
  state: unknown,
  fallbackColor: (name: string) => UserColor = colorForName,
): Participant | null {
  const user = asRecord(asRecord(state)?.user);
  const id = asNonEmptyString(user?.id);
  if (id === null) {
    return null;
  }

  const name = asNonEmptyString(user?.name) ?? `User ${clientId}`;
  const rawColor = user?.color;
  const color =
    typeof rawColor === "string" && UserColor.isValid(rawColor)
      ? new UserColor(rawColor)
      : fallbackColor(id);

  return Participant.join(new UserId(id), new UserName(name), color);
}

/**
 * Reads every client's awareness state as participants, ordered by client id.
 * Several clients of one user (tabs, devices) collapse into one participant;
 * the lowest client id wins.
 */
export function readAwarenessParticipants(
  states: Iterable<[number, unknown]>,
  options: ReadAwarenessParticipantsOptions = {},
): Participant[] {
  const includeLocal = options.includeLocal ?? true;
  const entries = [...states].sort(([left], [right]) => left - right);
  const byUser = new Map<string, Participant>();

  for (const [clientId, state] of entries) {
    if (!includeLocal && clientId === options.localClientId) {
      continue;
    }
    const participant = participantFromAwarenessState(
      clientId,
      state,
      options.fallbackColor,
    );
    if (participant && !byUser.has(participant.userId.value)) {
      byUser.set(participant.userId.value, participant);
    }
  }

  return [...byUser.values()];
}
