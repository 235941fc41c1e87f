import type { Participant } from "../entities/participant";

/**
 * Edit-permission rules. Plain functions over participant values so they
 * can be applied to any roster, not only a live session.
 */

export function canUserEdit(participant: Participant): boolean {
  return participant.isActive;
}

/** Inactive members still hold a slot until they are removed. */
export function isSessionFull(
  participants: readonly Participant[],
  maxCapacity: number,
): boolean {
  return countMembers(participants) >= maxCapacity;
}

/** A user who already holds a slot may always rejoin, even at capacity. */
export function canParticipantJoin(
  participants: readonly Participant[],
  candidate: Participant,
  maxCapacity: number,
): boolean {
  const alreadyMember = participants.some((participant) =>
    participant.userId.equals(candidate.userId),
  );
  if (alreadyMember) {
    return true;
  }
  return !isSessionFull(participants, maxCapacity);
}

function countMembers(participants: readonly Participant[]): number {
  return new Set(participants.map((participant) => participant.userId.value)).size;
}
