import { describe, expect, it } from "vitest";
import { CollaborationSession } from "../entities/collaboration-session";
import { Participant } from "../entities/participant";
import { DocumentId } from "../value-objects/document-id";
import { UserColor } from "../value-objects/user-color";
import { UserId } from "../value-objects/user-id";
import { UserName } from "../value-objects/user-name";
import { canParticipantJoin, canUserEdit, isSessionFull } from "./edit-permissions";

function participant(id: string): Participant {
  return Participant.join(new UserId(id), new UserName(`Name ${id}`), new UserColor("#123456"));
}

describe("canUserEdit", () => {
  it("allows active participants only", () => {
    const active = participant("user-1");

    expect(canUserEdit(active)).toBe(true);
    expect(canUserEdit(active.deactivate())).toBe(false);
    expect(active.isActive).toBe(true);
  });
});

describe("isSessionFull", () => {
  it("compares the member count against capacity", () => {
    const members = [participant("a"), participant("b")];

    expect(isSessionFull(members, 3)).toBe(false);
    expect(isSessionFull(members, 2)).toBe(true);
    expect(isSessionFull(members, 1)).toBe(true);
    expect(isSessionFull([], 0)).toBe(true);
  });

  it("counts inactive members toward capacity", () => {
    const members = [participant("a").deactivate(), participant("b")];

    expect(isSessionFull(members, 2)).toBe(true);
  });
});

describe("canParticipantJoin", () => {
  const full = [participant("a"), participant("b"), participant("c")];

  it("admits new users while there is room", () => {
    expect(canParticipantJoin(full.slice(0, 2), participant("d"), 3)).toBe(true);
  });

  it("rejects new users once full", () => {
    expect(canParticipantJoin(full, participant("d"), 3)).toBe(false);
  });

  it("always admits a rejoin at exactly capacity", () => {
    expect(canParticipantJoin(full, participant("b"), 3)).toBe(true);
  });

  it("admits a rejoin even when over capacity", () => {
    expect(canParticipantJoin(full, participant("a"), 1)).toBe(true);
  });

  it("admits an inactive member reconnecting to a full session", () => {
    const withGhost = [participant("a").deactivate(), participant("b"), participant("c")];

    expect(canParticipantJoin(withGhost, participant("a"), 3)).toBe(true);
    expect(canParticipantJoin(withGhost, participant("z"), 3)).toBe(false);
  });
});

describe("capacity scenario", () => {
  it("blocks a fourth user and keeps a deactivated member's slot", () => {
    const capacity = 3;
    const [alice, bob, carol] = [participant("alice"), participant("bob"), participant("carol")];
    let session = CollaborationSession.create("s1", new DocumentId("d1"))
      .addParticipant(alice)
      .addParticipant(bob)
      .addParticipant(carol);

    expect(canParticipantJoin(session.getParticipants(), participant("dave"), capacity)).toBe(false);

    session = session.deactivateParticipant(bob.userId);

    expect(session.getParticipantCount()).toBe(3);
    expect(session.getActiveParticipants()).toHaveLength(2);
    expect(session.hasParticipant(bob.userId)).toBe(true);
    expect(canParticipantJoin(session.getParticipants(), participant("dave"), capacity)).toBe(false);
  });
});
