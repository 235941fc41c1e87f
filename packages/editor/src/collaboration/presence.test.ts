import { UserColor } from "@tandem/shared";
import { describe, expect, it } from "vitest";
import {
  participantFromAwarenessState,
  readAwarenessParticipants,
} from "./presence";

function fallbackColor(): UserColor {
  return new UserColor("#000000");
}

describe("participantFromAwarenessState", () => {
  it("normalizes the published user", () => {
    const participant = participantFromAwarenessState(
      7,
      { user: { color: "#123456", id: "u-1", name: "Alice" } },
      fallbackColor,
    );

    expect(participant?.userId.value).toBe("u-1");
    expect(participant?.userName.value).toBe("Alice");
    expect(participant?.userColor.value).toBe("#123456");
    expect(participant?.isActive).toBe(true);
  });

  it("applies defaults when the payload is sparse", () => {
    const participant = participantFromAwarenessState(
      11,
      { user: { color: "not-a-color", id: "u-2" } },
      fallbackColor,
    );

    expect(participant?.userName.value).toBe("User 11");
    expect(participant?.userColor.value).toBe("#000000");
  });

  it("rejects clients that publish no user id", () => {
    expect(participantFromAwarenessState(3, { user: { name: "Anon" } })).toBeNull();
    expect(participantFromAwarenessState(3, { user: { id: "  " } })).toBeNull();
    expect(participantFromAwarenessState(3, null)).toBeNull();
    expect(participantFromAwarenessState(3, ["u-1"])).toBeNull();
  });
});

describe("readAwarenessParticipants", () => {
  const states: Array<[number, unknown]> = [
    [9, { user: { id: "u-2", name: "Bob" } }],
    [4, { user: { id: "u-1", name: "Alice (laptop)" } }],
    [6, { user: { id: "u-1", name: "Alice (phone)" } }],
    [1, { cursor: { anchor: 0 } }],
  ];

  it("orders by client id and collapses clients of one user", () => {
    const participants = readAwarenessParticipants(states, { fallbackColor });

    expect(participants.map((participant) => participant.userName.value)).toEqual([
      "Alice (laptop)",
      "Bob",
    ]);
  });

  it("can skip the local client", () => {
    const participants = readAwarenessParticipants(states, {
      fallbackColor,
      includeLocal: false,
      localClientId: 4,
    });

    expect(participants.map((participant) => participant.userName.value)).toEqual([
      "Alice (phone)",
      "Bob",
    ]);
  });
});
