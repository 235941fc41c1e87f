import { describe, expect, it } from "vitest";
import { InvalidStateTransitionError, InvalidValueError } from "../errors";
import { AgentQuery } from "./agent-query";

const START = new Date("2026-03-01T12:00:00.000Z");
const END = new Date("2026-03-01T12:00:02.500Z");

describe("AgentQuery", () => {
  it("starts pending with a trimmed question", () => {
    const query = AgentQuery.create("  What is TypeScript? ", "prd-agent", START);

    expect(query.status).toBe("pending");
    expect(query.question).toBe("What is TypeScript?");
    expect(query.agentName).toBe("prd-agent");
    expect(query.getDuration()).toBeNull();
  });

  it("rejects an empty question", () => {
    expect(() => AgentQuery.create("   ")).toThrow(InvalidValueError);
  });

  it("generates distinct ids", () => {
    expect(AgentQuery.create("a").queryId).not.toBe(AgentQuery.create("b").queryId);
  });

  it("moves pending → streaming → completed", () => {
    const pending = AgentQuery.create("q", null, START);
    const streaming = pending.markAsStreaming();
    const completed = streaming.markAsCompleted("answer", END);

    expect(pending.status).toBe("pending");
    expect(streaming.status).toBe("streaming");
    expect(completed.status).toBe("completed");
    expect(completed.response).toBe("answer");
    expect(completed.isFinished()).toBe(true);
    expect(completed.getDuration()).toBe(2500);
    expect(completed.queryId).toBe(pending.queryId);
  });

  it("fails from pending or streaming", () => {
    const failed = AgentQuery.create("q", null, START).markAsFailed("timeout", END);

    expect(failed.status).toBe("failed");
    expect(failed.error).toBe("timeout");
    expect(failed.getDuration()).toBe(2500);
    expect(AgentQuery.create("q").markAsStreaming().markAsFailed("boom").status).toBe("failed");
  });

  it("rejects illegal transitions", () => {
    const pending = AgentQuery.create("q");

    expect(() => pending.markAsCompleted("answer")).toThrow(InvalidStateTransitionError);
    expect(() => pending.markAsStreaming().markAsStreaming()).toThrow(
      "cannot move from streaming to streaming",
    );
    expect(() => pending.markAsFailed("x").markAsFailed("y")).toThrow(
      "cannot move from failed to failed",
    );
  });

  it("requires a response and an error message", () => {
    const streaming = AgentQuery.create("q").markAsStreaming();

    expect(() => streaming.markAsCompleted("")).toThrow("Response cannot be empty");
    expect(() => streaming.markAsFailed(" ")).toThrow("Error message cannot be empty");
  });
});
