import { describe, expect, it } from "vitest";
import { MentionPattern } from "../value-objects/mention-pattern";
import {
  createMentionDetectionPolicy,
  detectAtCursor,
  extractQuestion,
  isValidForQuery,
} from "./mention-detection";

const pattern = new MentionPattern("@j");

describe("detectAtCursor", () => {
  it("detects a mention at the start of the text", () => {
    expect(detectAtCursor(pattern, "@j what is TypeScript?", 5)).toEqual({
      from: 0,
      to: 22,
      text: "@j what is TypeScript?",
    });
  });

  it("includes both span boundaries", () => {
    const text = "Intro @j summarize this";

    expect(detectAtCursor(pattern, text, 6)?.from).toBe(6);
    expect(detectAtCursor(pattern, text, text.length)?.to).toBe(text.length);
  });

  it("ignores a cursor before the mention on the same line", () => {
    expect(detectAtCursor(pattern, "Intro @j summarize this", 5)).toBeNull();
  });

  it("returns null when the trigger is absent", () => {
    expect(detectAtCursor(pattern, "no mention here", 3)).toBeNull();
    expect(detectAtCursor(pattern, "", 0)).toBeNull();
  });

  it("stops the span at the end of the line", () => {
    const text = "@j first question\nplain line";

    expect(detectAtCursor(pattern, text, 4)).toEqual({
      from: 0,
      to: 17,
      text: "@j first question",
    });
    expect(detectAtCursor(pattern, text, 20)).toBeNull();
  });

  it("picks only the occurrence on the cursor's line", () => {
    const text = "@j one\nbetween\n@j two";

    expect(detectAtCursor(pattern, text, 18)).toEqual({
      from: 15,
      to: 21,
      text: "@j two",
    });
    expect(detectAtCursor(pattern, text, 2)).toEqual({
      from: 0,
      to: 6,
      text: "@j one",
    });
  });

  it("treats later triggers on the same line as part of the first span", () => {
    expect(detectAtCursor(pattern, "@j a @j b", 8)).toEqual({
      from: 0,
      to: 9,
      text: "@j a @j b",
    });
  });

  it("requires whitespace or the end of the line after the trigger", () => {
    expect(detectAtCursor(pattern, "@jane hello", 3)).toBeNull();
    expect(detectAtCursor(pattern, "ask @j", 6)).toEqual({ from: 4, to: 6, text: "@j" });
  });

  it("matches the trigger regardless of case", () => {
    expect(detectAtCursor(pattern, "@J hi", 4)?.text).toBe("@J hi");
  });

  it("handles a cursor at offset 0 of a text starting with a newline", () => {
    expect(detectAtCursor(pattern, "\n@j hi", 0)).toBeNull();
    expect(detectAtCursor(pattern, "\n@j hi", 1)?.from).toBe(1);
  });

  it("returns null for out-of-range cursors", () => {
    expect(detectAtCursor(pattern, "@j hi", -1)).toBeNull();
    expect(detectAtCursor(pattern, "@j hi", 6)).toBeNull();
    expect(detectAtCursor(pattern, "@j hi", 1.5)).toBeNull();
  });
});

describe("extractQuestion", () => {
  it("strips the trigger and surrounding whitespace", () => {
    const detection = detectAtCursor(pattern, "@j what is TypeScript?", 5);

    expect(extractQuestion(pattern, detection)).toBe("what is TypeScript?");
  });

  it("returns null for empty or whitespace-only questions", () => {
    expect(extractQuestion(pattern, { from: 0, to: 3, text: "@j " })).toBeNull();
    expect(extractQuestion(pattern, { from: 0, to: 6, text: "@j  \t " })).toBeNull();
    expect(extractQuestion(pattern, null)).toBeNull();
  });
});

describe("isValidForQuery", () => {
  it("requires a detection with a question", () => {
    expect(isValidForQuery(pattern, { from: 0, to: 3, text: "@j " })).toBe(false);
    expect(isValidForQuery(pattern, null)).toBe(false);
    expect(isValidForQuery(pattern, { from: 0, to: 5, text: "@j hi" })).toBe(true);
  });
});

describe("createMentionDetectionPolicy", () => {
  it("binds the functions to a custom trigger", () => {
    const policy = createMentionDetectionPolicy(new MentionPattern("/ask"));
    const detection = policy.detectAtCursor("note /ask why?", 10);

    expect(detection).toEqual({ from: 5, to: 14, text: "/ask why?" });
    expect(policy.extractQuestion(detection)).toBe("why?");
    expect(policy.isValidForQuery(detection)).toBe(true);
    expect(policy.pattern.value).toBe("/ask");
  });
});
