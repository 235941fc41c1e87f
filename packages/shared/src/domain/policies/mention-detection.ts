import type { MentionPattern } from "../value-objects/mention-pattern";

/** A mention span `[from, to)` and the text it covers. */
export interface MentionDetection {
  readonly from: number;
  readonly to: number;
  readonly text: string;
}

export interface MentionDetectionPolicy {
  readonly pattern: MentionPattern;
  detectAtCursor(text: string, cursorOffset: number): MentionDetection | null;
  extractQuestion(detection: MentionDetection | null): string | null;
  isValidForQuery(detection: MentionDetection | null): boolean;
}

/**
 * Finds the mention whose span contains the cursor.
 *
 * A mention starts where the trigger appears followed by whitespace or the
 * end of the line, and runs to the end of that line. Only the first trigger
 * on a line opens a span; later ones on the same line are part of its text.
 * The cursor may sit on either boundary.
 */
export function detectAtCursor(
  pattern: MentionPattern,
  text: string,
  cursorOffset: number,
): MentionDetection | null {
  if (!Number.isInteger(cursorOffset) || cursorOffset < 0 || cursorOffset > text.length) {
    return null;
  }

  const lineStart =
    cursorOffset === 0 ? 0 : text.lastIndexOf("\n", cursorOffset - 1) + 1;
  const newline = text.indexOf("\n", cursorOffset);
  const lineEnd = newline === -1 ? text.length : newline;

  const from = findTrigger(pattern, text, lineStart, lineEnd);
  if (from === null || cursorOffset < from) {
    return null;
  }

  return { from, to: lineEnd, text: text.slice(from, lineEnd) };
}

/** The trimmed question after the trigger, or null when nothing is left. */
export function extractQuestion(
  pattern: MentionPattern,
  detection: MentionDetection | null,
): string | null {
  if (!detection) {
    return null;
  }

  let remainder = detection.text.trimStart();
  if (pattern.matchesAt(remainder, 0)) {
    remainder = remainder.slice(pattern.length);
  }

  const question = remainder.trim();
  return question.length > 0 ? question : null;
}

export function isValidForQuery(
  pattern: MentionPattern,
  detection: MentionDetection | null,
): boolean {
  return detection !== null && extractQuestion(pattern, detection) !== null;
}

/** Binds the three detection functions to one trigger. */
export function createMentionDetectionPolicy(
  pattern: MentionPattern,
): MentionDetectionPolicy {
  return {
    pattern,
    detectAtCursor: (text, cursorOffset) =>
      detectAtCursor(pattern, text, cursorOffset),
    extractQuestion: (detection) => extractQuestion(pattern, detection),
    isValidForQuery: (detection) => isValidForQuery(pattern, detection),
  };
}

function findTrigger(
  pattern: MentionPattern,
  text: string,
  lineStart: number,
  lineEnd: number,
): number | null {
  for (let index = lineStart; index + pattern.length <= lineEnd; index++) {
    if (!pattern.matchesAt(text, index)) {
      continue;
    }
    const next = index + pattern.length;
    if (next === lineEnd || /\s/.test(text.charAt(next))) {
      return index;
    }
  }
  return null;
}
