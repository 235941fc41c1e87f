import { UserColor } from "@tandem/shared";

/**
 * A bright, high-contrast palette for participant cursors and avatars.
 * 12 hues spread evenly across the color wheel.
 */
const PARTICIPANT_PALETTE: readonly string[] = [
  "#e06c75", // red
  "#e5c07b", // yellow
  "#98c379", // green
  "#56b6c2", // cyan
  "#61afef", // blue
  "#c678dd", // purple
  "#d19a66", // orange
  "#be5046", // rust
  "#7ec699", // mint
  "#e06ca0", // pink
  "#5fb3b3", // teal
  "#c8ae9d", // tan
];

/**
 * Deterministic color for a name or user id, so a participant keeps the
 * same color across reconnects and devices.
 */
export function colorForName(name: string): UserColor {
  let hash = 0;
  for (let i = 0; i < name.length; i++) {
    hash = (hash * 31 + name.charCodeAt(i)) | 0;
  }
  return new UserColor(
    PARTICIPANT_PALETTE[Math.abs(hash) % PARTICIPANT_PALETTE.length],
  );
}
