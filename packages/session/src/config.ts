import {
  DEFAULT_AGENT_TIMEOUT_MS,
  DEFAULT_AGENT_USER_ID,
  DEFAULT_MAX_PARTICIPANTS,
  DEFAULT_MENTION_TRIGGER,
  MentionPattern,
  UserId,
} from "@tandem/shared";
import { z } from "zod";
import { ConfigError } from "./errors";
import { LOG_LEVELS, type LogLevel } from "./logger";

export interface SessionConfig {
  readonly maxParticipants: number;
  readonly mentionPattern: MentionPattern;
  readonly agentTimeoutMs: number;
  readonly agentUserId: UserId;
  readonly logLevel: LogLevel;
}

/** Longest delay `setTimeout` honors; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

// Unset and blank variables both fall back to the default.
const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const envSchema = z.object({
  TANDEM_MAX_PARTICIPANTS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(DEFAULT_MAX_PARTICIPANTS),
  ),
  TANDEM_MENTION_TRIGGER: z.preprocess(
    blankAsUnset,
    z
      .string()
      .regex(/^\S+$/, "must not contain whitespace")
      .default(DEFAULT_MENTION_TRIGGER),
  ),
  TANDEM_AGENT_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_DELAY_MS)
      .default(DEFAULT_AGENT_TIMEOUT_MS),
  ),
  TANDEM_AGENT_USER_ID: z.preprocess(
    blankAsUnset,
    z.string().default(DEFAULT_AGENT_USER_ID),
  ),
  TANDEM_LOG_LEVEL: z.preprocess(
    blankAsUnset,
    z.enum(LOG_LEVELS).default("info"),
  ),
});

export type SessionEnv = Readonly<Record<string, string | undefined>>;

/** Reads coordinator settings from `TANDEM_*` environment variables. */
export function loadSessionConfig(env: SessionEnv = process.env): SessionConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const keys = [
      ...new Set(result.error.issues.map((issue) => String(issue.path[0]))),
    ];
    const details = result.error.issues
      .map((issue) => `${String(issue.path[0])}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(keys, `invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    maxParticipants: parsed.TANDEM_MAX_PARTICIPANTS,
    mentionPattern: new MentionPattern(parsed.TANDEM_MENTION_TRIGGER),
    agentTimeoutMs: parsed.TANDEM_AGENT_TIMEOUT_MS,
    agentUserId: new UserId(parsed.TANDEM_AGENT_USER_ID),
    logLevel: parsed.TANDEM_LOG_LEVEL,
  };
}

export function defaultSessionConfig(): SessionConfig {
  return loadSessionConfig({});
}
