export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/** The subset of `console` the logger writes to. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  /** Merged into every entry, e.g. `{ component: "coordinator" }`. */
  context?: LogContext;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EntryLevel = Exclude<LogLevel, "silent">;

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? console;
  const base = options.context ?? {};

  const write = (level: EntryLevel, message: string, context?: LogContext) => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const merged = { ...base, ...context };
    if (Object.keys(merged).length === 0) {
      sink[level](`[tandem] ${message}`);
    } else {
      sink[level](`[tandem] ${message}`, merged);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}

export const silentLogger: Logger = createConsoleLogger({ level: "silent" });
