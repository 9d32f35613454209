import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function parseLogLevel(raw: unknown): LogLevel | undefined {
  if (typeof raw !== "string") return undefined;
  const level = raw.trim().toLowerCase();
  return LEVELS.find((l) => l === level);
}

export interface LoggerOpts {
  level?: LogLevel;
  /** Defaults to stderr; stdout belongs to the stdio transport. */
  destination?: pino.DestinationStream;
}

export function createLogger(opts: LoggerOpts = {}): Logger {
  return pino(
    {
      level: opts.level ?? "info",
      base: { service: "taskpilot-mcp" },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    opts.destination ?? pino.destination(2)
  );
}
