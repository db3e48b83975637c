import pino from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.TERMILINK_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "warn";
}

// stdout is reserved for command output
export const logger: pino.Logger = pino(
  {
    name: "termilink",
    level: initialLevel(),
  },
  pino.destination(2)
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
