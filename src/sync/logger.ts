import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// The CLI may override this once arguments are parsed
function initialLevel(): LogLevel {
  const fromEnv = process.env.SYNC_LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === fromEnv) ?? "info";
}

const consoleLine = winston.format.printf(({ timestamp, level, message, context, ...fields }) => {
  const scope = context ? ` [${String(context)}]` : "";
  const extra = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  return `${String(timestamp)} ${level}${scope} ${String(message)}${extra}`;
});

export const logger = winston.createLogger({
  level: initialLevel(),
  format: isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
    : winston.format.combine(winston.format.timestamp({ format: "HH:mm:ss" }), winston.format.colorize(), consoleLine),
  transports: [new winston.transports.Console()],
});

export function createChildLogger(context: string) {
  return logger.child({ context });
}

/** Child loggers read the level from the root logger, so this applies everywhere. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
