import { pino, type Logger } from "pino";

export type { Logger };

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export type LoggerConfig = {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Additional context to include in all log messages */
  baseContext?: Record<string, unknown>;
};

/**
 * Structured JSON logger. Metadata goes first, the message second:
 * `logger.info({ version }, "published rule set")`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = "info", baseContext = {} } = config;
  return pino({
    level,
    base: { name: "json-mutation-engine", ...baseContext },
  });
}

/** A logger that drops everything; the default for embedded use and tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
