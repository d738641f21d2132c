import { destination, pino, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** File descriptor the JSON lines go to. Defaults to stderr so stdout stays machine-readable. */
  fd?: number;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      name: "tvstream",
      level: options.level ?? "warn",
      base: null,
    },
    destination({ fd: options.fd ?? 2, sync: true }),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
