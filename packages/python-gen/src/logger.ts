export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface BindgenLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const noop = (): void => undefined;

export const NOOP_LOGGER: BindgenLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Console logger that writes every level to stderr, leaving stdout for generated source.
 */
export function createConsoleLogger(prefix = "wirebind", level: LogLevel = "info"): BindgenLogger {
  const log =
    (messageLevel: Exclude<LogLevel, "silent">) =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[messageLevel] < LEVEL_ORDER[level]) {
        return;
      }
      const line = `[${prefix}] ${messageLevel}: ${message}`;
      if (meta) {
        console.error(line, meta);
      } else {
        console.error(line);
      }
    };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}
