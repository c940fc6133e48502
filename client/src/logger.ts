/**
 * Pluggable log sink for the client.
 *
 * The connection logs each outgoing request at `info` and each raw
 * response body at `debug`. Callers pass their own {@link Logger} or
 * build the default JSON-lines console logger with a minimum level.
 *
 * @module logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Receives structured log events. */
export interface Logger {
  log(level: LogLevel, event: string, details: Record<string, unknown>): void;
}

/** Strip control characters and bidi overrides from strings before logging. */
function sanitizeLogInput(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\u200E\u200F\u202A-\u202E\u2066-\u2069]/g, "");
}

function sanitizeDetails(details: Record<string, unknown>): Record<string, unknown> {
  const clean: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(details)) {
    clean[k] = typeof v === "string" ? sanitizeLogInput(v) : v;
  }
  return clean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Console logger writing one JSON object per line:
 * `{ timestamp, level, event, details }`.
 *
 * @param minLevel - Entries below this level are dropped (default "warn").
 */
export function createConsoleLogger(minLevel: LogLevel = "warn"): Logger {
  return {
    log(level, event, details) {
      if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return;

      const line = JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        event,
        details: sanitizeDetails(details),
      });

      switch (level) {
        case "error":
          console.error(line);
          break;
        case "warn":
          console.warn(line);
          break;
        default:
          console.log(line);
          break;
      }
    },
  };
}

/** Discards everything. */
export const silentLogger: Logger = {
  log() {},
};
