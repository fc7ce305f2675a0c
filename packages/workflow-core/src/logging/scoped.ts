/**
 * ## Scoped Loggers
 *
 * Factory for loggers with a scope prefix and level filtering. The workflow
 * packages create one per specification (`Workflow:<name>`) so that log lines
 * from different machines can be told apart.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Workflow:article", "INFO");
 *
 * logger.debug("This is suppressed");
 * logger.info("Transition completed"); // [Workflow:article] Transition completed
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Values of the `timing` field understood by `trace`.
 */
export const TRACE_TIMING = {
  START: "start",
  END: "end",
} as const;
export type TraceTiming = (typeof TRACE_TIMING)[keyof typeof TRACE_TIMING];

type ConsoleMethod = "debug" | "info" | "log" | "warn" | "error";

/**
 * Console method each level writes to. TRACE lines without a timing mark are
 * written with `debug`; REPORT lines are JSON and go to `log`.
 */
const CONSOLE_METHOD: Record<LogLevel, ConsoleMethod> = {
  DEBUG: "debug",
  TRACE: "debug",
  INFO: "info",
  REPORT: "log",
  WARN: "warn",
  ERROR: "error",
};

function isTraceTiming(value: unknown): value is TraceTiming {
  return value === TRACE_TIMING.START || value === TRACE_TIMING.END;
}

/**
 * Create a scoped logger with level filtering.
 *
 * @param scope - Prefix for log messages (e.g., "Workflow:article")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  // Looked up on every call so tests can spy on the console after import.
  const write = (target: LogLevel, line: string): void => {
    globalThis.console[CONSOLE_METHOD[target]](line);
  };

  const line = (message: string, data?: UnknownRecord): string =>
    data && Object.keys(data).length > 0
      ? `${prefix} ${message} ${JSON.stringify(data)}`
      : `${prefix} ${message}`;

  const emit =
    (target: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      if (shouldLog(target, level)) write(target, line(message, data));
    };

  return {
    debug: emit("DEBUG"),
    info: emit("INFO"),
    warn: emit("WARN"),
    error: emit("ERROR"),

    trace(message: string, data?: UnknownRecord): void {
      if (!shouldLog("TRACE", level)) return;
      const timing = data?.["timing"];
      if (!isTraceTiming(timing)) {
        write("TRACE", line(message, data));
      } else if (timing === TRACE_TIMING.START) {
        globalThis.console.time(`${prefix} ${message}`);
      } else {
        globalThis.console.timeEnd(`${prefix} ${message}`);
      }
    },

    report(message: string, data?: UnknownRecord): void {
      if (!shouldLog("REPORT", level)) return;
      write("REPORT", JSON.stringify({ scope, message, ...data, timestamp: Date.now() }));
    },
  };
}

/**
 * Create a logger that discards all messages.
 *
 * Default for instances and registries that were given no logger.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Create the logger an engine component uses for `scope`: a scoped console
 * logger when logging is enabled, a no-op logger otherwise.
 *
 * @example
 * ```typescript
 * const config = resolveEngineConfig();
 * const logger = createConfiguredLogger("Workflow:article", config);
 * ```
 */
export function createConfiguredLogger(
  scope: string,
  options: { logging: boolean; logLevel: LogLevel }
): Logger {
  return options.logging ? createScopedLogger(scope, options.logLevel) : createNoOpLogger();
}
