/**
 * Mock loggers that capture log calls for assertion in tests.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const workflow = createWorkflow(articleSpec, { logger });
 *
 * workflow.fire("submit");
 *
 * expect(logger.hasLoggedAt("INFO", "Transition completed")).toBe(true);
 * ```
 */

import type { Logger, LogLevel } from "./types.js";
import type { UnknownRecord } from "../types.js";

/**
 * A single captured log call.
 */
export interface LogCall {
  level: LogLevel;
  message: string;
  /** Undefined if the caller passed no data */
  data: UnknownRecord | undefined;
}

/**
 * Logger that records every call.
 */
export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;

  clear(): void;

  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;

  /** Partial match on the message, any level. */
  hasLoggedMessage(message: string): boolean;

  /** Partial match on the message at one level. */
  hasLoggedAt(level: LogLevel, message: string): boolean;

  getLastCallAt(level: LogLevel): LogCall | undefined;
}

/**
 * Create a mock logger for testing.
 *
 * The `calls` array is unbounded; call `clear()` between phases of a long test.
 */
export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];

  const at = (level: LogLevel): LogCall[] => calls.filter((call) => call.level === level);

  const capture =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({ level, message, data });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },
    clear: () => {
      calls.length = 0;
    },
    getCallsAtLevel: at,
    hasLoggedMessage: (message) => calls.some((call) => call.message.includes(message)),
    hasLoggedAt: (level, message) => at(level).some((call) => call.message.includes(message)),
    getLastCallAt: (level) => at(level).at(-1),

    debug: capture("DEBUG"),
    trace: capture("TRACE"),
    info: capture("INFO"),
    report: capture("REPORT"),
    warn: capture("WARN"),
    error: capture("ERROR"),
  };
}
