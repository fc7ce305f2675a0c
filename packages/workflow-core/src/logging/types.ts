/**
 * Logging Types
 *
 * Six-level logging hierarchy used by the builder, the registry and the
 * transition executor.
 *
 * Log levels (most to least verbose):
 * - DEBUG: Specification changes, resolution details
 * - TRACE: Timing of each stage of a transition that has routines
 * - INFO: Completed transitions
 * - REPORT: One JSON summary per transition attempt
 * - WARN: Halts, undefined transitions, re-declarations
 * - ERROR: Routines that threw
 */

import type { UnknownRecord } from "../types.js";

/**
 * Log level type.
 *
 * Priority order (lower number = more verbose):
 * DEBUG(0) > TRACE(1) > INFO(2) > REPORT(3) > WARN(4) > ERROR(5)
 */
export type LogLevel = "DEBUG" | "TRACE" | "INFO" | "REPORT" | "WARN" | "ERROR";

/**
 * All log levels, most verbose first.
 */
export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

/**
 * Priority mapping for log levels.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

/**
 * Default log level.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface.
 *
 * Each method takes a descriptive message and optional structured data.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Workflow:article", "DEBUG");
 *
 * logger.debug("State declared", { state: "new" });
 * logger.info("Transition completed", { from: "new", to: "awaiting_review" });
 * logger.warn("Transition halted", { reason: "missing reviewer" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;

  /**
   * Use for timing; `{ timing: "start" | "end" }` maps onto console.time/timeEnd.
   */
  trace(message: string, data?: UnknownRecord): void;

  info(message: string, data?: UnknownRecord): void;

  /**
   * Emits one JSON line for aggregation systems.
   */
  report(message: string, data?: UnknownRecord): void;

  warn(message: string, data?: UnknownRecord): void;

  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}
