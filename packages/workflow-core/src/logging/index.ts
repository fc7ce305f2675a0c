/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@waypoint/workflow-core";
 *
 * const logger = createScopedLogger("Workflow:article", "DEBUG");
 * const silent = createNoOpLogger();
 * ```
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

// Factories
export {
  createScopedLogger,
  createNoOpLogger,
  createConfiguredLogger,
  TRACE_TIMING,
} from "./scoped.js";
export type { TraceTiming } from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";

// Transition logging helpers
export type { BaseTransitionLogContext, TransitionSummary } from "./transitions.js";
export {
  logTransitionStarted,
  logTransitionCompleted,
  logTransitionHalted,
  logUndefinedTransition,
  logTransitionFailed,
  traceStage,
  reportTransition,
} from "./transitions.js";
