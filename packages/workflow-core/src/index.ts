/**
 * Shared foundations for the workflow packages: type aliases, coded errors,
 * engine configuration and scoped logging.
 *
 * @example
 * ```typescript
 * import { createScopedLogger, resolveEngineConfig } from "@waypoint/workflow-core";
 *
 * const config = resolveEngineConfig();
 * const logger = createScopedLogger("Workflow:article", config.logLevel);
 * ```
 *
 * @module @waypoint/workflow-core
 */

export type { UnknownRecord } from "./types.js";
export { assertNever } from "./types.js";

export * from "./errors/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
