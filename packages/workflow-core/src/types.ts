/**
 * Core Type Aliases
 *
 * Shared type definitions used by every @waypoint package.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for structured log data, error context and meta dictionary input.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * @example
 * ```typescript
 * switch (statement.kind) {
 *   case "state":
 *     return applyState(statement);
 *   // ...
 *   default:
 *     return assertNever(statement);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
