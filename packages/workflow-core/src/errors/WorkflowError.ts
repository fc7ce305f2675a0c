import type { UnknownRecord } from "../types.js";

/**
 * Base class for every error raised by the workflow packages.
 *
 * Carries a machine-readable `code` and optional debugging context, so callers
 * can branch on `error.code` instead of parsing messages.
 *
 * @example
 * ```typescript
 * try {
 *   workflow.fire("accept");
 * } catch (error) {
 *   if (isWorkflowError(error, "WORKFLOW_UNDEFINED_TRANSITION")) {
 *     // ...
 *   }
 * }
 * ```
 */
export class WorkflowError<TCode extends string = string> extends Error {
  public readonly code: TCode;

  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    // Only set context if provided (satisfies exactOptionalPropertyTypes)
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "WorkflowError";
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): WorkflowErrorJSON {
    const json: WorkflowErrorJSON = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    return json;
  }
}

/**
 * JSON representation of a WorkflowError.
 */
export interface WorkflowErrorJSON {
  name: string;
  code: string;
  message: string;
  context?: UnknownRecord;
}

/**
 * Check whether a value is a WorkflowError, optionally with a specific code.
 */
export function isWorkflowError(error: unknown, code?: string): error is WorkflowError {
  if (!(error instanceof WorkflowError)) return false;
  return code === undefined || error.code === code;
}
