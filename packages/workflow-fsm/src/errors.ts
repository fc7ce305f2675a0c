/**
 * Errors raised by the specification builder and the transition executor.
 *
 * | Error | Code | Raised when |
 * |-------|------|-------------|
 * | `UndefinedTransitionError` | `WORKFLOW_UNDEFINED_TRANSITION` | Event not legal in the current state |
 * | `UnresolvedTargetError` | `WORKFLOW_UNRESOLVED_TARGET` | Event target not declared (yet) |
 * | `WorkflowHaltedError` | `WORKFLOW_HALTED` | `fireOrThrow` and the action halted |
 * | `UnknownStateError` | `WORKFLOW_UNKNOWN_STATE` | A state name is not declared |
 * | `SpecificationNotFoundError` | `WORKFLOW_SPECIFICATION_NOT_FOUND` | Lookup of an unregistered name |
 * | `EmptySpecificationError` | `WORKFLOW_EMPTY_SPECIFICATION` | Binding to a specification without states |
 * | `SpecificationError` | `WORKFLOW_DUPLICATE_DECLARATION`, `WORKFLOW_INVALID_DECLARATION`, `WORKFLOW_HALT_OUTSIDE_ACTION` | Invalid declarations or misuse of `halt` |
 */
import { WorkflowError } from "@waypoint/workflow-core";

export const WorkflowErrorCodes = {
  UNDEFINED_TRANSITION: "WORKFLOW_UNDEFINED_TRANSITION",
  UNRESOLVED_TARGET: "WORKFLOW_UNRESOLVED_TARGET",
  HALTED: "WORKFLOW_HALTED",
  UNKNOWN_STATE: "WORKFLOW_UNKNOWN_STATE",
  SPECIFICATION_NOT_FOUND: "WORKFLOW_SPECIFICATION_NOT_FOUND",
  EMPTY_SPECIFICATION: "WORKFLOW_EMPTY_SPECIFICATION",
  DUPLICATE_DECLARATION: "WORKFLOW_DUPLICATE_DECLARATION",
  INVALID_DECLARATION: "WORKFLOW_INVALID_DECLARATION",
  HALT_OUTSIDE_ACTION: "WORKFLOW_HALT_OUTSIDE_ACTION",
} as const;

export type WorkflowErrorCode = (typeof WorkflowErrorCodes)[keyof typeof WorkflowErrorCodes];

function formatList(names: readonly string[]): string {
  return names.map((name) => `"${name}"`).join(", ");
}

/**
 * The event is not defined for the current state.
 *
 * The message names the state and lists the events legal there, so that the
 * caller can see the mistake without reflecting over the specification.
 */
export class UndefinedTransitionError extends WorkflowError<"WORKFLOW_UNDEFINED_TRANSITION"> {
  readonly workflow: string;
  readonly state: string;
  readonly event: string;
  readonly legalEvents: readonly string[];

  constructor(workflow: string, state: string, event: string, legalEvents: readonly string[]) {
    const legal =
      legalEvents.length > 0
        ? `Legal events: ${formatList(legalEvents)}`
        : "No events are defined for this state";
    super(
      WorkflowErrorCodes.UNDEFINED_TRANSITION,
      `There is no event "${event}" defined for the "${state}" state of workflow "${workflow}". ${legal}`,
      { workflow, state, event, legalEvents: [...legalEvents] }
    );
    this.name = "UndefinedTransitionError";
    this.workflow = workflow;
    this.state = state;
    this.event = event;
    this.legalEvents = legalEvents;
  }
}

/**
 * The event exists but its target state has not been declared.
 */
export class UnresolvedTargetError extends WorkflowError<"WORKFLOW_UNRESOLVED_TARGET"> {
  readonly workflow: string;
  readonly state: string;
  readonly event: string;
  readonly target: string;

  constructor(workflow: string, state: string, event: string, target: string) {
    super(
      WorkflowErrorCodes.UNRESOLVED_TARGET,
      `Event "${event}" of state "${state}" in workflow "${workflow}" transitions to undeclared state "${target}"`,
      { workflow, state, event, target }
    );
    this.name = "UnresolvedTargetError";
    this.workflow = workflow;
    this.state = state;
    this.event = event;
    this.target = target;
  }
}

/**
 * The action halted the transition (raising call form only).
 */
export class WorkflowHaltedError extends WorkflowError<"WORKFLOW_HALTED"> {
  readonly workflow: string;
  readonly state: string;
  readonly event: string;
  readonly reason: string | undefined;

  constructor(workflow: string, state: string, event: string, reason: string | undefined) {
    const suffix = reason === undefined ? "" : `: ${reason}`;
    super(
      WorkflowErrorCodes.HALTED,
      `Event "${event}" was halted in state "${state}" of workflow "${workflow}"${suffix}`,
      { workflow, state, event, reason: reason ?? null }
    );
    this.name = "WorkflowHaltedError";
    this.workflow = workflow;
    this.state = state;
    this.event = event;
    this.reason = reason;
  }
}

export class UnknownStateError extends WorkflowError<"WORKFLOW_UNKNOWN_STATE"> {
  readonly workflow: string;
  readonly state: string;

  constructor(workflow: string, state: string, declaredStates: readonly string[]) {
    super(
      WorkflowErrorCodes.UNKNOWN_STATE,
      `State "${state}" is not declared in workflow "${workflow}". Declared states: ${formatList(declaredStates)}`,
      { workflow, state, declaredStates: [...declaredStates] }
    );
    this.name = "UnknownStateError";
    this.workflow = workflow;
    this.state = state;
  }
}

export class SpecificationNotFoundError extends WorkflowError<"WORKFLOW_SPECIFICATION_NOT_FOUND"> {
  readonly workflow: string;

  constructor(workflow: string) {
    super(WorkflowErrorCodes.SPECIFICATION_NOT_FOUND, `No workflow specification named "${workflow}"`, {
      workflow,
    });
    this.name = "SpecificationNotFoundError";
    this.workflow = workflow;
  }
}

export class EmptySpecificationError extends WorkflowError<"WORKFLOW_EMPTY_SPECIFICATION"> {
  readonly workflow: string;

  constructor(workflow: string) {
    super(
      WorkflowErrorCodes.EMPTY_SPECIFICATION,
      `Workflow "${workflow}" declares no states and cannot be bound`,
      { workflow }
    );
    this.name = "EmptySpecificationError";
    this.workflow = workflow;
  }
}

export type SpecificationErrorCode =
  | "WORKFLOW_DUPLICATE_DECLARATION"
  | "WORKFLOW_INVALID_DECLARATION"
  | "WORKFLOW_HALT_OUTSIDE_ACTION";

/**
 * A declaration (or a routine) broke a rule of the specification language.
 */
export class SpecificationError extends WorkflowError<SpecificationErrorCode> {
  readonly workflow: string;

  constructor(code: SpecificationErrorCode, workflow: string, message: string) {
    super(code, `${message} (workflow "${workflow}")`, { workflow });
    this.name = "SpecificationError";
    this.workflow = workflow;
  }
}
