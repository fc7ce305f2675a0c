/**
 * ## Workflow Operations - Functional Style
 *
 * Standalone functions mirroring the `WorkflowInstance` and `Specification`
 * methods, for callers that prefer passing the workflow around as data or
 * need a check as a callback.
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `fire(workflow, event, ...args)` | `TransitionOutcome` | Non-raising transition |
 * | `fireOrThrow(workflow, event, ...args)` | `TransitionedOutcome` | Raising transition |
 * | `canFire(workflow, event)` | `boolean` | Event legal in current state |
 * | `legalEvents(specification, state)` | `string[]` | Events of a state |
 * | `isTerminal(specification, state)` | `boolean` | State has no events |
 * | `isValidState(specification, state)` | `boolean` | State is declared |
 *
 * @example
 * ```typescript
 * const submittable = articles.filter((workflow) => canFire(workflow, "submit"));
 * ```
 */
import type { Specification } from "./definitions.js";
import type { WorkflowInstance } from "./instance.js";
import type { TransitionedOutcome, TransitionOutcome } from "./types.js";

export function fire<THost>(
  workflow: WorkflowInstance<THost>,
  event: string,
  ...args: unknown[]
): TransitionOutcome {
  return workflow.fire(event, ...args);
}

export function fireOrThrow<THost>(
  workflow: WorkflowInstance<THost>,
  event: string,
  ...args: unknown[]
): TransitionedOutcome {
  return workflow.fireOrThrow(event, ...args);
}

export function canFire<THost>(workflow: WorkflowInstance<THost>, event: string): boolean {
  return workflow.can(event);
}

/**
 * @throws UnknownStateError if the state is not declared
 */
export function legalEvents(specification: Specification, state: string): readonly string[] {
  return specification.requireState(state).eventNames;
}

/**
 * @throws UnknownStateError if the state is not declared
 */
export function isTerminal(specification: Specification, state: string): boolean {
  return specification.isTerminal(state);
}

export function isValidState(specification: Specification, state: string): boolean {
  return specification.hasState(state);
}
