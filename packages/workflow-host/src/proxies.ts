/**
 * Method-style access to a workflow: `events.submit(...)` fires "submit",
 * `states.accepted()` tests for "accepted".
 *
 * The proxies add no rules of their own. An event that is not legal in the
 * current state fails with the engine's `UndefinedTransitionError`, which
 * already names the state and its legal events.
 *
 * @example
 * ```typescript
 * const events = bindEvents(workflow);
 * const states = statePredicates(workflow);
 *
 * events.submit?.();
 * states.awaiting_review?.(); // true
 * events.accept?.();         // UndefinedTransitionError: ... Legal events: "review"
 * ```
 */
import {
  UnknownStateError,
  type TransitionedOutcome,
  type TransitionOutcome,
  type WorkflowInstance,
} from "@waypoint/workflow-fsm";

/**
 * Anything events can be fired on: a `WorkflowInstance` or a `HostWorkflow`.
 */
export interface Fireable {
  fire(event: string, ...args: unknown[]): TransitionOutcome;
  fireOrThrow(event: string, ...args: unknown[]): TransitionedOutcome;
}

export type EventMethod<TOutcome extends TransitionOutcome> = (...args: unknown[]) => TOutcome;

export type EventMethods<TOutcome extends TransitionOutcome = TransitionOutcome> = Readonly<
  Record<string, EventMethod<TOutcome>>
>;

export type StatePredicates = Readonly<Record<string, () => boolean>>;

/**
 * Property names that must not be mistaken for events or states: `then`
 * would make the proxy look like a promise to `await`, and `toJSON` would be
 * called by `JSON.stringify`.
 */
const RESERVED_PROPERTIES = new Set(["then", "toJSON"]);

export interface BindEventsOptions {
  /** Throw `WorkflowHaltedError` instead of returning a halted outcome */
  raiseOnHalt?: boolean;
}

export function bindEvents(target: Fireable): EventMethods<TransitionOutcome>;
export function bindEvents(
  target: Fireable,
  options: { raiseOnHalt: true }
): EventMethods<TransitionedOutcome>;
export function bindEvents(target: Fireable, options?: BindEventsOptions): EventMethods;
export function bindEvents(target: Fireable, options: BindEventsOptions = {}): EventMethods {
  const methods: Record<string, EventMethod<TransitionOutcome>> = {};
  return new Proxy(methods, {
    get(_methods, property) {
      if (typeof property !== "string" || RESERVED_PROPERTIES.has(property)) {
        return undefined;
      }
      return options.raiseOnHalt
        ? (...args: unknown[]) => target.fireOrThrow(property, ...args)
        : (...args: unknown[]) => target.fire(property, ...args);
    },
  });
}

/**
 * @throws UnknownStateError when a predicate for an undeclared state is read
 */
export function statePredicates<THost>(workflow: WorkflowInstance<THost>): StatePredicates {
  const predicates: Record<string, () => boolean> = {};
  return new Proxy(predicates, {
    get(_predicates, property) {
      if (typeof property !== "string" || RESERVED_PROPERTIES.has(property)) {
        return undefined;
      }
      const specification = workflow.specification;
      if (!specification.hasState(property)) {
        throw new UnknownStateError(specification.name, property, specification.stateNames);
      }
      return () => workflow.isState(property);
    },
  });
}
