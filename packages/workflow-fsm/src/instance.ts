/**
 * ## Workflow Instance - A Specification Bound to One Object
 *
 * Holds the current state and halt status of one object moving through a
 * workflow. The state starts at the specification's initial state, or at
 * `initialState` when a persistence layer restores it, and afterwards only
 * changes through `fire` / `fireOrThrow`.
 *
 * Instances are not synchronised: do not fire events on one instance from
 * concurrent callers.
 *
 * @example
 * ```typescript
 * const article = { title: "Hello", reviewer: undefined as string | undefined };
 * const workflow = bindWorkflow(article, articleWorkflow);
 *
 * workflow.fire("submit");                  // { ok: true, status: "transitioned", ... }
 * workflow.currentState;                    // "awaiting_review"
 * workflow.fire("accept");                  // throws UndefinedTransitionError
 *
 * const outcome = workflow.fire("review");
 * if (!outcome.ok) console.log(workflow.haltedBecause);
 * ```
 */
import type { Logger } from "@waypoint/workflow-core";
import type { Specification, StateDefinition } from "./definitions.js";
import { EmptySpecificationError, WorkflowHaltedError } from "./errors.js";
import { executeTransition, type WorkflowRecord } from "./executor.js";
import { SpecificationRegistry } from "./registry.js";
import type { TransitionedOutcome, TransitionOutcome, WorkflowView } from "./types.js";

export interface WorkflowOptions {
  /**
   * State restored from storage; must be declared in the specification.
   * Defaults to the specification's initial state.
   */
  initialState?: string | undefined;
  /** Defaults to the specification's logger */
  logger?: Logger | undefined;
  /** Registry used when the specification is given by name */
  registry?: SpecificationRegistry | undefined;
}

/**
 * Plain-data view of an instance, e.g. for persistence or diagnostics.
 */
export interface WorkflowSnapshot {
  workflow: string;
  state: string;
  halted: boolean;
  haltedBecause: string | undefined;
}

export class WorkflowInstance<THost = undefined> implements WorkflowView<THost> {
  readonly specification: Specification;
  readonly host: THost;
  private readonly record: WorkflowRecord;
  private readonly logger: Logger;

  constructor(specification: Specification, host: THost, options: WorkflowOptions = {}) {
    const initial = specification.initialState;
    if (initial === undefined) {
      throw new EmptySpecificationError(specification.name);
    }
    const state = options.initialState ?? initial;
    specification.requireState(state);

    this.specification = specification;
    this.host = host;
    this.logger = options.logger ?? specification.logger;
    this.record = { currentState: state, halted: false, haltedBecause: undefined };
  }

  get currentState(): string {
    return this.record.currentState;
  }

  get currentStateDefinition(): StateDefinition {
    return this.specification.requireState(this.record.currentState);
  }

  /**
   * True if the last transition attempt was halted.
   */
  get halted(): boolean {
    return this.record.halted;
  }

  /**
   * Reason given to `halt` by the last transition attempt, if any.
   */
  get haltedBecause(): string | undefined {
    return this.record.haltedBecause;
  }

  isState(name: string): boolean {
    return this.record.currentState === name;
  }

  /**
   * True if `event` is defined for the current state.
   */
  can(event: string): boolean {
    return this.currentStateDefinition.hasEvent(event);
  }

  availableEvents(): readonly string[] {
    return this.currentStateDefinition.eventNames;
  }

  /**
   * Fire an event. A halt is reported through the returned outcome and
   * `halted` / `haltedBecause`.
   *
   * @throws UndefinedTransitionError if the event is not legal in the current state
   * @throws UnresolvedTargetError if the event's target state is not declared
   */
  fire(event: string, ...args: unknown[]): TransitionOutcome {
    return executeTransition({
      specification: this.specification,
      record: this.record,
      view: this,
      host: this.host,
      logger: this.logger,
      event,
      args,
    });
  }

  /**
   * Fire an event, throwing if the action halts.
   *
   * @throws WorkflowHaltedError if the action halted; `halted` / `haltedBecause` are set as with `fire`
   * @throws UndefinedTransitionError if the event is not legal in the current state
   * @throws UnresolvedTargetError if the event's target state is not declared
   */
  fireOrThrow(event: string, ...args: unknown[]): TransitionedOutcome {
    const outcome = this.fire(event, ...args);
    if (!outcome.ok) {
      throw new WorkflowHaltedError(this.specification.name, outcome.state, event, outcome.reason);
    }
    return outcome;
  }

  snapshot(): WorkflowSnapshot {
    return {
      workflow: this.specification.name,
      state: this.record.currentState,
      halted: this.record.halted,
      haltedBecause: this.record.haltedBecause,
    };
  }
}

function resolveSpecification(
  specification: Specification | string,
  registry: SpecificationRegistry | undefined
): Specification {
  if (typeof specification !== "string") return specification;
  return (registry ?? SpecificationRegistry.getInstance()).require(specification);
}

/**
 * Create a standalone workflow instance (no host object).
 *
 * @throws SpecificationNotFoundError if given a name that was never declared
 * @throws EmptySpecificationError if the specification has no states
 * @throws UnknownStateError if `initialState` is not declared
 */
export function createWorkflow(
  specification: Specification | string,
  options: WorkflowOptions = {}
): WorkflowInstance<undefined> {
  return new WorkflowInstance(resolveSpecification(specification, options.registry), undefined, options);
}

/**
 * Create a workflow instance attached to `host`. Routines receive the host as
 * `host` in their context.
 *
 * @throws SpecificationNotFoundError if given a name that was never declared
 * @throws EmptySpecificationError if the specification has no states
 * @throws UnknownStateError if `initialState` is not declared
 */
export function bindWorkflow<THost>(
  host: THost,
  specification: Specification | string,
  options: WorkflowOptions = {}
): WorkflowInstance<THost> {
  return new WorkflowInstance(resolveSpecification(specification, options.registry), host, options);
}
