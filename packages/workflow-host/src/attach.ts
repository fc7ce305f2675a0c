/**
 * ## attachWorkflow - Bind a Workflow to a Host Object
 *
 * Glue between an application object and the engine:
 *
 * 1. read the stored state through the persistence collaborator (if any);
 * 2. bind a `WorkflowInstance` at that state, or at the initial state;
 * 3. after every completed transition, save the new state.
 *
 * @example
 * ```typescript
 * const article: Article = { id: "a-1", workflowState: undefined, reviewer: undefined };
 * const attached = attachWorkflow(article, "Article", {
 *   persistence: fieldPersistence("workflowState"),
 * });
 *
 * attached.events.submit?.();
 * article.workflowState;            // "awaiting_review"
 * attached.states.awaiting_review(); // true
 * ```
 */
import type { Logger } from "@waypoint/workflow-core";
import {
  bindWorkflow,
  type Specification,
  type SpecificationRegistry,
  type TransitionedOutcome,
  type TransitionOutcome,
  type WorkflowInstance,
} from "@waypoint/workflow-fsm";
import type { WorkflowPersistence } from "./persistence.js";
import {
  bindEvents,
  statePredicates,
  type EventMethods,
  type Fireable,
  type StatePredicates,
} from "./proxies.js";

export interface AttachWorkflowOptions<THost> {
  persistence?: WorkflowPersistence<THost> | undefined;
  logger?: Logger | undefined;
  /** Registry used when the specification is given by name */
  registry?: SpecificationRegistry | undefined;
}

/**
 * A host object's workflow with persistence and method-style accessors.
 */
export class HostWorkflow<THost> implements Fireable {
  readonly workflow: WorkflowInstance<THost>;
  /** Non-raising event methods */
  readonly events: EventMethods<TransitionOutcome>;
  /** Event methods that throw `WorkflowHaltedError` on halt */
  readonly strictEvents: EventMethods<TransitionedOutcome>;
  readonly states: StatePredicates;
  private readonly persistence: WorkflowPersistence<THost> | undefined;

  constructor(workflow: WorkflowInstance<THost>, persistence?: WorkflowPersistence<THost>) {
    this.workflow = workflow;
    this.persistence = persistence;
    this.events = bindEvents(this);
    this.strictEvents = bindEvents(this, { raiseOnHalt: true });
    this.states = statePredicates(workflow);
  }

  get host(): THost {
    return this.workflow.host;
  }

  get currentState(): string {
    return this.workflow.currentState;
  }

  get halted(): boolean {
    return this.workflow.halted;
  }

  get haltedBecause(): string | undefined {
    return this.workflow.haltedBecause;
  }

  fire(event: string, ...args: unknown[]): TransitionOutcome {
    const outcome = this.workflow.fire(event, ...args);
    if (outcome.ok) {
      this.persist(outcome.to);
    }
    return outcome;
  }

  fireOrThrow(event: string, ...args: unknown[]): TransitionedOutcome {
    const outcome = this.workflow.fireOrThrow(event, ...args);
    this.persist(outcome.to);
    return outcome;
  }

  private persist(state: string): void {
    this.persistence?.saveState(this.workflow.host, state);
  }
}

/**
 * Attach the workflow `specification` to `host`.
 *
 * @throws SpecificationNotFoundError if given a name that was never declared
 * @throws UnknownStateError if the stored state is not declared in the specification
 */
export function attachWorkflow<THost>(
  host: THost,
  specification: Specification | string,
  options: AttachWorkflowOptions<THost> = {}
): HostWorkflow<THost> {
  const workflow = bindWorkflow(host, specification, {
    initialState: options.persistence?.loadState(host),
    logger: options.logger,
    registry: options.registry,
  });
  return new HostWorkflow(workflow, options.persistence);
}
