/**
 * ## defineWorkflow - Declarative Workflow DSL
 *
 * Records `state`, `event`, `onEntry`, `onExit`, `onTransition` and `meta`
 * calls as statements and compiles them into the registry. Calling
 * `defineWorkflow` again with the same name re-opens the specification and
 * merges the new declarations into it.
 *
 * @example
 * ```typescript
 * interface Article {
 *   reviewer?: string;
 * }
 *
 * const articleWorkflow = defineWorkflow<Article>("Article", (w) => {
 *   w.state("new", (s) => {
 *     s.event("submit", "awaiting_review");
 *   });
 *   w.state("awaiting_review", (s) => {
 *     s.event("review", "being_reviewed");
 *   });
 *   w.state("being_reviewed", { color: "yellow" }, (s) => {
 *     s.event("accept", "accepted", {
 *       action: ({ host, halt }) => {
 *         if (!host.reviewer) halt("no reviewer");
 *       },
 *     });
 *     s.event("reject", "rejected");
 *   });
 *   w.state("accepted");
 *   w.state("rejected");
 *
 *   w.onTransition(({ from, to, event }) => audit.push(`${from} -${event}-> ${to}`));
 * });
 * ```
 */
import type { MetaInput } from "./meta.js";
import { compileStatements } from "./compile.js";
import type { Specification } from "./definitions.js";
import type { SpecificationRegistry } from "./registry.js";
import {
  declareEvent,
  declareMeta,
  declareOnEntry,
  declareOnExit,
  declareOnTransition,
  declareState,
  type SpecStatement,
} from "./statements.js";
import type { ActionRoutine, HookRoutine } from "./types.js";

export interface EventOptions<THost = unknown> {
  meta?: MetaInput;
  action?: ActionRoutine<THost>;
}

export type StateBody<THost = unknown> = (state: StateBuilder<THost>) => void;

export type WorkflowBody<THost = unknown> = (workflow: SpecBuilder<THost>) => void;

function isStateBody<THost>(
  value: MetaInput | StateBody<THost> | undefined
): value is StateBody<THost> {
  return typeof value === "function";
}

/**
 * Statements scoped to one state.
 */
export class StateBuilder<THost = unknown> {
  constructor(
    readonly stateName: string,
    private readonly sink: SpecStatement<THost>[]
  ) {}

  /**
   * Declare an event legal in this state. The target does not need to be
   * declared yet.
   */
  event(name: string, target: string, options: EventOptions<THost> = {}): this {
    this.sink.push(
      declareEvent(this.stateName, name, target, { action: options.action, meta: options.meta })
    );
    return this;
  }

  onEntry(routine: HookRoutine<THost>): this {
    this.sink.push(declareOnEntry(this.stateName, routine));
    return this;
  }

  onExit(routine: HookRoutine<THost>): this {
    this.sink.push(declareOnExit(this.stateName, routine));
    return this;
  }

  meta(meta: MetaInput): this {
    this.sink.push(declareMeta({ state: this.stateName }, meta));
    return this;
  }

  /**
   * Attach meta to an event declared earlier.
   */
  eventMeta(event: string, meta: MetaInput): this {
    this.sink.push(declareMeta({ state: this.stateName, event }, meta));
    return this;
  }
}

/**
 * Statements of one specification.
 */
export class SpecBuilder<THost = unknown> {
  private readonly recorded: SpecStatement<THost>[] = [];

  constructor(readonly name: string) {}

  state(name: string, body?: StateBody<THost>): this;
  state(name: string, meta: MetaInput, body?: StateBody<THost>): this;
  state(name: string, metaOrBody?: MetaInput | StateBody<THost>, maybeBody?: StateBody<THost>): this {
    const body = isStateBody(metaOrBody) ? metaOrBody : maybeBody;
    this.recorded.push(declareState(name));
    if (metaOrBody !== undefined && !isStateBody(metaOrBody)) {
      this.recorded.push(declareMeta({ state: name }, metaOrBody));
    }
    if (body) {
      body(new StateBuilder(name, this.recorded));
    }
    return this;
  }

  onTransition(routine: HookRoutine<THost>): this {
    this.recorded.push(declareOnTransition(routine));
    return this;
  }

  get statements(): readonly SpecStatement<THost>[] {
    return [...this.recorded];
  }

  build(registry?: SpecificationRegistry): Specification {
    return compileStatements(this.name, this.recorded, registry);
  }
}

export interface DefineWorkflowOptions {
  /** Target registry (default: the process-wide registry) */
  registry?: SpecificationRegistry;
}

/**
 * Declare (or re-open) the workflow specification `name`.
 *
 * @returns The specification, shared by every instance bound to `name`
 * @throws SpecificationError if a declaration is invalid
 */
export function defineWorkflow<THost = unknown>(
  name: string,
  body: WorkflowBody<THost>,
  options: DefineWorkflowOptions = {}
): Specification {
  const builder = new SpecBuilder<THost>(name);
  body(builder);
  return builder.build(options.registry);
}
