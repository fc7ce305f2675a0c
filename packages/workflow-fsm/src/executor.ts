/**
 * ## Transition Executor
 *
 * Resolves an event against the current state and fires its routines in a
 * fixed order:
 *
 * | Step | What | On failure |
 * |------|------|------------|
 * | 0 | resolve event and target | `UndefinedTransitionError` / `UnresolvedTargetError`, nothing fired |
 * | 1 | reset halt status | |
 * | 2 | action (may `halt`) | halted: stop, state unchanged |
 * | 3 | on_transition hooks, registration order | error propagates, state unchanged |
 * | 4 | on_exit of the source state | error propagates, state unchanged |
 * | 5 | **state := target** | |
 * | 6 | on_entry of the target state | error propagates, state already changed |
 *
 * Both call forms (`fire` / `fireOrThrow`) run this one function; the
 * raising form converts a halted outcome into `WorkflowHaltedError` afterwards.
 */
import {
  logTransitionCompleted,
  logTransitionFailed,
  logTransitionHalted,
  logTransitionStarted,
  logUndefinedTransition,
  reportTransition,
  traceStage,
  type BaseTransitionLogContext,
  type Logger,
} from "@waypoint/workflow-core";
import type { EventDefinition, Specification, StateDefinition } from "./definitions.js";
import { SpecificationError, UndefinedTransitionError, UnresolvedTargetError } from "./errors.js";
import type {
  ActionContext,
  ActionRoutine,
  EventArgs,
  HookRoutine,
  TransitionInfo,
  TransitionOutcome,
  WorkflowView,
} from "./types.js";

/**
 * Mutable state of one workflow instance. Only the executor writes it.
 */
export interface WorkflowRecord {
  currentState: string;
  halted: boolean;
  haltedBecause: string | undefined;
}

export interface TransitionRequest<THost> {
  specification: Specification;
  record: WorkflowRecord;
  view: WorkflowView<THost>;
  host: THost;
  logger: Logger;
  event: string;
  args: EventArgs;
}

export interface ResolvedTransition {
  source: StateDefinition;
  event: EventDefinition;
  target: StateDefinition;
}

/**
 * Thrown by `halt()` to leave the action; caught by the executor.
 */
class HaltSignal extends Error {
  constructor(readonly reason: string | undefined) {
    super(reason ?? "halted");
    this.name = "HaltSignal";
  }
}

/**
 * Look up the event in `state` and its target in the specification.
 *
 * @throws UnknownStateError if `state` is not declared
 * @throws UndefinedTransitionError if `state` has no such event
 * @throws UnresolvedTargetError if the event's target is not declared
 */
export function resolveTransition(
  specification: Specification,
  state: string,
  eventName: string
): ResolvedTransition {
  const source = specification.requireState(state);
  const event = source.getEvent(eventName);
  if (!event) {
    throw new UndefinedTransitionError(specification.name, state, eventName, source.eventNames);
  }
  const target = specification.getState(event.transitionsTo);
  if (!target) {
    throw new UnresolvedTargetError(specification.name, state, eventName, event.transitionsTo);
  }
  return { source, event, target };
}

function runAction<THost>(
  request: TransitionRequest<THost>,
  info: TransitionInfo<THost>,
  action: ActionRoutine,
  logContext: BaseTransitionLogContext
): void {
  const { record, specification } = request;
  let active = true;

  const context: ActionContext<THost> = {
    ...info,
    halt(reason?: string): never {
      if (!active) {
        throw new SpecificationError(
          "WORKFLOW_HALT_OUTSIDE_ACTION",
          specification.name,
          `halt() was called after the action of event "${info.event}" returned`
        );
      }
      record.halted = true;
      record.haltedBecause = reason;
      throw new HaltSignal(reason);
    },
  };

  try {
    traceStage(request.logger, logContext, "action", () => action(context));
  } catch (error) {
    if (!(error instanceof HaltSignal)) {
      logTransitionFailed(request.logger, logContext, "action", error);
      throw error;
    }
  } finally {
    active = false;
  }
}

/**
 * Fire the hooks of one stage in order.
 *
 * @returns The number of hooks fired
 */
function runStage<THost>(
  logger: Logger,
  logContext: BaseTransitionLogContext,
  stage: string,
  hooks: readonly HookRoutine[],
  info: TransitionInfo<THost>
): number {
  if (hooks.length === 0) return 0;
  try {
    traceStage(logger, logContext, stage, () => {
      for (const hook of hooks) {
        hook(info);
      }
    });
  } catch (error) {
    logTransitionFailed(logger, logContext, stage, error);
    throw error;
  }
  return hooks.length;
}

/**
 * Fire `request.event` against `request.record`.
 *
 * @returns The transitioned or halted outcome
 * @throws UndefinedTransitionError, UnresolvedTargetError before anything runs
 * @throws Whatever a routine throws, unchanged
 */
export function executeTransition<THost>(request: TransitionRequest<THost>): TransitionOutcome {
  const { specification, record, logger, event: eventName } = request;
  const from = record.currentState;
  const logContext: BaseTransitionLogContext = {
    workflow: specification.name,
    event: eventName,
    from,
  };

  let resolved: ResolvedTransition;
  try {
    resolved = resolveTransition(specification, from, eventName);
  } catch (error) {
    if (error instanceof UndefinedTransitionError) {
      logUndefinedTransition(logger, logContext, error.legalEvents);
    }
    throw error;
  }
  const { source, event, target } = resolved;
  const to = target.name;

  record.halted = false;
  record.haltedBecause = undefined;
  logTransitionStarted(logger, logContext, to);

  const info: TransitionInfo<THost> = Object.freeze({
    host: request.host,
    workflow: request.view,
    event: eventName,
    from,
    to,
    args: request.args,
  });

  let routines = 0;
  if (event.action) {
    routines += 1;
    runAction(request, info, event.action, logContext);
  }

  if (record.halted) {
    logTransitionHalted(logger, logContext, record.haltedBecause);
    reportTransition(logger, logContext, {
      status: "halted",
      reason: record.haltedBecause,
      routines,
    });
    return {
      ok: false,
      status: "halted",
      event: eventName,
      state: from,
      reason: record.haltedBecause,
    };
  }

  routines += runStage(logger, logContext, "on_transition", specification.onTransitionHooks, info);
  routines += runStage(logger, logContext, "on_exit", source.onExit ? [source.onExit] : [], info);

  record.currentState = to;

  routines += runStage(logger, logContext, "on_entry", target.onEntry ? [target.onEntry] : [], info);

  logTransitionCompleted(logger, logContext, to);
  reportTransition(logger, logContext, { status: "transitioned", to, routines });
  return { ok: true, status: "transitioned", event: eventName, from, to };
}
