/**
 * ## Specification Compiler
 *
 * Applies a list of declarative statements to the specification registered
 * under a name, creating it on first use.
 *
 * ### Merge rules
 *
 * - New states and events are appended in statement order.
 * - The initial state is whichever state the very first compilation declared.
 * - Event targets are not checked; they are resolved when a transition fires.
 * - A statement naming an undeclared state declares it.
 *
 * ### Re-declaration (`redeclare` engine option)
 *
 * | Re-declared | `merge` (default) | `error` |
 * |-------------|-------------------|---------|
 * | state | kept, new events appended | same |
 * | event | replaced in place (same position) | `SpecificationError` |
 * | on_entry / on_exit | replaced | `SpecificationError` |
 * | meta key | overwritten | overwritten |
 *
 * A batch is checked completely before it is applied, so a rejected batch
 * leaves the specification untouched.
 */
import type { RedeclarePolicy } from "@waypoint/workflow-core";
import { assertNever } from "@waypoint/workflow-core";
import { EventDefinition, type Specification } from "./definitions.js";
import { SpecificationError } from "./errors.js";
import { SpecificationRegistry } from "./registry.js";
import type { SpecStatement } from "./statements.js";

interface StatePlan {
  events: Set<string>;
  hasEntryHook: boolean;
  hasExitHook: boolean;
}

function requireName(workflow: string, kind: string, name: string): void {
  if (name.trim() === "") {
    throw new SpecificationError(
      "WORKFLOW_INVALID_DECLARATION",
      workflow,
      `${kind} names must not be empty`
    );
  }
}

function duplicate(workflow: string, message: string): SpecificationError {
  return new SpecificationError("WORKFLOW_DUPLICATE_DECLARATION", workflow, message);
}

/**
 * Check a batch against the specification as it will be when the batch is
 * applied, without mutating anything.
 */
function checkStatements<THost>(
  workflow: string,
  existing: Specification | undefined,
  statements: readonly SpecStatement<THost>[],
  policy: RedeclarePolicy
): void {
  const plans = new Map<string, StatePlan>();

  const planFor = (stateName: string): StatePlan => {
    let plan = plans.get(stateName);
    if (!plan) {
      const state = existing?.getState(stateName);
      plan = {
        events: new Set(state?.eventNames ?? []),
        hasEntryHook: state?.hasEntryHook ?? false,
        hasExitHook: state?.hasExitHook ?? false,
      };
      plans.set(stateName, plan);
    }
    return plan;
  };

  for (const statement of statements) {
    switch (statement.kind) {
      case "state":
        requireName(workflow, "State", statement.state);
        planFor(statement.state);
        break;

      case "event": {
        requireName(workflow, "State", statement.state);
        requireName(workflow, "Event", statement.event);
        requireName(workflow, "Target state", statement.target);
        const plan = planFor(statement.state);
        if (policy === "error" && plan.events.has(statement.event)) {
          throw duplicate(
            workflow,
            `Event "${statement.event}" is already declared for state "${statement.state}"`
          );
        }
        plan.events.add(statement.event);
        break;
      }

      case "onEntry": {
        requireName(workflow, "State", statement.state);
        const plan = planFor(statement.state);
        if (policy === "error" && plan.hasEntryHook) {
          throw duplicate(workflow, `State "${statement.state}" already has an on_entry hook`);
        }
        plan.hasEntryHook = true;
        break;
      }

      case "onExit": {
        requireName(workflow, "State", statement.state);
        const plan = planFor(statement.state);
        if (policy === "error" && plan.hasExitHook) {
          throw duplicate(workflow, `State "${statement.state}" already has an on_exit hook`);
        }
        plan.hasExitHook = true;
        break;
      }

      case "onTransition":
        break;

      case "meta": {
        requireName(workflow, "State", statement.state);
        const plan = planFor(statement.state);
        if (statement.event !== undefined && !plan.events.has(statement.event)) {
          throw new SpecificationError(
            "WORKFLOW_INVALID_DECLARATION",
            workflow,
            `Cannot attach meta to undeclared event "${statement.event}" of state "${statement.state}"`
          );
        }
        break;
      }

      default:
        assertNever(statement);
    }
  }
}

function applyStatement<THost>(
  specification: Specification,
  statement: SpecStatement<THost>
): void {
  const logger = specification.logger;
  const workflow = specification.name;

  switch (statement.kind) {
    case "state": {
      if (!specification.hasState(statement.state)) {
        logger.debug("State declared", { workflow, state: statement.state });
      }
      specification.addState(statement.state);
      return;
    }

    case "event": {
      const state = specification.addState(statement.state);
      if (state.hasEvent(statement.event)) {
        logger.warn("Event redeclared", {
          workflow,
          state: statement.state,
          event: statement.event,
          target: statement.target,
        });
      }
      state.putEvent(
        new EventDefinition({
          name: statement.event,
          transitionsTo: statement.target,
          meta: statement.meta,
          action: statement.action,
        })
      );
      return;
    }

    case "onEntry": {
      const state = specification.addState(statement.state);
      if (state.hasEntryHook) {
        logger.warn("Entry hook replaced", { workflow, state: statement.state });
      }
      state.setEntryHook(statement.routine);
      return;
    }

    case "onExit": {
      const state = specification.addState(statement.state);
      if (state.hasExitHook) {
        logger.warn("Exit hook replaced", { workflow, state: statement.state });
      }
      state.setExitHook(statement.routine);
      return;
    }

    case "onTransition":
      specification.addTransitionHook(statement.routine);
      return;

    case "meta": {
      const state = specification.addState(statement.state);
      if (statement.event === undefined) {
        state.mergeMeta(statement.meta);
        return;
      }
      const event = state.getEvent(statement.event);
      // checkStatements guarantees the event exists
      if (event) {
        state.putEvent(event.withMeta(statement.meta));
      }
      return;
    }

    default:
      assertNever(statement);
  }
}

/**
 * Compile statements into the specification registered under `name`.
 *
 * @param name - Specification name; re-using a name re-opens that specification
 * @param statements - Statements in declaration order
 * @param registry - Target registry (default: the process-wide registry)
 * @returns The created or re-opened specification
 * @throws SpecificationError if a statement is invalid or breaks the `redeclare` policy
 */
export function compileStatements<THost = unknown>(
  name: string,
  statements: readonly SpecStatement<THost>[],
  registry: SpecificationRegistry = SpecificationRegistry.getInstance()
): Specification {
  checkStatements(name, registry.get(name), statements, registry.config.redeclare);
  const specification = registry.declare(name);

  for (const statement of statements) {
    applyStatement(specification, statement);
  }

  specification.logger.debug("Specification compiled", {
    workflow: name,
    statements: statements.length,
    states: specification.stateNames.length,
  });
  return specification;
}
