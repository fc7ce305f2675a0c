/**
 * ## Reflection - Read-Only Views of a Specification
 *
 * Snapshots of the workflow graph for tooling: admin panels, documentation,
 * diagrams. Reflection never fires a transition and never checks event
 * targets; a target that is not declared yet is reported as-is.
 *
 * @example
 * ```typescript
 * const descriptor = describeSpecification(articleWorkflow);
 *
 * descriptor.initialState;                          // "new"
 * descriptor.states.map((s) => s.name);             // ["new", "awaiting_review", ...]
 * descriptor.states[3].events[0].transitionsTo;     // "accepted"
 * descriptor.states[3].meta;                        // { color: "yellow" }
 * ```
 */
import type { UnknownRecord } from "@waypoint/workflow-core";
import type { EventDefinition, Specification, StateDefinition } from "./definitions.js";

export interface EventDescriptor {
  readonly name: string;
  readonly transitionsTo: string;
  readonly hasAction: boolean;
  readonly meta: Readonly<UnknownRecord>;
}

export interface StateDescriptor {
  readonly name: string;
  readonly initial: boolean;
  readonly terminal: boolean;
  readonly hasEntryHook: boolean;
  readonly hasExitHook: boolean;
  readonly events: readonly EventDescriptor[];
  readonly meta: Readonly<UnknownRecord>;
}

export interface SpecificationDescriptor {
  readonly name: string;
  readonly initialState: string | undefined;
  readonly transitionHookCount: number;
  readonly states: readonly StateDescriptor[];
}

/**
 * An event whose target state is not declared.
 */
export interface UnresolvedTarget {
  readonly state: string;
  readonly event: string;
  readonly target: string;
}

export function describeEvent(event: EventDefinition): EventDescriptor {
  return Object.freeze({
    name: event.name,
    transitionsTo: event.transitionsTo,
    hasAction: event.hasAction,
    meta: event.meta.attrs,
  });
}

export function describeState(
  state: StateDefinition,
  initialState: string | undefined
): StateDescriptor {
  return Object.freeze({
    name: state.name,
    initial: state.name === initialState,
    terminal: state.isTerminal,
    hasEntryHook: state.hasEntryHook,
    hasExitHook: state.hasExitHook,
    events: Object.freeze(state.events.map(describeEvent)),
    meta: state.meta.attrs,
  });
}

export function describeSpecification(
  specification: Specification
): SpecificationDescriptor {
  const initialState = specification.initialState;
  return Object.freeze({
    name: specification.name,
    initialState,
    transitionHookCount: specification.onTransitionHooks.length,
    states: Object.freeze(specification.states.map((state) => describeState(state, initialState))),
  });
}

/**
 * List events pointing at states that are not declared. An entry here is an
 * authoring mistake unless a later re-opening declares the state.
 */
export function findUnresolvedTargets(specification: Specification): UnresolvedTarget[] {
  return specification
    .transitions()
    .filter((edge) => !specification.hasState(edge.to))
    .map((edge) => ({ state: edge.from, event: edge.event, target: edge.to }));
}
