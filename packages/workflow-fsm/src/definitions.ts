/**
 * ## Workflow Graph - Specification, States and Events
 *
 * The compiled form of a workflow declaration. A `Specification` owns its
 * `StateDefinition`s, each of which owns its `EventDefinition`s; insertion
 * order is preserved everywhere so reflection lists nodes in declaration order.
 *
 * Reading is free for anyone. Mutation (`addState`, `putEvent`, ...) is the
 * builder's job: call `defineWorkflow` or `compileStatements` instead of the
 * mutators below, which perform no policy checks.
 *
 * Event targets are plain state names resolved when a transition fires, so
 * an event may point at a state that a later re-opening will declare.
 */
import type { Logger } from "@waypoint/workflow-core";
import { MetaDictionary, type MetaInput } from "./meta.js";
import { UnknownStateError } from "./errors.js";
import type { ActionRoutine, HookRoutine } from "./types.js";

export interface EventDefinitionInit {
  name: string;
  transitionsTo: string;
  meta?: MetaInput | undefined;
  action?: ActionRoutine | undefined;
}

/**
 * One event of one state. Immutable: re-declaring an event replaces the
 * definition object.
 */
export class EventDefinition {
  readonly name: string;
  readonly transitionsTo: string;
  readonly meta: MetaDictionary;
  readonly action: ActionRoutine | undefined;

  constructor(init: EventDefinitionInit) {
    this.name = init.name;
    this.transitionsTo = init.transitionsTo;
    this.meta = MetaDictionary.from(init.meta);
    this.action = init.action;
    Object.freeze(this);
  }

  get hasAction(): boolean {
    return this.action !== undefined;
  }

  /**
   * Copy with extra meta merged in.
   */
  withMeta(meta: MetaInput): EventDefinition {
    return new EventDefinition({
      name: this.name,
      transitionsTo: this.transitionsTo,
      meta: this.meta.merge(meta),
      action: this.action,
    });
  }
}

/**
 * A state and the events legal in it.
 */
export class StateDefinition {
  readonly name: string;
  private readonly eventMap = new Map<string, EventDefinition>();
  private entryHook: HookRoutine | undefined;
  private exitHook: HookRoutine | undefined;
  private metaDictionary: MetaDictionary = MetaDictionary.EMPTY;

  constructor(name: string) {
    this.name = name;
  }

  get events(): readonly EventDefinition[] {
    return [...this.eventMap.values()];
  }

  get eventNames(): readonly string[] {
    return [...this.eventMap.keys()];
  }

  getEvent(name: string): EventDefinition | undefined {
    return this.eventMap.get(name);
  }

  hasEvent(name: string): boolean {
    return this.eventMap.has(name);
  }

  get meta(): MetaDictionary {
    return this.metaDictionary;
  }

  get onEntry(): HookRoutine | undefined {
    return this.entryHook;
  }

  get onExit(): HookRoutine | undefined {
    return this.exitHook;
  }

  get hasEntryHook(): boolean {
    return this.entryHook !== undefined;
  }

  get hasExitHook(): boolean {
    return this.exitHook !== undefined;
  }

  /**
   * A state without events cannot be left.
   */
  get isTerminal(): boolean {
    return this.eventMap.size === 0;
  }

  /**
   * Add an event, or replace the event of the same name in its original position.
   * @internal
   */
  putEvent(event: EventDefinition): void {
    this.eventMap.set(event.name, event);
  }

  /** @internal */
  setEntryHook(routine: HookRoutine): void {
    this.entryHook = routine;
  }

  /** @internal */
  setExitHook(routine: HookRoutine): void {
    this.exitHook = routine;
  }

  /** @internal */
  mergeMeta(meta: MetaInput): void {
    this.metaDictionary = this.metaDictionary.merge(meta);
  }
}

/**
 * One `from --event--> to` edge of the graph.
 */
export interface TransitionEdge {
  readonly from: string;
  readonly event: string;
  readonly to: string;
}

/**
 * A named workflow graph.
 *
 * The initial state is the first state ever added; re-opening the
 * specification never changes it.
 */
export class Specification {
  readonly name: string;
  readonly logger: Logger;
  private readonly stateMap = new Map<string, StateDefinition>();
  private readonly transitionHooks: HookRoutine[] = [];

  constructor(name: string, logger: Logger) {
    this.name = name;
    this.logger = logger;
  }

  /**
   * Undefined until the first state is declared.
   */
  get initialState(): string | undefined {
    for (const name of this.stateMap.keys()) {
      return name;
    }
    return undefined;
  }

  get states(): readonly StateDefinition[] {
    return [...this.stateMap.values()];
  }

  get stateNames(): readonly string[] {
    return [...this.stateMap.keys()];
  }

  get onTransitionHooks(): readonly HookRoutine[] {
    return [...this.transitionHooks];
  }

  getState(name: string): StateDefinition | undefined {
    return this.stateMap.get(name);
  }

  hasState(name: string): boolean {
    return this.stateMap.has(name);
  }

  /**
   * @throws UnknownStateError if the state is not declared
   */
  requireState(name: string): StateDefinition {
    const state = this.stateMap.get(name);
    if (!state) {
      throw new UnknownStateError(this.name, name, this.stateNames);
    }
    return state;
  }

  isTerminal(state: string): boolean {
    return this.requireState(state).isTerminal;
  }

  terminalStates(): string[] {
    return this.states.filter((state) => state.isTerminal).map((state) => state.name);
  }

  /**
   * All edges in declaration order. Targets are reported as declared, resolved or not.
   */
  transitions(): TransitionEdge[] {
    const edges: TransitionEdge[] = [];
    for (const state of this.stateMap.values()) {
      for (const event of state.events) {
        edges.push({ from: state.name, event: event.name, to: event.transitionsTo });
      }
    }
    return edges;
  }

  /**
   * Compare two states by declaration order: negative if `a` was declared
   * before `b`, zero if they are the same state, positive otherwise.
   *
   * @throws UnknownStateError if either state is not declared
   */
  compareStates(a: string, b: string): number {
    const names = this.stateNames;
    this.requireState(a);
    this.requireState(b);
    return names.indexOf(a) - names.indexOf(b);
  }

  /**
   * Get the state, declaring it if needed.
   * @internal
   */
  addState(name: string): StateDefinition {
    const existing = this.stateMap.get(name);
    if (existing) return existing;
    const state = new StateDefinition(name);
    this.stateMap.set(name, state);
    return state;
  }

  /** @internal */
  addTransitionHook(routine: HookRoutine): void {
    this.transitionHooks.push(routine);
  }
}
