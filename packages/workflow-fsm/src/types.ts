/**
 * ## Workflow Types - Routines, Contexts and Outcomes
 *
 * ### Routines
 *
 * | Routine | Declared on | Receives | Fired |
 * |---------|-------------|----------|-------|
 * | action | event | `ActionContext` (with `halt`) | first |
 * | on_transition | specification | `TransitionInfo` | after the action, in registration order |
 * | on_exit | source state | `TransitionInfo` | after on_transition hooks |
 * | on_entry | target state | `TransitionInfo` | after the state changed |
 *
 * `args` is the exact array passed to `fire`, shared by every routine of one
 * firing: mutating an argument object is visible to routines fired later.
 *
 * ### Outcomes
 *
 * `fire` returns a `TransitionOutcome`; `fireOrThrow` returns a
 * `TransitionedOutcome` or throws `WorkflowHaltedError`.
 */
import type { Specification } from "./definitions.js";

/**
 * Arguments passed to `fire`, by identity.
 */
export type EventArgs = readonly unknown[];

/**
 * Read-only view of a workflow instance handed to routines.
 */
export interface WorkflowView<THost = unknown> {
  readonly specification: Specification;
  readonly currentState: string;
  readonly halted: boolean;
  readonly haltedBecause: string | undefined;
  readonly host: THost;
  isState(name: string): boolean;
}

/**
 * Data every routine receives about the transition in progress.
 */
export interface TransitionInfo<THost = unknown> {
  readonly host: THost;
  readonly workflow: WorkflowView<THost>;
  readonly event: string;
  /** Source state */
  readonly from: string;
  /** Target state */
  readonly to: string;
  readonly args: EventArgs;
}

/**
 * Context of an event action. `halt` aborts the transition and exits the
 * action immediately; it never returns.
 *
 * @example
 * ```typescript
 * s.event("accept", "accepted", {
 *   action: ({ host, halt }) => {
 *     if (!host.reviewer) halt("no reviewer assigned");
 *     host.acceptedAt = new Date();
 *   },
 * });
 * ```
 */
export interface ActionContext<THost = unknown> extends TransitionInfo<THost> {
  halt(reason?: string): never;
}

// Specifications erase the host type. Routine parameters are bivariant so that
// a routine declared for a concrete host type can be stored in one.

export type ActionRoutine<THost = unknown> = {
  bivarianceHack(ctx: ActionContext<THost>): void;
}["bivarianceHack"];

export type HookRoutine<THost = unknown> = {
  bivarianceHack(transition: TransitionInfo<THost>): void;
}["bivarianceHack"];

/**
 * A transition that ran to completion.
 */
export interface TransitionedOutcome {
  readonly ok: true;
  readonly status: "transitioned";
  readonly event: string;
  readonly from: string;
  readonly to: string;
}

/**
 * A transition aborted by `halt` inside the action. The state is unchanged.
 */
export interface HaltedOutcome {
  readonly ok: false;
  readonly status: "halted";
  readonly event: string;
  readonly state: string;
  readonly reason: string | undefined;
}

export type TransitionOutcome = TransitionedOutcome | HaltedOutcome;

export function isTransitioned(outcome: TransitionOutcome): outcome is TransitionedOutcome {
  return outcome.status === "transitioned";
}

export function isHalted(outcome: TransitionOutcome): outcome is HaltedOutcome {
  return outcome.status === "halted";
}
