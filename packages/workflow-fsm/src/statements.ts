/**
 * Declarative statements understood by the specification compiler.
 *
 * The builder DSL records one statement per call; tooling that produces a
 * workflow from data can build the list directly with the `declare*`
 * factories and hand it to `compileStatements`.
 *
 * @example
 * ```typescript
 * compileStatements("Blatter", [
 *   declareState("opened"),
 *   declareEvent("opened", "close", "closed"),
 *   declareState("closed"),
 * ]);
 * ```
 */
import type { MetaInput } from "./meta.js";
import type { ActionRoutine, HookRoutine } from "./types.js";

export interface DeclareStateStatement {
  readonly kind: "state";
  readonly state: string;
}

export interface DeclareEventStatement<THost = unknown> {
  readonly kind: "event";
  readonly state: string;
  readonly event: string;
  readonly target: string;
  readonly action?: ActionRoutine<THost> | undefined;
  readonly meta?: MetaInput | undefined;
}

export interface DeclareOnEntryStatement<THost = unknown> {
  readonly kind: "onEntry";
  readonly state: string;
  readonly routine: HookRoutine<THost>;
}

export interface DeclareOnExitStatement<THost = unknown> {
  readonly kind: "onExit";
  readonly state: string;
  readonly routine: HookRoutine<THost>;
}

export interface DeclareOnTransitionStatement<THost = unknown> {
  readonly kind: "onTransition";
  readonly routine: HookRoutine<THost>;
}

/**
 * Meta for a state, or for one of its events when `event` is set.
 */
export interface DeclareMetaStatement {
  readonly kind: "meta";
  readonly state: string;
  readonly event?: string | undefined;
  readonly meta: MetaInput;
}

export type SpecStatement<THost = unknown> =
  | DeclareStateStatement
  | DeclareEventStatement<THost>
  | DeclareOnEntryStatement<THost>
  | DeclareOnExitStatement<THost>
  | DeclareOnTransitionStatement<THost>
  | DeclareMetaStatement;

export function declareState(state: string): DeclareStateStatement {
  return { kind: "state", state };
}

export function declareEvent<THost = unknown>(
  state: string,
  event: string,
  target: string,
  options: { action?: ActionRoutine<THost> | undefined; meta?: MetaInput | undefined } = {}
): DeclareEventStatement<THost> {
  return { kind: "event", state, event, target, action: options.action, meta: options.meta };
}

export function declareOnEntry<THost = unknown>(
  state: string,
  routine: HookRoutine<THost>
): DeclareOnEntryStatement<THost> {
  return { kind: "onEntry", state, routine };
}

export function declareOnExit<THost = unknown>(
  state: string,
  routine: HookRoutine<THost>
): DeclareOnExitStatement<THost> {
  return { kind: "onExit", state, routine };
}

export function declareOnTransition<THost = unknown>(
  routine: HookRoutine<THost>
): DeclareOnTransitionStatement<THost> {
  return { kind: "onTransition", routine };
}

export function declareMeta(
  node: { state: string; event?: string | undefined },
  meta: MetaInput
): DeclareMetaStatement {
  return { kind: "meta", state: node.state, event: node.event, meta };
}
