/**
 * Declarative workflow engine: named specifications of states, events and
 * hooks, compiled into a shared graph and executed against bound instances.
 *
 * @example
 * ```typescript
 * import { defineWorkflow, createWorkflow, UndefinedTransitionError } from "@waypoint/workflow-fsm";
 *
 * const review = defineWorkflow("Review", (w) => {
 *   w.state("new", (s) => s.event("submit", "awaiting_review"));
 *   w.state("awaiting_review", (s) => s.event("review", "being_reviewed"));
 *   w.state("being_reviewed", (s) => {
 *     s.event("accept", "accepted");
 *     s.event("reject", "rejected");
 *   });
 *   w.state("accepted");
 *   w.state("rejected");
 * });
 *
 * const workflow = createWorkflow(review);
 * workflow.fire("submit");
 * workflow.currentState; // "awaiting_review"
 * ```
 *
 * @module @waypoint/workflow-fsm
 */

// Types
export type {
  EventArgs,
  WorkflowView,
  TransitionInfo,
  ActionContext,
  ActionRoutine,
  HookRoutine,
  TransitionedOutcome,
  HaltedOutcome,
  TransitionOutcome,
} from "./types.js";
export { isTransitioned, isHalted } from "./types.js";

// Errors
export {
  WorkflowErrorCodes,
  UndefinedTransitionError,
  UnresolvedTargetError,
  WorkflowHaltedError,
  UnknownStateError,
  SpecificationNotFoundError,
  EmptySpecificationError,
  SpecificationError,
} from "./errors.js";
export type { WorkflowErrorCode, SpecificationErrorCode } from "./errors.js";

// Graph model
export { MetaDictionary } from "./meta.js";
export type { MetaInput } from "./meta.js";
export { EventDefinition, StateDefinition, Specification } from "./definitions.js";
export type { EventDefinitionInit, TransitionEdge } from "./definitions.js";

// Registry and compiler
export { SpecificationRegistry } from "./registry.js";
export type { SpecificationRegistryOptions } from "./registry.js";
export {
  declareState,
  declareEvent,
  declareOnEntry,
  declareOnExit,
  declareOnTransition,
  declareMeta,
} from "./statements.js";
export type {
  SpecStatement,
  DeclareStateStatement,
  DeclareEventStatement,
  DeclareOnEntryStatement,
  DeclareOnExitStatement,
  DeclareOnTransitionStatement,
  DeclareMetaStatement,
} from "./statements.js";
export { compileStatements } from "./compile.js";

// Builder DSL
export { defineWorkflow, SpecBuilder, StateBuilder } from "./builder.js";
export type { EventOptions, StateBody, WorkflowBody, DefineWorkflowOptions } from "./builder.js";

// Instances and execution
export { WorkflowInstance, createWorkflow, bindWorkflow } from "./instance.js";
export type { WorkflowOptions, WorkflowSnapshot } from "./instance.js";
export { resolveTransition } from "./executor.js";
export type { ResolvedTransition } from "./executor.js";

// Reflection
export {
  describeSpecification,
  describeState,
  describeEvent,
  findUnresolvedTargets,
} from "./reflection.js";
export type {
  SpecificationDescriptor,
  StateDescriptor,
  EventDescriptor,
  UnresolvedTarget,
} from "./reflection.js";
export { toDot } from "./graph.js";
export type { DotOptions } from "./graph.js";

// Operations
export { fire, fireOrThrow, canFire, legalEvents, isTerminal, isValidState } from "./operations.js";
