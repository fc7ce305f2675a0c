/**
 * Host adapter for @waypoint/workflow-fsm: method-style event calls, state
 * predicates and the persistence boundary.
 *
 * @module @waypoint/workflow-host
 */

export { attachWorkflow, HostWorkflow } from "./attach.js";
export type { AttachWorkflowOptions } from "./attach.js";

export { bindEvents, statePredicates } from "./proxies.js";
export type {
  Fireable,
  EventMethod,
  EventMethods,
  StatePredicates,
  BindEventsOptions,
} from "./proxies.js";

export { InMemoryPersistence, fieldPersistence } from "./persistence.js";
export type { WorkflowPersistence } from "./persistence.js";
