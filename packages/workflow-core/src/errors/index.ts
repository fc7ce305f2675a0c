export { WorkflowError, isWorkflowError } from "./WorkflowError.js";
export type { WorkflowErrorJSON } from "./WorkflowError.js";
