/**
 * Session module: public API.
 */

export { SessionLock } from "./lock.js";

export {
  WorkflowState,
  toStateView,
  type WorkflowPhase,
  type WorkflowSnapshot,
  type WorkflowStateView,
} from "./state.js";

export {
  SessionHandle,
  SessionRegistry,
  type ConfirmResult,
} from "./registry.js";
