/**
 * Dispatch module: public API.
 */

export { ToolDispatcher, type ToolDispatcherOptions } from "./dispatcher.js";

export {
  createActionHandlers,
  defineHandler,
  DEFAULT_MAX_ROWS,
  type HandlerDeps,
} from "./handlers.js";

export { loggingMiddleware, usageMiddleware } from "./middleware.js";

export { nextStepsFor, describeProgress, type WorkflowProgress } from "./guidance.js";

export type {
  ActionHandler,
  BlockedOutcome,
  CollaboratorErrorOutcome,
  CompletedOutcome,
  DispatchCall,
  DispatchMiddleware,
  DispatchOptions,
  DispatchOutcome,
  HandlerContext,
  HandlerTable,
} from "./types.js";
