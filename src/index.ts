/**
 * workflow-gate: public API.
 */

export * from "./gate/index.js";
export * from "./session/index.js";
export * from "./collaborators/index.js";
export * from "./audit/index.js";
export * from "./dispatch/index.js";
export * from "./server/index.js";
export {
  resolveConfig,
  ensureDataDirs,
  describeConfig,
  LOG_LEVELS,
  type GateConfig,
  type LogLevel,
} from "./config/config.js";
export { createLogger, silentLogger, componentLogger } from "./logging/logger.js";
