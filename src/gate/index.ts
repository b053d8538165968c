/**
 * Gate module: public API.
 */

export { evaluateActionGate } from "./gate.js";

export { GateError, type GateErrorCode } from "./errors.js";

export {
  PLACEHOLDER_PATTERNS,
  isPlaceholderName,
  findPlaceholderNames,
  tokenizeName,
  type PlaceholderPatternSet,
} from "./placeholder.js";

export {
  ACTION_KINDS,
  KNOWLEDGE_TOPICS,
  RESOURCE_KINDS,
  REQUIREMENT_TABLE,
  getActionDefinition,
  getSupportedActions,
  isActionKind,
  isKnowledgeTopic,
  isResourceKind,
  requiredTopicsFor,
  validateRequirementTable,
  type ActionDefinition,
  type ActionKind,
  type KnowledgeTopic,
  type ResourceKind,
} from "./requirements.js";

export {
  KnowledgeTopicSchema,
  ResourceKindSchema,
  ResourceNameSchema,
  ResourceNamesSchema,
  ResourceRefsSchema,
  SessionIdSchema,
} from "./schemas.js";

export type {
  ActionRequest,
  BlockReasonKind,
  GateBlock,
  GateSnapshot,
  ResourceRefs,
  ValidationResult,
} from "./types.js";
