export * from "./errors.js";
export * from "./types.js";
export * from "./warehouse.js";
export * from "./connections.js";
export * from "./docs-search.js";
export * from "./knowledge.js";
export * from "./generator.js";
export * from "./project.js";
export * from "./eligibility.js";
export * from "./suggestions.js";
export * from "./propensity.js";
export * from "./outputs.js";
