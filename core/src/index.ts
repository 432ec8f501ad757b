// Errors
export * from "./errors.js";

// Environment names and schema
export * from "./env.js";

// Unit and relation ids
export * from "./ids.js";

// Relation, resource and config declarations
export * from "./metadata.js";

// Hook tool wire protocol
export * from "./wire.js";
