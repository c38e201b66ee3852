export * from "./schema.js";
export * from "./validate.js";
export * from "./invariants.js";
export * from "./errors.js";
