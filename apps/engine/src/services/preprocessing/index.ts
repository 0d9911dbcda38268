/**
 * Preprocessing layer
 *
 * adapters    - text primitive capabilities and their defaults
 * processors  - text state, chunker and classifier
 * rules       - rule registry, default rules and the engine
 */

export * from "./adapters/index.js";
export * from "./processors/index.js";
export * from "./rules/index.js";
