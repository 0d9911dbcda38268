/**
 * rulepipe - Main Entry Point
 * 
 * Deterministic, rule-based text preprocessing for retrieval and model
 * pipelines.
 * 
 * This module exports:
 * - All data schemas (Zod validated)
 * - Error taxonomy
 * - Configuration defaults and loader
 * - File-mirroring logger
 * - Preprocessing layer (primitives, chunker, classifier, rules, engine)
 */

export * from "./schemas/index.js";
export * from "./services/errors.js";
export * from "./services/config.js";
export * from "./services/logger.js";
export * from "./services/preprocessing/index.js";
