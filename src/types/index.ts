/**
 * Shared type foundations for the batch evaluation pipeline.
 */

export * from "./evaluation.js";
export * from "./batch.js";
export * from "./pipeline.js";
