/**
 * Default pipeline configuration.
 *
 * Matches the reference run: a 100-cell matrix, a 4096-token output cap,
 * a 600-character excerpt window and minute-long polling.
 */

import type { PipelineConfig } from "./schema.js";

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  matrix: {
    expectedCellCount: 100,
    topicTagPrefix: "subdomain_",
  },

  generation: {
    model: "gpt-4o-mini",
    temperature: 0.2,
    maxOutputTokens: 4096,
  },

  textContext: {
    excerptCharBudget: 600,
    minSentenceBoundary: 200,
    limitedMetadataSentinel:
      "(no abstract available; evaluation based on title and subjects only)",
  },

  routing: {
    unroutablePolicy: "skip",
  },

  scoring: {
    scaleMin: 1,
    scaleMax: 5,
    recommendThreshold: 4,
    coverageThreshold: 3,
    highRelevanceThreshold: 4,
  },

  polling: {
    intervalSeconds: 60,
  },
};
