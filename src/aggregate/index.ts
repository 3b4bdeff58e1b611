/**
 * Aggregation of record evaluations into the recommendation matrix and
 * run summary.
 */

export {
  RecommendationMatrix,
  buildRecommendationMatrix,
  type RecommendationEntry,
  type RecommendationMatrixJSON,
} from "./matrix.js";

export {
  summarizeRun,
  formatRunSummary,
  type RunSummary,
  type CommodityCoverage,
  type SummarizeRunInput,
} from "./summary.js";
