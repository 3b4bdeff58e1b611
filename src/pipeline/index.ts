/**
 * Pipeline stages and run state persistence.
 */

export {
  BatchPipeline,
  mergeEvaluations,
  type BatchPipelineOptions,
  type PreparedBatch,
  type ReconcileStageResult,
  type AggregateResult,
  type PipelineRunResult,
  type AwaitOptions,
} from "./pipeline.js";

export {
  RunStore,
  RunStateError,
  OUTPUT_FILES,
  JobMetadataFileSchema,
  toJobHandle,
  type JobMetadataFile,
  type OutputFile,
} from "./store.js";
