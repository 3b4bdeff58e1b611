/**
 * Inference request construction.
 */

export {
  resolveTextContext,
  excerptText,
  TEXT_SOURCES,
  type TextContext,
  type TextSource,
} from "./text-context.js";

export {
  RECORD_EVALUATION_SCHEMA,
  RESPONSE_SCHEMA_NAME,
  buildRecordEvaluationSchema,
  type ResponseSchemaScoring,
} from "./response-schema.js";

export {
  RequestBuilder,
  type InferenceRequest,
  type PreparationStats,
  type BuildResult,
  type RequestBuilderOptions,
} from "./builder.js";
