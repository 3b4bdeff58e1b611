/**
 * Batch submission and provider adapter.
 */

export type { InferenceBatchService, JobSnapshot, JobMetadata, RequestCounts } from "./service.js";

export {
  BatchSubmissionClient,
  BatchJobError,
  EmptyBatchError,
  type AwaitCompletionOptions,
} from "./client.js";

export {
  toBatchLine,
  encodeBatchInput,
  parseBatchOutput,
  CHAT_COMPLETIONS_ENDPOINT,
  TRUNCATED_FINISH_REASON,
  type BatchInputLine,
  type BatchOutputIssue,
  type BatchOutputResult,
} from "./output.js";

export {
  OpenAIBatchService,
  mapBatchStatus,
  BATCH_INPUT_FILENAME,
  COMPLETION_WINDOW,
  type OpenAIBatchApi,
  type OpenAIBatchServiceOptions,
  type ProviderBatch,
} from "./openai-service.js";
