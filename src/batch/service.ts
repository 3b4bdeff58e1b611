/**
 * Inference batch service port.
 *
 * The submission client talks to the provider only through this interface.
 * The production adapter is OpenAIBatchService; tests use an in-process fake.
 */

import type { InferenceRequest } from "../requests/builder.js";
import type { JobHandle, JobState, RawResponse } from "../types/batch.js";

export interface RequestCounts {
  readonly total: number;
  readonly completed: number;
  readonly failed: number;
}

/**
 * Job state at one point in time.
 */
export interface JobSnapshot {
  readonly jobId: string;
  readonly state: JobState;
  /** Status string as reported by the provider */
  readonly providerStatus: string;
  readonly requestCounts?: RequestCounts;
}

/** Key/value labels attached to a submitted job */
export type JobMetadata = Readonly<Record<string, string>>;

export interface InferenceBatchService {
  submit(requests: readonly InferenceRequest[], metadata: JobMetadata): Promise<JobHandle>;
  status(handle: JobHandle): Promise<JobSnapshot>;
  /** Raw responses of a finished job, one per record the provider answered */
  results(handle: JobHandle): Promise<RawResponse[]>;
}
