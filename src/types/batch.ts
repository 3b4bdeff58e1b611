/**
 * Batch job and raw response types shared by the batch client and reconciler.
 */

export enum JobState {
  Pending = "PENDING",
  Running = "RUNNING",
  Succeeded = "SUCCEEDED",
  Failed = "FAILED",
  Cancelled = "CANCELLED",
}

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set([
  JobState.Succeeded,
  JobState.Failed,
  JobState.Cancelled,
]);

export function isTerminalJobState(state: JobState): boolean {
  return TERMINAL_JOB_STATES.has(state);
}

/**
 * Opaque reference to a submitted batch job.
 */
export interface JobHandle {
  readonly jobId: string;
  readonly inputFileId: string;
  /** ISO 8601 */
  readonly submittedAt: string;
  readonly requestCount: number;
}

/**
 * Response body returned for one record.
 * `truncated` is set when generation stopped at the output token cap.
 */
export interface RawResponseBody {
  readonly kind: "body";
  readonly recordId: string;
  readonly body: string;
  readonly finishReason: string | null;
  readonly truncated: boolean;
}

/**
 * Per-record failure reported by the service. Never aborts the batch.
 */
export interface RawResponseError {
  readonly kind: "error";
  readonly recordId: string;
  readonly reason: string;
}

export type RawResponse = RawResponseBody | RawResponseError;
