/**
 * Batch submission client.
 *
 * Submits one request set as a single asynchronous job, then polls it until
 * it reaches a terminal state:
 *
 *   PENDING ──► RUNNING ──► SUCCEEDED   → raw responses
 *                       ├─► FAILED      → BatchJobError
 *                       └─► CANCELLED   → BatchJobError
 *
 * Waiting between polls suspends on a timer; it never spins.
 */

import { setTimeout as sleep } from "node:timers/promises";

import type { InferenceRequest } from "../requests/builder.js";
import {
  JobState,
  isTerminalJobState,
  type JobHandle,
  type RawResponse,
} from "../types/batch.js";
import { createNullLogger, type Logger } from "../logging/logger.js";
import type { InferenceBatchService, JobMetadata, JobSnapshot } from "./service.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class EmptyBatchError extends Error {
  constructor() {
    super("Cannot submit a batch with no requests");
    this.name = "EmptyBatchError";
  }
}

/**
 * The job finished without results. Aborts the run.
 */
export class BatchJobError extends Error {
  public readonly jobId: string;
  public readonly state: JobState;
  public readonly providerStatus: string;

  constructor(snapshot: JobSnapshot) {
    super(
      `Batch job ${snapshot.jobId} ended in state ${snapshot.state} ` +
        `(provider status: ${snapshot.providerStatus})`
    );
    this.name = "BatchJobError";
    this.jobId = snapshot.jobId;
    this.state = snapshot.state;
    this.providerStatus = snapshot.providerStatus;
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface AwaitCompletionOptions {
  /** Delay between status checks */
  pollIntervalMs: number;
  /** Aborts the wait; the job itself keeps running at the provider */
  signal?: AbortSignal;
  /** Called after every status check with the 1-based attempt number */
  onPoll?: (snapshot: JobSnapshot, attempt: number) => void;
}

export class BatchSubmissionClient {
  private readonly service: InferenceBatchService;
  private readonly logger: Logger;

  constructor(service: InferenceBatchService, logger?: Logger) {
    this.service = service;
    this.logger = logger ?? createNullLogger();
  }

  /**
   * Upload the request set and create the job. Returns once the provider
   * has accepted it.
   */
  async submit(
    requests: readonly InferenceRequest[],
    metadata: JobMetadata = {}
  ): Promise<JobHandle> {
    if (requests.length === 0) {
      throw new EmptyBatchError();
    }

    const handle = await this.service.submit(requests, metadata);
    this.logger.info("Batch submitted", {
      jobId: handle.jobId,
      inputFileId: handle.inputFileId,
      requests: handle.requestCount,
    });
    return handle;
  }

  async snapshot(handle: JobHandle): Promise<JobSnapshot> {
    return this.service.status(handle);
  }

  async poll(handle: JobHandle): Promise<JobState> {
    const snapshot = await this.service.status(handle);
    return snapshot.state;
  }

  /**
   * Poll until the job is terminal and return its raw responses.
   *
   * @throws BatchJobError when the job fails or is cancelled
   */
  async awaitCompletion(
    handle: JobHandle,
    options: AwaitCompletionOptions
  ): Promise<RawResponse[]> {
    const { pollIntervalMs, signal, onPoll } = options;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      const snapshot = await this.service.status(handle);
      onPoll?.(snapshot, attempt);
      this.logger.debug("Batch status", {
        jobId: snapshot.jobId,
        state: snapshot.state,
        providerStatus: snapshot.providerStatus,
        completed: snapshot.requestCounts?.completed,
        total: snapshot.requestCounts?.total,
      });

      if (isTerminalJobState(snapshot.state)) {
        if (snapshot.state !== JobState.Succeeded) {
          this.logger.error("Batch job did not succeed", {
            jobId: snapshot.jobId,
            state: snapshot.state,
            providerStatus: snapshot.providerStatus,
          });
          throw new BatchJobError(snapshot);
        }

        const responses = await this.service.results(handle);
        this.logger.info("Batch completed", {
          jobId: handle.jobId,
          polls: attempt,
          responses: responses.length,
        });
        return responses;
      }

      await sleep(pollIntervalMs, undefined, { signal });
    }
  }
}
