/**
 * OpenAI Batch API adapter.
 *
 * Uploads the JSONL request file, creates a 24h batch against the chat
 * completions endpoint, and downloads the output and error files once the
 * batch has completed.
 */

import OpenAI, { toFile } from "openai";

import type { InferenceRequest } from "../requests/builder.js";
import { JobState, type JobHandle, type RawResponse } from "../types/batch.js";
import { createNullLogger, type Logger } from "../logging/logger.js";
import { CHAT_COMPLETIONS_ENDPOINT, encodeBatchInput, parseBatchOutput } from "./output.js";
import type { InferenceBatchService, JobMetadata, JobSnapshot } from "./service.js";

export const BATCH_INPUT_FILENAME = "batch_input.jsonl";
export const COMPLETION_WINDOW = "24h";

// ---------------------------------------------------------------------------
// Client surface
// ---------------------------------------------------------------------------

type UploadFile = Awaited<ReturnType<typeof toFile>>;

/**
 * Batch as returned by the provider; only the fields read here.
 */
export interface ProviderBatch {
  id: string;
  status: string;
  input_file_id: string;
  output_file_id?: string | null;
  error_file_id?: string | null;
  request_counts?: { total: number; completed: number; failed: number } | null;
}

/**
 * The part of the OpenAI client this adapter uses. `new OpenAI()` satisfies it.
 */
export interface OpenAIBatchApi {
  files: {
    create(body: { file: UploadFile; purpose: "batch" }): Promise<{ id: string }>;
    content(fileId: string): Promise<{ text(): Promise<string> }>;
  };
  batches: {
    create(body: {
      input_file_id: string;
      endpoint: typeof CHAT_COMPLETIONS_ENDPOINT;
      completion_window: typeof COMPLETION_WINDOW;
      metadata?: Record<string, string>;
    }): Promise<ProviderBatch>;
    retrieve(batchId: string): Promise<ProviderBatch>;
  };
}

// ---------------------------------------------------------------------------
// Status mapping
// ---------------------------------------------------------------------------

const STATUS_MAP: Readonly<Record<string, JobState>> = {
  validating: JobState.Pending,
  in_progress: JobState.Running,
  finalizing: JobState.Running,
  cancelling: JobState.Running,
  completed: JobState.Succeeded,
  failed: JobState.Failed,
  expired: JobState.Failed,
  cancelled: JobState.Cancelled,
};

/**
 * Map a provider batch status onto a job state. Unknown statuses are
 * treated as still running.
 */
export function mapBatchStatus(status: string): JobState {
  return STATUS_MAP[status] ?? JobState.Running;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface OpenAIBatchServiceOptions {
  client: OpenAIBatchApi;
  logger?: Logger;
  now?: () => Date;
}

export class OpenAIBatchService implements InferenceBatchService {
  private readonly client: OpenAIBatchApi;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: OpenAIBatchServiceOptions) {
    this.client = options.client;
    this.logger = options.logger ?? createNullLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Service backed by the real OpenAI client.
   */
  static create(apiKey: string, logger?: Logger): OpenAIBatchService {
    return new OpenAIBatchService({ client: new OpenAI({ apiKey }), logger });
  }

  async submit(requests: readonly InferenceRequest[], metadata: JobMetadata): Promise<JobHandle> {
    const jsonl = encodeBatchInput(requests);
    const file = await this.client.files.create({
      file: await toFile(Buffer.from(jsonl, "utf-8"), BATCH_INPUT_FILENAME),
      purpose: "batch",
    });
    this.logger.debug("Uploaded batch input", { fileId: file.id, bytes: Buffer.byteLength(jsonl) });

    const batch = await this.client.batches.create({
      input_file_id: file.id,
      endpoint: CHAT_COMPLETIONS_ENDPOINT,
      completion_window: COMPLETION_WINDOW,
      metadata: { ...metadata },
    });

    return {
      jobId: batch.id,
      inputFileId: file.id,
      submittedAt: this.now().toISOString(),
      requestCount: requests.length,
    };
  }

  async status(handle: JobHandle): Promise<JobSnapshot> {
    return toSnapshot(await this.client.batches.retrieve(handle.jobId));
  }

  async results(handle: JobHandle): Promise<RawResponse[]> {
    const batch = await this.client.batches.retrieve(handle.jobId);
    const responses: RawResponse[] = [];

    for (const fileId of [batch.output_file_id, batch.error_file_id]) {
      if (!fileId) continue;

      const content = await this.client.files.content(fileId);
      const { responses: parsed, issues } = parseBatchOutput(await content.text());
      for (const issue of issues) {
        this.logger.warn("Unreadable batch output line", { fileId, ...issue });
      }
      responses.push(...parsed);
    }

    return responses;
  }
}

function toSnapshot(batch: ProviderBatch): JobSnapshot {
  const counts = batch.request_counts;
  return {
    jobId: batch.id,
    state: mapBatchStatus(batch.status),
    providerStatus: batch.status,
    ...(counts
      ? { requestCounts: { total: counts.total, completed: counts.completed, failed: counts.failed } }
      : {}),
  };
}
