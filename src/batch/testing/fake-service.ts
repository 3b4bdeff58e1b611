/**
 * In-process InferenceBatchService for tests. Not part of the build output.
 *
 * Reports a scripted sequence of job states (the last one repeats) and
 * answers results() through a responder over the submitted requests.
 */

import type { InferenceRequest } from "../../requests/builder.js";
import { JobState, type JobHandle, type RawResponse } from "../../types/batch.js";
import type { InferenceBatchService, JobMetadata, JobSnapshot } from "../service.js";

export type Responder = (requests: readonly InferenceRequest[]) => RawResponse[];

export interface FakeSubmission {
  handle: JobHandle;
  requests: readonly InferenceRequest[];
  metadata: JobMetadata;
}

export class FakeBatchService implements InferenceBatchService {
  readonly submissions: FakeSubmission[] = [];
  statusCalls = 0;

  private readonly states: readonly JobState[];
  private readonly respond: Responder;

  constructor(states: readonly JobState[] = [JobState.Succeeded], respond: Responder = () => []) {
    this.states = states.length > 0 ? states : [JobState.Succeeded];
    this.respond = respond;
  }

  async submit(requests: readonly InferenceRequest[], metadata: JobMetadata): Promise<JobHandle> {
    const n = this.submissions.length + 1;
    const handle: JobHandle = {
      jobId: `job-${n}`,
      inputFileId: `file-${n}`,
      submittedAt: "2026-01-01T00:00:00.000Z",
      requestCount: requests.length,
    };
    this.submissions.push({ handle, requests, metadata });
    return handle;
  }

  async status(handle: JobHandle): Promise<JobSnapshot> {
    const index = Math.min(this.statusCalls, this.states.length - 1);
    const state = this.states[index] ?? JobState.Succeeded;
    this.statusCalls++;
    return { jobId: handle.jobId, state, providerStatus: state.toLowerCase() };
  }

  async results(handle: JobHandle): Promise<RawResponse[]> {
    const submission = this.submissions.find((s) => s.handle.jobId === handle.jobId);
    return this.respond(submission?.requests ?? []);
  }
}
