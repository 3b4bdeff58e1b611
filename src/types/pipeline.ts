/**
 * Pipeline stage definitions.
 * A run moves records through these stages in order; each can also be
 * invoked on its own from the command line.
 */

export enum PipelineStage {
  Prepare = "prepare",
  Submit = "submit",
  Await = "await",
  Reconcile = "reconcile",
  Aggregate = "aggregate",
}

export enum StageStatus {
  Completed = "completed",
  Failed = "failed",
}

export interface StageReport {
  readonly stage: PipelineStage;
  readonly status: StageStatus;
  readonly durationMs: number;
  /** Error message of a failed stage */
  readonly error?: string;
}
