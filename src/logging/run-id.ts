/**
 * Run ID generation and management.
 * Each batch run gets a unique run ID, carried in logs and job metadata.
 */

import { randomBytes } from "node:crypto";

export const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

export class InvalidRunIdError extends Error {
  constructor(public readonly runId: string) {
    super(`Invalid run ID: ${runId} (expected YYYYMMDD-xxxxxx)`);
    this.name = "InvalidRunIdError";
  }
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Current run ID for this execution */
let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this execution.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Resume an earlier run, e.g. when polling a job submitted by another process.
 */
export function resumeRunId(runId: string): string {
  if (!isRunId(runId)) {
    throw new InvalidRunIdError(runId);
  }
  currentRunId = runId;
  return currentRunId;
}

/**
 * Get the current run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
