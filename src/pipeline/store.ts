/**
 * Run state persistence.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * OUTPUT DIRECTORY LAYOUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   <outputDir>/
 *     batch_input.jsonl            one request line per record
 *     routing_manifest.json        recordId → routed cell ids
 *     job_metadata.json            handle of the submitted job, last state
 *     record_evaluations.json      every reconciled evaluation so far
 *     recommendation_matrix.json   cellId → ranked entries
 *     run_summary.json             counts and coverage of the last run
 *     processing_ledger.json       recordId → parsed | salvaged | dropped
 *
 * Files written by one stage are read back by later stages, possibly in a
 * later process. Every read is validated; a file that exists but does not
 * match its schema is an error, a missing one is simply absent state.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import { JobState, type JobHandle } from "../types/batch.js";
import type { ProcessingLedger, RecordEvaluation } from "../types/evaluation.js";
import type { RoutingManifest } from "../reconcile/reconciler.js";
import type { RecommendationMatrix } from "../aggregate/matrix.js";
import { RUN_ID_PATTERN } from "../logging/run-id.js";
import type { RunSummary } from "../aggregate/summary.js";

export const OUTPUT_FILES = {
  batchInput: "batch_input.jsonl",
  routingManifest: "routing_manifest.json",
  jobMetadata: "job_metadata.json",
  recordEvaluations: "record_evaluations.json",
  recommendationMatrix: "recommendation_matrix.json",
  runSummary: "run_summary.json",
  ledger: "processing_ledger.json",
} as const;

export type OutputFile = keyof typeof OUTPUT_FILES;

export class RunStateError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "RunStateError";
    this.path = path;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const RoutingManifestSchema = z.record(z.string(), z.array(z.string()));

const LedgerSchema = z.record(z.string(), z.enum(["parsed", "salvaged", "dropped"]));

export const JobMetadataFileSchema = z
  .object({
    jobId: z.string().min(1),
    inputFileId: z.string().min(1),
    submittedAt: z.string().datetime(),
    requestCount: z.number().int().nonnegative(),
    model: z.string().min(1),
    maxOutputTokens: z.number().int().positive(),
    runId: z.string().regex(RUN_ID_PATTERN, "expected a run ID like 20240115-a1b2c3").optional(),
    /** Last observed job state */
    state: z.nativeEnum(JobState).optional(),
    providerStatus: z.string().optional(),
  })
  .strict();

export type JobMetadataFile = z.infer<typeof JobMetadataFileSchema>;

const CellEvaluationFileSchema = z.object({
  cellId: z.string().min(1),
  relevanceScore: z.number().int(),
  justification: z.string(),
  suggestedAngle: z.string(),
  supportsDeepAnalysis: z.boolean(),
});

const RecordEvaluationFileSchema = z.object({
  recordId: z.string().min(1),
  overallRelevance: z.number().int(),
  depthAssessment: z.string(),
  cellEvaluations: z.array(CellEvaluationFileSchema),
  bestCells: z.array(z.string()),
  recommended: z.boolean(),
  wasSalvaged: z.boolean(),
});

const RecordEvaluationsFileSchema = z.array(RecordEvaluationFileSchema);

/**
 * Handle of a job described by its metadata file.
 */
export function toJobHandle(metadata: JobMetadataFile): JobHandle {
  return {
    jobId: metadata.jobId,
    inputFileId: metadata.inputFileId,
    submittedAt: metadata.submittedAt,
    requestCount: metadata.requestCount,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════════════════

export class RunStore {
  readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  path(file: OutputFile): string {
    return join(this.outputDir, OUTPUT_FILES[file]);
  }

  exists(file: OutputFile): boolean {
    return existsSync(this.path(file));
  }

  writeBatchInput(jsonl: string): string {
    return this.writeText("batchInput", jsonl);
  }

  writeRoutingManifest(manifest: RoutingManifest): string {
    return this.writeJson("routingManifest", manifest);
  }

  readRoutingManifest(): RoutingManifest | undefined {
    return this.readJson("routingManifest", RoutingManifestSchema);
  }

  writeJobMetadata(metadata: JobMetadataFile): string {
    return this.writeJson("jobMetadata", metadata);
  }

  readJobMetadata(): JobMetadataFile | undefined {
    return this.readJson("jobMetadata", JobMetadataFileSchema);
  }

  writeLedger(ledger: ProcessingLedger): string {
    return this.writeJson("ledger", ledger);
  }

  /** Empty when no earlier run left a ledger */
  readLedger(): ProcessingLedger {
    return this.readJson("ledger", LedgerSchema) ?? {};
  }

  writeRecordEvaluations(evaluations: readonly RecordEvaluation[]): string {
    return this.writeJson("recordEvaluations", evaluations);
  }

  readRecordEvaluations(): RecordEvaluation[] {
    return this.readJson("recordEvaluations", RecordEvaluationsFileSchema) ?? [];
  }

  writeRecommendationMatrix(matrix: RecommendationMatrix): string {
    return this.writeJson("recommendationMatrix", matrix);
  }

  writeRunSummary(summary: RunSummary): string {
    return this.writeJson("runSummary", summary);
  }

  private writeText(file: OutputFile, text: string): string {
    if (!existsSync(this.outputDir)) {
      mkdirSync(this.outputDir, { recursive: true });
    }
    const filePath = this.path(file);
    writeFileSync(filePath, text, "utf-8");
    return filePath;
  }

  private writeJson(file: OutputFile, value: unknown): string {
    return this.writeText(file, `${JSON.stringify(value, null, 2)}\n`);
  }

  private readJson<T>(file: OutputFile, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    const filePath = this.path(file);
    if (!existsSync(filePath)) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new RunStateError(
        `Failed to read ${OUTPUT_FILES[file]}: ${err instanceof Error ? err.message : String(err)}`,
        filePath
      );
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new RunStateError(`Invalid ${OUTPUT_FILES[file]}: ${errors}`, filePath);
    }
    return result.data;
  }
}
