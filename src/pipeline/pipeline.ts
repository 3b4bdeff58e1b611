/**
 * Batch evaluation pipeline.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   prepare    catalog ──► routed records ──► requests
 *              writes batch_input.jsonl, routing_manifest.json
 *
 *   submit     requests ──► job handle
 *              writes job_metadata.json
 *
 *   await      job handle ──► raw responses   (BatchJobError ends the run)
 *              updates job_metadata.json with the terminal state
 *
 *   reconcile  raw responses + ledger ──► record evaluations
 *              writes record_evaluations.json, processing_ledger.json
 *
 *   aggregate  record evaluations ──► recommendation matrix + summary
 *              writes recommendation_matrix.json, run_summary.json
 *
 * Each stage can run on its own; later stages pick up what earlier ones
 * left in the output directory.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { readFileSync } from "node:fs";

import type { PipelineConfig } from "../config/pipeline/schema.js";
import type { MatrixRegistry } from "../matrix/registry.js";
import type { SourceRecord } from "../catalog/schema.js";
import { CellRouter, type RoutingResult, type UnroutableRecordError } from "../routing/router.js";
import type { PromptTemplateLoader } from "../prompts/loader.js";
import {
  RequestBuilder,
  type InferenceRequest,
  type PreparationStats,
} from "../requests/builder.js";
import {
  BatchJobError,
  BatchSubmissionClient,
  type AwaitCompletionOptions,
} from "../batch/client.js";
import { encodeBatchInput, parseBatchOutput } from "../batch/output.js";
import type { InferenceBatchService, JobSnapshot } from "../batch/service.js";
import {
  Reconciler,
  type ReconcileRunResult,
  type RoutingManifest,
} from "../reconcile/reconciler.js";
import { buildRecommendationMatrix, type RecommendationMatrix } from "../aggregate/matrix.js";
import { summarizeRun, type RunSummary } from "../aggregate/summary.js";
import { createNullLogger, type Logger } from "../logging/logger.js";
import type { JobHandle, RawResponse } from "../types/batch.js";
import type { RecordEvaluation } from "../types/evaluation.js";
import { PipelineStage, StageStatus, type StageReport } from "../types/pipeline.js";
import { RunStore, type JobMetadataFile } from "./store.js";

export interface PreparedBatch {
  readonly requests: InferenceRequest[];
  readonly manifest: RoutingManifest;
  readonly routing: RoutingResult["stats"];
  readonly preparation: PreparationStats;
  readonly skipped: UnroutableRecordError[];
}

export interface ReconcileStageResult extends ReconcileRunResult {
  /** Evaluations from earlier runs merged with this run's, by record id */
  readonly allEvaluations: RecordEvaluation[];
}

export interface AggregateResult {
  readonly matrix: RecommendationMatrix;
  readonly summary: RunSummary;
}

export interface PipelineRunResult {
  readonly prepared: PreparedBatch;
  readonly handle: JobHandle;
  readonly reconciled: ReconcileStageResult;
  readonly aggregate: AggregateResult;
  readonly stages: StageReport[];
}

export type AwaitOptions = Partial<AwaitCompletionOptions>;

export interface BatchPipelineOptions {
  config: Readonly<PipelineConfig>;
  registry: MatrixRegistry;
  service: InferenceBatchService;
  store: RunStore;
  logger?: Logger;
  templates?: PromptTemplateLoader;
  runId?: string;
}

/**
 * Replace earlier evaluations of the same record and append new ones,
 * keeping first-seen order.
 */
export function mergeEvaluations(
  previous: readonly RecordEvaluation[],
  current: readonly RecordEvaluation[]
): RecordEvaluation[] {
  const byId = new Map<string, RecordEvaluation>();
  for (const evaluation of [...previous, ...current]) {
    byId.set(evaluation.recordId, evaluation);
  }
  return [...byId.values()];
}

export class BatchPipeline {
  private readonly config: Readonly<PipelineConfig>;
  private readonly registry: MatrixRegistry;
  private readonly store: RunStore;
  private readonly logger: Logger;
  private readonly runId: string | undefined;
  private readonly router: CellRouter;
  private readonly builder: RequestBuilder;
  private readonly client: BatchSubmissionClient;

  constructor(options: BatchPipelineOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.store = options.store;
    this.logger = options.logger ?? createNullLogger();
    this.runId = options.runId;
    this.router = new CellRouter(options.registry, {
      topicTagPrefix: options.config.matrix.topicTagPrefix,
      logger: this.logger.child({ component: "router" }),
    });
    this.builder = new RequestBuilder(options.config, {
      templates: options.templates,
      logger: this.logger.child({ component: "requests" }),
    });
    this.client = new BatchSubmissionClient(
      options.service,
      this.logger.child({ component: "batch" })
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Stages
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Route the catalog and build one request per routable record.
   */
  prepare(records: readonly SourceRecord[]): PreparedBatch {
    const routing = this.router.routeAll(records, this.config.routing.unroutablePolicy);
    const { requests, stats } = this.builder.buildAll(routing.routed);

    const manifest: RoutingManifest = Object.fromEntries(
      requests.map((request) => [request.recordId, request.cellIds])
    );

    const inputPath = this.store.writeBatchInput(encodeBatchInput(requests));
    const manifestPath = this.store.writeRoutingManifest(manifest);
    this.logger.info("Batch input written", {
      path: inputPath,
      manifest: manifestPath,
      requests: requests.length,
      skipped: routing.skipped.length,
    });

    return {
      requests,
      manifest,
      routing: routing.stats,
      preparation: stats,
      skipped: routing.skipped,
    };
  }

  async submit(prepared: PreparedBatch): Promise<JobHandle> {
    const metadata: Record<string, string> = {
      request_count: String(prepared.requests.length),
    };
    if (this.runId !== undefined) {
      metadata.run_id = this.runId;
    }

    const handle = await this.client.submit(prepared.requests, metadata);
    this.store.writeJobMetadata({
      ...handle,
      model: this.config.generation.model,
      maxOutputTokens: this.config.generation.maxOutputTokens,
      ...(this.runId !== undefined ? { runId: this.runId } : {}),
    });
    return handle;
  }

  /**
   * Wait for the job to finish and return its raw responses.
   *
   * @throws BatchJobError when the job fails or is cancelled
   */
  async awaitResults(handle: JobHandle, options: AwaitOptions = {}): Promise<RawResponse[]> {
    const observed: { last?: JobSnapshot } = {};
    try {
      const responses = await this.client.awaitCompletion(handle, {
        pollIntervalMs: options.pollIntervalMs ?? this.config.polling.intervalSeconds * 1000,
        signal: options.signal,
        onPoll: (snapshot, attempt) => {
          observed.last = snapshot;
          options.onPoll?.(snapshot, attempt);
        },
      });
      if (observed.last !== undefined) {
        this.recordJobState(handle, observed.last);
      }
      return responses;
    } catch (err) {
      if (err instanceof BatchJobError && observed.last !== undefined) {
        this.recordJobState(handle, observed.last);
      }
      throw err;
    }
  }

  /**
   * Reconcile raw responses against the stored routing manifest and ledger.
   */
  reconcile(responses: readonly RawResponse[]): ReconcileStageResult {
    const routing = this.store.readRoutingManifest();
    if (routing === undefined) {
      this.logger.warn("No routing manifest found; cell evaluations are not filtered", {
        path: this.store.path("routingManifest"),
      });
    }

    const reconciler = new Reconciler({
      scoring: this.config.scoring,
      routing,
      logger: this.logger.child({ component: "reconcile" }),
    });
    const result = reconciler.reconcileAll(responses, this.store.readLedger());
    const allEvaluations = mergeEvaluations(this.store.readRecordEvaluations(), result.evaluations);

    this.store.writeRecordEvaluations(allEvaluations);
    this.store.writeLedger(result.ledger);
    return { ...result, allEvaluations };
  }

  /**
   * Read raw responses from a downloaded batch output file.
   */
  readLocalResults(path: string): RawResponse[] {
    const { responses, issues } = parseBatchOutput(readFileSync(path, "utf-8"));
    for (const issue of issues) {
      this.logger.warn("Unreadable batch output line", { path, ...issue });
    }
    return responses;
  }

  aggregate(reconciled: ReconcileStageResult): AggregateResult {
    const matrix = buildRecommendationMatrix(this.registry, reconciled.allEvaluations);
    const summary = summarizeRun({
      counts: reconciled.counts,
      evaluations: reconciled.allEvaluations,
      matrix,
      registry: this.registry,
      scoring: this.config.scoring,
    });

    this.store.writeRecommendationMatrix(matrix);
    this.store.writeRunSummary(summary);
    this.logger.info("Recommendation matrix written", {
      path: this.store.path("recommendationMatrix"),
      covered: summary.coveredCells,
      gaps: summary.gaps.length,
    });
    return { matrix, summary };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Full run
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Run every stage in order. A failing stage ends the run; nothing after
   * it is written.
   */
  async run(records: readonly SourceRecord[], options: AwaitOptions = {}): Promise<PipelineRunResult> {
    const stages: StageReport[] = [];

    const prepared = await this.stage(stages, PipelineStage.Prepare, async () => this.prepare(records));
    const handle = await this.stage(stages, PipelineStage.Submit, () => this.submit(prepared));
    const responses = await this.stage(stages, PipelineStage.Await, () =>
      this.awaitResults(handle, options)
    );
    const reconciled = await this.stage(stages, PipelineStage.Reconcile, async () =>
      this.reconcile(responses)
    );
    const aggregate = await this.stage(stages, PipelineStage.Aggregate, async () =>
      this.aggregate(reconciled)
    );

    return { prepared, handle, reconciled, aggregate, stages };
  }

  private async stage<T>(
    reports: StageReport[],
    stage: PipelineStage,
    body: () => Promise<T>
  ): Promise<T> {
    const started = Date.now();
    this.logger.debug("Stage started", { stage });
    try {
      const value = await body();
      const durationMs = Date.now() - started;
      reports.push({ stage, status: StageStatus.Completed, durationMs });
      this.logger.info("Stage completed", { stage, durationMs });
      return value;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      reports.push({ stage, status: StageStatus.Failed, durationMs: Date.now() - started, error: message });
      this.logger.error("Stage failed", { stage, error: message });
      throw err;
    }
  }

  private recordJobState(handle: JobHandle, snapshot: JobSnapshot): void {
    const existing = this.store.readJobMetadata();
    const base: JobMetadataFile =
      existing !== undefined && existing.jobId === handle.jobId
        ? existing
        : {
            ...handle,
            model: this.config.generation.model,
            maxOutputTokens: this.config.generation.maxOutputTokens,
          };
    this.store.writeJobMetadata({
      ...base,
      state: snapshot.state,
      providerStatus: snapshot.providerStatus,
    });
  }
}
