#!/usr/bin/env node
/**
 * Batch evaluation command line.
 *
 * Commands:
 *   prepare             Route the catalog and write the batch request file
 *   submit [--monitor]  Prepare, submit the batch job and optionally wait
 *                       for it, then reconcile and aggregate the results
 *   status              Show the state of the last submitted job
 *   parse [--local f]   Reconcile and aggregate results, either from the
 *                       last job or from a downloaded output file
 *   run                 prepare + submit --monitor
 *
 * Usage:
 *   npx tsx src/cli/batch.ts <command> [options]
 *   npm run batch -- <command> [options]
 *
 * Exit codes:
 *   0 - Command completed
 *   1 - Configuration, input or batch job error
 */

import { join } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  requireApiKey,
  applyEnvOverrides,
  DEFAULT_PIPELINE_CONFIG,
  ConfigError,
  PipelineConfigError,
  type PipelineConfig,
} from "../config/index.js";
import {
  initRunId,
  resumeRunId,
  createLogger,
  isLogLevel,
  InvalidRunIdError,
  type Logger,
} from "../logging/index.js";
import { loadMatrixFile, MalformedMatrixError, type MatrixRegistry } from "../matrix/index.js";
import { loadCatalogFile, CatalogValidationError } from "../catalog/index.js";
import { UnroutableRecordError } from "../routing/index.js";
import {
  TemplateLoadError,
  TemplateParseError,
  ConditionalParseError,
  PromptRenderError,
  UnusedVariableError,
} from "../prompts/index.js";
import {
  OpenAIBatchService,
  BatchJobError,
  EmptyBatchError,
  type InferenceBatchService,
  type JobSnapshot,
} from "../batch/index.js";
import { formatRunSummary, type RunSummary } from "../aggregate/index.js";
import {
  BatchPipeline,
  RunStore,
  RunStateError,
  toJobHandle,
  type PreparedBatch,
} from "../pipeline/index.js";
import type { JobHandle } from "../types/index.js";

const COMMANDS = ["prepare", "submit", "status", "parse", "run"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: batch <command> [options]

Commands:
  prepare             Route the catalog and write the batch request file
  submit              Prepare and submit the batch job
  status              Show the state of the last submitted job
  parse               Reconcile results and build the recommendation matrix
  run                 Prepare, submit, wait and parse in one go

Options:
  --monitor           (submit) Wait for the job and parse its results
  --local <path>      (parse) Read a downloaded batch output file
  -h, --help          Show this help message

Environment: OPENAI_API_KEY, BATCH_MODEL, BATCH_MAX_OUTPUT_TOKENS,
BATCH_POLL_INTERVAL_SECONDS, OUTPUT_DIR, MATRIX_PATH, CATALOG_PATH, AUX_TEXT_DIR
`;

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      monitor: { type: "boolean", default: false },
      local: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [command] = positionals;
  if (values.help || command === undefined) {
    console.log(HELP);
    process.exit(0);
  }
  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`);
    console.log(HELP);
    process.exit(1);
  }

  return { command, monitor: values.monitor, local: values.local };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(title: string): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` ${title}`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printSuccess(component: string, message: string): void {
  console.log(`${c("green", "✓")} ${c("bold", component)}: ${message}`);
}

function printDetail(text: string, indent = 2): void {
  console.log(`${" ".repeat(indent)}${c("dim", "•")} ${text}`);
}

function printPrepared(prepared: PreparedBatch): void {
  const { preparation, routing } = prepared;
  printSuccess("Prepare", `${preparation.requests} requests, ${preparation.cellsRequested} cell evaluations`);
  printDetail(`With abstract: ${preparation.withAbstract}`);
  printDetail(`Excerpt fallback: ${preparation.excerptFallback}`);
  printDetail(`Limited metadata: ${preparation.limitedMetadata}`);
  printDetail(`Unroutable (skipped): ${routing.skipped}`);
  for (const [tag, count] of Object.entries(preparation.requestsByTag)) {
    printDetail(`${tag}: ${count} requests`, 4);
  }
}

function printSnapshot(snapshot: JobSnapshot): void {
  const counts = snapshot.requestCounts;
  const progress = counts ? ` (${counts.completed}/${counts.total} done, ${counts.failed} failed)` : "";
  printDetail(`${snapshot.jobId}: ${snapshot.state} [${snapshot.providerStatus}]${progress}`);
}

function printSummary(summary: RunSummary): void {
  console.log("");
  console.log("─".repeat(60));
  console.log(formatRunSummary(summary));
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Commands
// ============================================================

interface CommandContext {
  pipelineConfig: Readonly<PipelineConfig>;
  registry: MatrixRegistry;
  store: RunStore;
  logger: Logger;
  runId: string;
}

/**
 * Service for commands that never reach the provider.
 */
const OFFLINE_SERVICE: InferenceBatchService = {
  submit: () => Promise.reject(new Error("Batch service is not available offline")),
  status: () => Promise.reject(new Error("Batch service is not available offline")),
  results: () => Promise.reject(new Error("Batch service is not available offline")),
};

function createPipeline(ctx: CommandContext, service: InferenceBatchService): BatchPipeline {
  return new BatchPipeline({
    config: ctx.pipelineConfig,
    registry: ctx.registry,
    service,
    store: ctx.store,
    logger: ctx.logger,
    runId: ctx.runId,
  });
}

function createService(ctx: CommandContext): OpenAIBatchService {
  return OpenAIBatchService.create(requireApiKey(), ctx.logger.child({ component: "openai" }));
}

function storedJob(ctx: CommandContext): JobHandle {
  const metadata = ctx.store.readJobMetadata();
  if (metadata === undefined) {
    throw new RunStateError("No submitted job found; run submit first", ctx.store.path("jobMetadata"));
  }
  if (metadata.runId !== undefined) {
    resumeRunId(metadata.runId);
  }
  return toJobHandle(metadata);
}

function loadRecords() {
  return loadCatalogFile(config.catalogPath, { auxTextDir: config.auxTextDir });
}

async function waitAndParse(
  ctx: CommandContext,
  pipeline: BatchPipeline,
  handle: JobHandle
): Promise<RunSummary> {
  const responses = await pipeline.awaitResults(handle, {
    onPoll: (snapshot) => printSnapshot(snapshot),
  });
  const reconciled = pipeline.reconcile(responses);
  const { summary } = pipeline.aggregate(reconciled);
  printSuccess("Parse", `${reconciled.counts.received} responses reconciled`);
  printDetail(`Results in ${ctx.store.outputDir}`);
  return summary;
}

async function runCommand(command: Command, options: { monitor: boolean; local?: string }, ctx: CommandContext) {
  switch (command) {
    case "prepare": {
      const prepared = createPipeline(ctx, OFFLINE_SERVICE).prepare(loadRecords());
      printPrepared(prepared);
      printDetail(`Request file: ${ctx.store.path("batchInput")}`);
      return;
    }

    case "submit":
    case "run": {
      const pipeline = createPipeline(ctx, createService(ctx));
      const prepared = pipeline.prepare(loadRecords());
      printPrepared(prepared);

      const handle = await pipeline.submit(prepared);
      printSuccess("Submit", `job ${handle.jobId} (${handle.requestCount} requests)`);

      if (command === "run" || options.monitor) {
        printSummary(await waitAndParse(ctx, pipeline, handle));
      }
      return;
    }

    case "status": {
      const handle = storedJob(ctx);
      const snapshot = await createService(ctx).status(handle);
      printSuccess("Status", `submitted ${handle.submittedAt}`);
      printSnapshot(snapshot);
      return;
    }

    case "parse": {
      if (options.local !== undefined) {
        const pipeline = createPipeline(ctx, OFFLINE_SERVICE);
        const reconciled = pipeline.reconcile(pipeline.readLocalResults(options.local));
        printSuccess("Parse", `${reconciled.counts.received} responses from ${options.local}`);
        printSummary(pipeline.aggregate(reconciled).summary);
        return;
      }

      const handle = storedJob(ctx);
      printSummary(await waitAndParse(ctx, createPipeline(ctx, createService(ctx)), handle));
      return;
    }
  }
}

// ============================================================
// Main
// ============================================================

function isKnownError(err: unknown): err is Error {
  return (
    err instanceof ConfigError ||
    err instanceof PipelineConfigError ||
    err instanceof MalformedMatrixError ||
    err instanceof CatalogValidationError ||
    err instanceof UnroutableRecordError ||
    err instanceof TemplateLoadError ||
    err instanceof TemplateParseError ||
    err instanceof ConditionalParseError ||
    err instanceof PromptRenderError ||
    err instanceof UnusedVariableError ||
    err instanceof BatchJobError ||
    err instanceof EmptyBatchError ||
    err instanceof RunStateError ||
    err instanceof InvalidRunIdError
  );
}

function describeError(err: Error): string {
  if (
    err instanceof PipelineConfigError ||
    err instanceof MalformedMatrixError ||
    err instanceof CatalogValidationError
  ) {
    return err.format();
  }
  return err.message;
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  const runId = initRunId();
  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    logDir: join(config.outputDir, "logs"),
    logFile: `batch-${runId}.log`,
  });

  printHeader(`Batch evaluation: ${args.command}`);

  try {
    validateConfig();
    const pipelineConfig = applyEnvOverrides(DEFAULT_PIPELINE_CONFIG, config);
    const registry = loadMatrixFile(config.matrixPath, {
      expectedCellCount: pipelineConfig.matrix.expectedCellCount,
    });
    logger.info("Matrix loaded", { path: config.matrixPath, cells: registry.allCells().length });

    await runCommand(args.command, args, {
      pipelineConfig,
      registry,
      store: new RunStore(config.outputDir),
      logger,
      runId,
    });
  } catch (err) {
    if (isKnownError(err)) {
      logger.error(err.name, { message: err.message });
      console.error(`${c("red", "✗")} ${c("bold", err.name)}: ${describeError(err)}`);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err) => {
  console.error("Unexpected error:", err);
  process.exit(1);
});
