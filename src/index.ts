/**
 * Entry point: startup check for the batch evaluation pipeline.
 *
 * Loads configuration, the allocation matrix, the prompt templates and the
 * catalog, and reports what a batch run would work with. Submitting and
 * parsing are done through src/cli/batch.ts.
 */

import { existsSync } from "node:fs";

import {
  config,
  validateConfig,
  applyEnvOverrides,
  DEFAULT_PIPELINE_CONFIG,
  ConfigError,
  PipelineConfigError,
} from "./config/index.js";
import { initRunId, createLogger, isLogLevel } from "./logging/index.js";
import { loadMatrixFile, MalformedMatrixError } from "./matrix/index.js";
import { loadCatalogFile, CatalogValidationError } from "./catalog/index.js";
import {
  PromptTemplateLoader,
  CELL_EVALUATION_TEMPLATE,
  SYSTEM_INSTRUCTION_TEMPLATE,
  TemplateLoadError,
  TemplateParseError,
  ConditionalParseError,
} from "./prompts/index.js";

function main(): void {
  // Initialize run ID first
  const runId = initRunId();

  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
  });

  try {
    validateConfig();

    logger.info("Application starting", { runId });
    logger.info("Configuration loaded", {
      env: config.env,
      debug: config.debug,
      logLevel: config.logLevel,
      appName: config.appName,
      model: config.batchModel,
      maxOutputTokens: config.batchMaxOutputTokens,
    });

    const pipelineConfig = applyEnvOverrides(DEFAULT_PIPELINE_CONFIG, config);
    const registry = loadMatrixFile(config.matrixPath, {
      expectedCellCount: pipelineConfig.matrix.expectedCellCount,
    });
    logger.info("Matrix loaded", { path: config.matrixPath, ...registry.getStats() });

    const templates = new PromptTemplateLoader();
    for (const name of [SYSTEM_INSTRUCTION_TEMPLATE, CELL_EVALUATION_TEMPLATE]) {
      const template = templates.load(name);
      logger.info("Prompt template loaded", { name, variables: template.variables.length });
    }

    if (existsSync(config.catalogPath)) {
      const records = loadCatalogFile(config.catalogPath, { auxTextDir: config.auxTextDir });
      logger.info("Catalog loaded", { path: config.catalogPath, records: records.length });
    } else {
      logger.warn("Catalog not found", { path: config.catalogPath });
    }

    logger.info("Application initialized successfully");
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    if (
      err instanceof PipelineConfigError ||
      err instanceof MalformedMatrixError ||
      err instanceof CatalogValidationError
    ) {
      logger.error(err.name, { details: err.format() });
      process.exit(1);
    }
    if (
      err instanceof TemplateLoadError ||
      err instanceof TemplateParseError ||
      err instanceof ConditionalParseError
    ) {
      logger.error(err.name, { message: err.message });
      process.exit(1);
    }
    throw err;
  }
}

main();
