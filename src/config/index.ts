/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvBool,
  readBatchEnv,
  validateBatchEnv,
  type EnvSource,
} from "./env.js";

export { ConfigError, type EnvSource } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Model used for batch evaluation requests */
  readonly batchModel: string;
  /** Sampling temperature for batch requests */
  readonly batchTemperature: number;
  /** Per-request output token cap */
  readonly batchMaxOutputTokens: number;
  /** Seconds between batch status polls */
  readonly batchPollIntervalSeconds: number;
  /** Directory for batch inputs, raw outputs and parsed results */
  readonly outputDir: string;
  /** Markdown allocation matrix */
  readonly matrixPath: string;
  /** Document catalog JSON */
  readonly catalogPath: string;
  /** Directory of extracted-text JSON files keyed by record id (optional) */
  readonly auxTextDir: string;
}

/**
 * Read application configuration from an environment source.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const batch = readBatchEnv(env);
  return {
    env: optionalEnv("NODE_ENV", "development", env),
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    appName: optionalEnv("APP_NAME", "cmm-batch-analysis", env),
    batchModel: batch.model,
    batchTemperature: batch.temperature,
    batchMaxOutputTokens: batch.maxOutputTokens,
    batchPollIntervalSeconds: batch.pollIntervalSeconds,
    outputDir: optionalEnv("OUTPUT_DIR", "output", env),
    matrixPath: optionalEnv("MATRIX_PATH", "data/allocation-matrix.md", env),
    catalogPath: optionalEnv("CATALOG_PATH", "data/document-catalog.json", env),
    auxTextDir: optionalEnv("AUX_TEXT_DIR", "", env),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`,
      "NODE_ENV"
    );
  }

  if (!["debug", "info", "warn", "error"].includes(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`,
      "LOG_LEVEL"
    );
  }

  validateBatchEnv({
    model: appConfig.batchModel,
    temperature: appConfig.batchTemperature,
    maxOutputTokens: appConfig.batchMaxOutputTokens,
    pollIntervalSeconds: appConfig.batchPollIntervalSeconds,
  });
}

/**
 * API key for the inference service.
 * Only the commands that talk to the service need it.
 */
export function requireApiKey(env: EnvSource = process.env): string {
  return requireEnv("OPENAI_API_KEY", env);
}
