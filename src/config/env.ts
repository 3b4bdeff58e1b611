/**
 * Environment variable readers for the batch pipeline.
 *
 * Every reader takes the variable source as its last argument, defaulting to
 * `process.env` (after `.env` has been loaded), so that callers and tests can
 * read from a plain object instead.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(
    message: string,
    /** Variable at fault, when there is one */
    public readonly key?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function read(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: EnvSource = process.env): string {
  const value = read(env, key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`, key);
  }
  return value;
}

export function optionalEnv(key: string, defaultValue: string, env: EnvSource = process.env): string {
  return read(env, key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer.
 * Only plain digit strings are accepted ("12abc" is rejected).
 */
export function optionalEnvInt(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const value = read(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`, key);
  }
  return parseInt(value, 10);
}

/**
 * Get an optional environment variable as a finite number.
 */
export function optionalEnvFloat(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const value = read(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`, key);
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = read(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    key
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// BATCH SETTINGS
// ═══════════════════════════════════════════════════════════════════════════

export interface BatchEnvSettings {
  /** BATCH_MODEL */
  readonly model: string;
  /** BATCH_TEMPERATURE, 0 to 2 */
  readonly temperature: number;
  /** BATCH_MAX_OUTPUT_TOKENS, positive */
  readonly maxOutputTokens: number;
  /** BATCH_POLL_INTERVAL_SECONDS, positive */
  readonly pollIntervalSeconds: number;
}

export const BATCH_ENV_DEFAULTS: BatchEnvSettings = {
  model: "gpt-4o-mini",
  temperature: 0.2,
  maxOutputTokens: 4096,
  pollIntervalSeconds: 60,
};

export function readBatchEnv(env: EnvSource = process.env): BatchEnvSettings {
  return {
    model: optionalEnv("BATCH_MODEL", BATCH_ENV_DEFAULTS.model, env),
    temperature: optionalEnvFloat("BATCH_TEMPERATURE", BATCH_ENV_DEFAULTS.temperature, env),
    maxOutputTokens: optionalEnvInt("BATCH_MAX_OUTPUT_TOKENS", BATCH_ENV_DEFAULTS.maxOutputTokens, env),
    pollIntervalSeconds: optionalEnvInt(
      "BATCH_POLL_INTERVAL_SECONDS",
      BATCH_ENV_DEFAULTS.pollIntervalSeconds,
      env
    ),
  };
}

/**
 * Range checks for batch settings.
 * Throws ConfigError naming the first variable out of range.
 */
export function validateBatchEnv(settings: BatchEnvSettings): void {
  if (settings.temperature < 0 || settings.temperature > 2) {
    throw new ConfigError(
      `Invalid BATCH_TEMPERATURE: ${settings.temperature}. Must be between 0 and 2.`,
      "BATCH_TEMPERATURE"
    );
  }
  if (settings.maxOutputTokens < 1) {
    throw new ConfigError(
      `Invalid BATCH_MAX_OUTPUT_TOKENS: ${settings.maxOutputTokens}. Must be positive.`,
      "BATCH_MAX_OUTPUT_TOKENS"
    );
  }
  if (settings.pollIntervalSeconds < 1) {
    throw new ConfigError(
      `Invalid BATCH_POLL_INTERVAL_SECONDS: ${settings.pollIntervalSeconds}. Must be positive.`,
      "BATCH_POLL_INTERVAL_SECONDS"
    );
  }
}
