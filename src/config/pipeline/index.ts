/**
 * Pipeline configuration module.
 *
 * Provides schema-validated, immutable configuration for batch runs.
 *
 * Usage:
 *   import { loadPipelineConfig, DEFAULT_PIPELINE_CONFIG } from "./config/pipeline/index.js";
 *
 *   // Load with defaults
 *   const pipelineConfig = loadPipelineConfig(DEFAULT_PIPELINE_CONFIG);
 *
 *   // Layer environment values on top
 *   const tuned = applyEnvOverrides(DEFAULT_PIPELINE_CONFIG, config);
 */

// Domain enums
export {
  CommodityCode,
  SubdomainCode,
  ComplexityLevel,
  Stratum,
  COMMODITY_DISPLAY,
  SUBDOMAIN_DISPLAY,
  COMPLEXITY_DISPLAY,
  DOMAIN_GROUPS,
  CELL_ID_SUBDOMAIN,
} from "./enums.js";

// Schema types
export type {
  PipelineConfig,
  MatrixSettings,
  GenerationSettings,
  TextContextSettings,
  RoutingSettings,
  ScoringSettings,
  PollingSettings,
} from "./schema.js";

export { PipelineConfigSchema, UnroutablePolicy } from "./schema.js";

// Loader and validation
export {
  loadPipelineConfig,
  applyEnvOverrides,
  deepFreeze,
  formatZodIssues,
  PipelineConfigError,
  type ConfigValidationIssue,
  type PipelineEnvOverrides,
} from "./loader.js";

// Defaults
export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
