/**
 * Pipeline configuration schema definition.
 *
 * The configuration is validated once at startup and then treated as
 * read-only for the duration of a run. Two runs over the same catalog,
 * matrix and configuration build identical request files, and reconciling
 * the same raw responses twice yields identical results.
 *
 * The output token cap lives here rather than being hard-coded in the
 * request builder: it bounds cost and latency, and it is also the reason
 * responses arrive truncated. Raising it changes what the reconciler sees.
 */

import { z } from "zod";

/**
 * Matrix definition constraints.
 */
export const MatrixSettingsSchema = z
  .object({
    /** Number of cells the allocation matrix must contain */
    expectedCellCount: z
      .number()
      .int()
      .min(1)
      .describe("Exact number of cells the matrix definition must yield"),

    /** Prefix marking a catalog tag as a topic wildcard */
    topicTagPrefix: z
      .string()
      .min(1)
      .describe("Category tags starting with this prefix route by subdomain"),
  })
  .strict();

export type MatrixSettings = z.infer<typeof MatrixSettingsSchema>;

/**
 * Inference request parameters.
 */
export const GenerationSettingsSchema = z
  .object({
    /** Model identifier sent with every request */
    model: z.string().min(1).describe("Model identifier for batch requests"),

    /** Sampling temperature */
    temperature: z.number().min(0).max(2).describe("Sampling temperature"),

    /** Output token cap per request */
    maxOutputTokens: z
      .number()
      .int()
      .min(1)
      .describe("Maximum output tokens per response; longer responses are cut off"),
  })
  .strict();

export type GenerationSettings = z.infer<typeof GenerationSettingsSchema>;

/**
 * Text context fallback settings.
 */
export const TextContextSettingsSchema = z
  .object({
    /** Window taken from auxiliary text when the abstract is empty */
    excerptCharBudget: z
      .number()
      .int()
      .min(1)
      .describe("Characters of auxiliary text considered for the excerpt"),

    /** A sentence boundary is only used if it falls after this offset */
    minSentenceBoundary: z
      .number()
      .int()
      .min(0)
      .describe("Minimum offset of the period used to cut the excerpt"),

    /** Text used when neither abstract nor auxiliary text is available */
    limitedMetadataSentinel: z
      .string()
      .min(1)
      .describe("Placeholder text for records with no usable content"),
  })
  .strict()
  .refine((s) => s.minSentenceBoundary < s.excerptCharBudget, {
    message: "minSentenceBoundary must be smaller than excerptCharBudget",
    path: ["minSentenceBoundary"],
  });

export type TextContextSettings = z.infer<typeof TextContextSettingsSchema>;

/**
 * What to do with a catalog record whose tag matches no category or topic.
 *   - "skip":  log a warning, count it, continue with the other records
 *   - "abort": stop preparation with UnroutableRecordError
 */
export const UnroutablePolicy = z.enum(["skip", "abort"]);
export type UnroutablePolicy = z.infer<typeof UnroutablePolicy>;

export const RoutingSettingsSchema = z
  .object({
    unroutablePolicy: UnroutablePolicy.describe(
      "Handling of records whose tag matches nothing in the matrix"
    ),
  })
  .strict();

export type RoutingSettings = z.infer<typeof RoutingSettingsSchema>;

/**
 * Relevance scale and thresholds.
 */
export const ScoringSettingsSchema = z
  .object({
    scaleMin: z.number().int().describe("Lowest relevance score"),
    scaleMax: z.number().int().describe("Highest relevance score"),

    /** Cells at or above this score are a record's best cells */
    recommendThreshold: z
      .number()
      .int()
      .describe("Score at which a cell counts as a best match"),

    /** Cells whose best score reaches this are covered */
    coverageThreshold: z
      .number()
      .int()
      .describe("Best score a cell needs to count as covered"),

    /** Records whose overall relevance reaches this are high relevance */
    highRelevanceThreshold: z
      .number()
      .int()
      .describe("Overall relevance at which a record counts as high relevance"),
  })
  .strict()
  .refine((s) => s.scaleMin < s.scaleMax, {
    message: "scaleMin must be smaller than scaleMax",
    path: ["scaleMin"],
  })
  .refine(
    (s) =>
      [s.recommendThreshold, s.coverageThreshold, s.highRelevanceThreshold].every(
        (t) => t >= s.scaleMin && t <= s.scaleMax
      ),
    { message: "thresholds must lie within the relevance scale" }
  );

export type ScoringSettings = z.infer<typeof ScoringSettingsSchema>;

export const PollingSettingsSchema = z
  .object({
    intervalSeconds: z
      .number()
      .positive()
      .describe("Seconds between batch job status checks"),
  })
  .strict();

export type PollingSettings = z.infer<typeof PollingSettingsSchema>;

/**
 * Complete pipeline configuration schema.
 */
export const PipelineConfigSchema = z
  .object({
    matrix: MatrixSettingsSchema,
    generation: GenerationSettingsSchema,
    textContext: TextContextSettingsSchema,
    routing: RoutingSettingsSchema,
    scoring: ScoringSettingsSchema,
    polling: PollingSettingsSchema,
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
