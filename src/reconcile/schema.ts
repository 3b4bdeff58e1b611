/**
 * Local conformance schemas for model responses.
 *
 * The provider is asked to enforce RECORD_EVALUATION_SCHEMA, but truncation
 * defeats that, so every response is checked here before any domain object
 * is built. Field names are the snake_case wire names.
 */

import { z } from "zod";

import type { ScoringSettings } from "../config/pipeline/schema.js";
import type { CellEvaluation } from "../types/evaluation.js";

export function createResponseSchemas(scoring: Pick<ScoringSettings, "scaleMin" | "scaleMax">) {
  const score = z.number().int().min(scoring.scaleMin).max(scoring.scaleMax);

  const WireCellEvaluationSchema = z
    .object({
      cell_id: z.string().min(1),
      relevance_score: score,
      justification: z.string().min(1),
      suggested_angle: z.string().min(1),
      supports_deep_analysis: z.boolean(),
    })
    .strict();

  const WireHeaderSchema = z.object({
    record_id: z.string().min(1),
    overall_relevance: score,
    depth_assessment: z.string(),
  });

  const WireRecordEvaluationSchema = WireHeaderSchema.extend({
    cell_evaluations: z.array(WireCellEvaluationSchema),
    best_cells: z.array(z.string()),
    recommended: z.boolean(),
  }).strict();

  /** Complete output whose cells are checked one at a time */
  const WireCellListSchema = WireHeaderSchema.extend({
    cell_evaluations: z.array(z.unknown()),
  });

  return { WireCellEvaluationSchema, WireHeaderSchema, WireRecordEvaluationSchema, WireCellListSchema };
}

export type ResponseSchemas = ReturnType<typeof createResponseSchemas>;

export type WireCellEvaluation = z.infer<ResponseSchemas["WireCellEvaluationSchema"]>;
export type WireHeader = z.infer<ResponseSchemas["WireHeaderSchema"]>;
export type WireRecordEvaluation = z.infer<ResponseSchemas["WireRecordEvaluationSchema"]>;

export function toCellEvaluation(wire: WireCellEvaluation): CellEvaluation {
  return {
    cellId: wire.cell_id,
    relevanceScore: wire.relevance_score,
    justification: wire.justification,
    suggestedAngle: wire.suggested_angle,
    supportsDeepAnalysis: wire.supports_deep_analysis,
  };
}

/**
 * One-line summary of the first schema issue, e.g. "cell_evaluations.0.relevance_score: ...".
 */
export function describeSchemaError(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) return "schema validation failed";
  const path = first.path.length > 0 ? first.path.join(".") : "(root)";
  return `${path}: ${first.message}`;
}
