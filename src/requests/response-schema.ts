/**
 * Response schema sent with every request.
 *
 * The service is asked to enforce it, but enforcement ends where the output
 * token cap cuts a response off. The reconciler checks every response
 * against its own copy of these rules (reconcile/schema.ts).
 */

import { deepFreeze } from "../config/pipeline/loader.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/defaults.js";
import type { ScoringSettings } from "../config/pipeline/schema.js";

export const RESPONSE_SCHEMA_NAME = "record_evaluation";

export type ResponseSchemaScoring = Pick<ScoringSettings, "scaleMin" | "scaleMax" | "recommendThreshold">;

function cellEvaluationSchema({ scaleMin, scaleMax }: ResponseSchemaScoring) {
  return {
    type: "object",
    properties: {
      cell_id: {
        type: "string",
        description: "Matrix cell id, exactly as listed in the prompt",
      },
      relevance_score: {
        type: "integer",
        description: `${scaleMin}-${scaleMax}: how well this document supports a gold Q&A for this cell`,
      },
      justification: {
        type: "string",
        description: "Why this score; what specific content maps to this cell",
      },
      suggested_angle: {
        type: "string",
        description: "A specific question angle this document could support for this cell",
      },
      supports_deep_analysis: {
        type: "boolean",
        description: "Whether the document has enough depth for L3/L4 questions",
      },
    },
    required: [
      "cell_id",
      "relevance_score",
      "justification",
      "suggested_angle",
      "supports_deep_analysis",
    ],
    additionalProperties: false,
  };
}

/**
 * Strict response schema with descriptions for the given scoring scale.
 */
export function buildRecordEvaluationSchema(
  scoring: ResponseSchemaScoring
): Readonly<Record<string, unknown>> {
  const { scaleMin, scaleMax, recommendThreshold } = scoring;
  return deepFreeze({
    type: "object",
    properties: {
      record_id: {
        type: "string",
        description: "The record id given in the prompt",
      },
      overall_relevance: {
        type: "integer",
        description: `${scaleMin}-${scaleMax} scale: ${scaleMin} = no relevance, ${scaleMax} = highly relevant with deep content`,
      },
      depth_assessment: {
        type: "string",
        description: "Brief assessment of the document's depth and specificity",
      },
      cell_evaluations: {
        type: "array",
        items: cellEvaluationSchema(scoring),
      },
      best_cells: {
        type: "array",
        items: { type: "string" },
        description: `Cell ids scored ${recommendThreshold} or higher`,
      },
      recommended: {
        type: "boolean",
        description: `True if any cell evaluation scores ${recommendThreshold} or higher`,
      },
    },
    required: [
      "record_id",
      "overall_relevance",
      "depth_assessment",
      "cell_evaluations",
      "best_cells",
      "recommended",
    ],
    additionalProperties: false,
  });
}

/** Schema for the default scoring scale */
export const RECORD_EVALUATION_SCHEMA = buildRecordEvaluationSchema(DEFAULT_PIPELINE_CONFIG.scoring);
