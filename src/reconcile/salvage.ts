/**
 * Truncation salvage.
 *
 * Recovers what a cut-off response fully wrote, and nothing more:
 *
 *   1. record_id, overall_relevance and depth_assessment must all be
 *      present as complete, well-formed values, or nothing is salvaged.
 *   2. cell_evaluations items are taken in order while each one is a
 *      closed object that passes the cell schema. The first item that is
 *      not ends the scan; truncation is linear, so nothing after it is
 *      looked at.
 *   3. best_cells and recommended are never read from the text. They are
 *      recomputed from the recovered cells.
 */

import type { CellEvaluation } from "../types/evaluation.js";
import { parsePartialJson, getEntry, toPlainValue, type PartialValue } from "./partial-json.js";
import { createResponseSchemas, toCellEvaluation, type ResponseSchemas } from "./schema.js";

export interface SalvageOptions {
  scaleMin: number;
  scaleMax: number;
  /** Score at or above which a cell is a best cell */
  recommendThreshold: number;
  /** Prebuilt schemas for the same scale; built from the scale when omitted */
  schemas?: ResponseSchemas;
}

export interface SalvagedEvaluation {
  recordId: string;
  overallRelevance: number;
  depthAssessment: string;
  cellEvaluations: CellEvaluation[];
  bestCells: string[];
  recommended: boolean;
}

export function deriveBestCells(
  cells: readonly CellEvaluation[],
  recommendThreshold: number
): string[] {
  return cells.filter((c) => c.relevanceScore >= recommendThreshold).map((c) => c.cellId);
}

/**
 * Salvage a truncated or malformed response body.
 *
 * @returns undefined when the top-level fields are not all recoverable
 */
export function salvageRecordEvaluation(
  text: string,
  options: SalvageOptions
): SalvagedEvaluation | undefined {
  const schemas = options.schemas ?? createResponseSchemas(options);
  const { root } = parsePartialJson(text);
  if (root === undefined || root.kind !== "object") {
    return undefined;
  }

  const header = schemas.WireHeaderSchema.safeParse({
    record_id: plainEntry(root, "record_id"),
    overall_relevance: plainEntry(root, "overall_relevance"),
    depth_assessment: plainEntry(root, "depth_assessment"),
  });
  if (!header.success) {
    return undefined;
  }

  const cellEvaluations: CellEvaluation[] = [];
  const cells = getEntry(root, "cell_evaluations");
  if (cells?.kind === "array") {
    for (const item of cells.items) {
      if (item.kind !== "object" || !item.complete) break;
      const parsed = schemas.WireCellEvaluationSchema.safeParse(toPlainValue(item));
      if (!parsed.success) break;
      cellEvaluations.push(toCellEvaluation(parsed.data));
    }
  }

  const bestCells = deriveBestCells(cellEvaluations, options.recommendThreshold);
  return {
    recordId: header.data.record_id,
    overallRelevance: header.data.overall_relevance,
    depthAssessment: header.data.depth_assessment,
    cellEvaluations,
    bestCells,
    recommended: bestCells.length > 0,
  };
}

function plainEntry(root: PartialValue, key: string): unknown {
  const value = getEntry(root, key);
  return value === undefined ? undefined : toPlainValue(value);
}
