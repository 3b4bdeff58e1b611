/**
 * Run summary: reconciliation counts, record tallies and matrix coverage.
 */

import { COMMODITY_DISPLAY, type CommodityCode } from "../config/pipeline/enums.js";
import type { ScoringSettings } from "../config/pipeline/schema.js";
import type { MatrixRegistry } from "../matrix/registry.js";
import type { ReconcileCounts } from "../reconcile/reconciler.js";
import type { RecordEvaluation } from "../types/evaluation.js";
import type { RecommendationMatrix } from "./matrix.js";

export interface CommodityCoverage {
  readonly category: CommodityCode;
  /** Records with at least one evaluation against this commodity's cells */
  readonly recordsEvaluated: number;
  readonly cells: number;
  readonly coveredCells: number;
  /** Mean best score over cells that have entries; null when none do */
  readonly averageTopScore: number | null;
}

export interface RunSummary {
  readonly responses: number;
  readonly parsed: number;
  readonly salvaged: number;
  readonly dropped: number;
  readonly skipped: number;
  readonly truncated: number;
  readonly salvagedCells: number;
  readonly discardedCells: number;
  readonly evaluatedRecords: number;
  readonly recommendedRecords: number;
  readonly highRelevanceRecords: number;
  readonly totalCells: number;
  readonly coveredCells: number;
  readonly stronglyCoveredCells: number;
  /** Cells below the coverage threshold, in matrix order */
  readonly gaps: readonly string[];
  readonly unmatchedEntries: number;
  readonly thresholds: {
    readonly coverage: number;
    readonly strongCoverage: number;
    readonly highRelevance: number;
  };
  readonly byCommodity: readonly CommodityCoverage[];
}

export interface SummarizeRunInput {
  counts: ReconcileCounts;
  evaluations: readonly RecordEvaluation[];
  matrix: RecommendationMatrix;
  registry: MatrixRegistry;
  scoring: Pick<ScoringSettings, "recommendThreshold" | "coverageThreshold" | "highRelevanceThreshold">;
}

function commodityCoverage(
  category: CommodityCode,
  input: SummarizeRunInput,
  covered: ReadonlySet<string>
): CommodityCoverage {
  const cells = input.registry.cellsForCategory(category);
  const cellIds = new Set(cells.map((c) => c.cellId));

  const recordsEvaluated = input.evaluations.filter((e) =>
    e.cellEvaluations.some((c) => cellIds.has(c.cellId))
  ).length;

  const topScores: number[] = [];
  for (const cell of cells) {
    const best = input.matrix.bestScore(cell.cellId);
    if (best !== undefined) topScores.push(best);
  }

  return {
    category,
    recordsEvaluated,
    cells: cells.length,
    coveredCells: cells.filter((c) => covered.has(c.cellId)).length,
    averageTopScore:
      topScores.length > 0 ? topScores.reduce((sum, s) => sum + s, 0) / topScores.length : null,
  };
}

export function summarizeRun(input: SummarizeRunInput): RunSummary {
  const { counts, evaluations, matrix, registry, scoring } = input;
  const covered = matrix.coverage(scoring.coverageThreshold);
  const strong = matrix.coverage(scoring.recommendThreshold);

  return Object.freeze({
    responses: counts.received,
    parsed: counts.parsed,
    salvaged: counts.salvaged,
    dropped: counts.dropped,
    skipped: counts.skipped,
    truncated: counts.truncated,
    salvagedCells: counts.salvagedCells,
    discardedCells: counts.discardedCells,
    evaluatedRecords: evaluations.length,
    recommendedRecords: evaluations.filter((e) => e.recommended).length,
    highRelevanceRecords: evaluations.filter(
      (e) => e.overallRelevance >= scoring.highRelevanceThreshold
    ).length,
    totalCells: matrix.size,
    coveredCells: covered.size,
    stronglyCoveredCells: strong.size,
    gaps: Object.freeze(matrix.gaps(scoring.coverageThreshold)),
    unmatchedEntries: matrix.unmatchedEntries,
    thresholds: {
      coverage: scoring.coverageThreshold,
      strongCoverage: scoring.recommendThreshold,
      highRelevance: scoring.highRelevanceThreshold,
    },
    byCommodity: Object.freeze(
      registry.categories().map((category) => commodityCoverage(category, input, covered))
    ),
  });
}

/**
 * Plain-text report of a run summary, one fact per line.
 */
export function formatRunSummary(summary: RunSummary): string {
  const { thresholds: t } = summary;
  const lines = [
    `Responses received: ${summary.responses}`,
    `  Parsed: ${summary.parsed}`,
    `  Salvaged (truncated): ${summary.salvaged} (${summary.salvagedCells} cells recovered)`,
    `  Dropped: ${summary.dropped}`,
    `  Skipped (already processed): ${summary.skipped}`,
    `Records evaluated: ${summary.evaluatedRecords}`,
    `Recommended records: ${summary.recommendedRecords}`,
    `High relevance (>= ${t.highRelevance}): ${summary.highRelevanceRecords}`,
    `Cells covered (>= ${t.coverage}): ${summary.coveredCells}/${summary.totalCells}`,
    `Strongly covered (>= ${t.strongCoverage}): ${summary.stronglyCoveredCells}/${summary.totalCells}`,
    `Gap cells: ${summary.gaps.length}`,
  ];

  if (summary.unmatchedEntries > 0) {
    lines.push(`Entries for unknown cells: ${summary.unmatchedEntries}`);
  }

  lines.push("", "Coverage by commodity:");
  for (const row of summary.byCommodity) {
    const avg = row.averageTopScore === null ? "N/A" : row.averageTopScore.toFixed(1);
    lines.push(
      `  ${COMMODITY_DISPLAY[row.category]} (${row.category}): ${row.recordsEvaluated} records, ` +
        `${row.coveredCells}/${row.cells} cells covered, avg top score ${avg}`
    );
  }

  return lines.join("\n");
}
