/**
 * Run summary tests.
 *
 * Run: node --import tsx --test src/aggregate/summary.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { fileURLToPath } from "node:url";

import { buildRecommendationMatrix, formatRunSummary, summarizeRun } from "./index.js";
import { loadMatrixFile } from "../matrix/loader.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/defaults.js";
import type { ReconcileCounts } from "../reconcile/reconciler.js";
import type { CellEvaluation, RecordEvaluation } from "../types/evaluation.js";

const MATRIX_PATH = fileURLToPath(new URL("../../data/allocation-matrix.md", import.meta.url));
const registry = loadMatrixFile(MATRIX_PATH, { expectedCellCount: 100 });

function cellEval(cellId: string, relevanceScore: number): CellEvaluation {
  return {
    cellId,
    relevanceScore,
    justification: "Relevant passage.",
    suggestedAngle: "Question angle.",
    supportsDeepAnalysis: false,
  };
}

function evaluation(
  recordId: string,
  overallRelevance: number,
  recommended: boolean,
  cells: CellEvaluation[]
): RecordEvaluation {
  return {
    recordId,
    overallRelevance,
    depthAssessment: "Survey",
    cellEvaluations: cells,
    bestCells: [],
    recommended,
    wasSalvaged: false,
  };
}

const EVALUATIONS = [
  evaluation("r1", 5, true, [cellEval("CMM-CO-TEC-L4-001", 5), cellEval("CMM-CO-TPM-L1-002", 2)]),
  evaluation("r2", 3, true, [cellEval("CMM-CO-TEC-L4-001", 3), cellEval("CMM-HREE-TEC-L1-001", 4)]),
  evaluation("r3", 2, false, [cellEval("CMM-GE-TEC-L1-001", 1)]),
];

const COUNTS: ReconcileCounts = {
  received: 4,
  parsed: 2,
  salvaged: 1,
  dropped: 1,
  skipped: 0,
  truncated: 1,
  salvagedCells: 1,
  discardedCells: 0,
};

const matrix = buildRecommendationMatrix(registry, EVALUATIONS);
const summary = summarizeRun({
  counts: COUNTS,
  evaluations: EVALUATIONS,
  matrix,
  registry,
  scoring: DEFAULT_PIPELINE_CONFIG.scoring,
});

describe("summarizeRun", () => {
  test("copies the reconciliation counts", () => {
    assert.equal(summary.responses, 4);
    assert.equal(summary.parsed, 2);
    assert.equal(summary.salvaged, 1);
    assert.equal(summary.dropped, 1);
    assert.equal(summary.salvagedCells, 1);
  });

  test("tallies records", () => {
    assert.equal(summary.evaluatedRecords, 3);
    assert.equal(summary.recommendedRecords, 2);
    assert.equal(summary.highRelevanceRecords, 1);
  });

  test("reports coverage and gaps", () => {
    assert.equal(summary.totalCells, 100);
    assert.equal(summary.coveredCells, 2);
    assert.equal(summary.stronglyCoveredCells, 2);
    assert.equal(summary.gaps.length, 98);
    assert.ok(summary.gaps.includes("CMM-CO-TPM-L1-002"));
    assert.deepEqual(summary.thresholds, { coverage: 3, strongCoverage: 4, highRelevance: 4 });
  });

  test("breaks coverage down by commodity in matrix order", () => {
    assert.deepEqual(
      summary.byCommodity.map((row) => row.category),
      ["HREE", "LREE", "LI", "CO", "NI", "CU", "GA", "GR", "GE", "OTH"]
    );
    const co = summary.byCommodity.find((row) => row.category === "CO");
    assert.deepEqual(co, {
      category: "CO",
      recordsEvaluated: 2,
      cells: 10,
      coveredCells: 1,
      averageTopScore: 3.5,
    });
    const lree = summary.byCommodity.find((row) => row.category === "LREE");
    assert.equal(lree?.averageTopScore, null);
    assert.equal(lree?.recordsEvaluated, 0);
  });
});

describe("formatRunSummary", () => {
  const lines = formatRunSummary(summary).split("\n");

  test("headline figures", () => {
    assert.deepEqual(lines.slice(0, 13), [
      "Responses received: 4",
      "  Parsed: 2",
      "  Salvaged (truncated): 1 (1 cells recovered)",
      "  Dropped: 1",
      "  Skipped (already processed): 0",
      "Records evaluated: 3",
      "Recommended records: 2",
      "High relevance (>= 4): 1",
      "Cells covered (>= 3): 2/100",
      "Strongly covered (>= 4): 2/100",
      "Gap cells: 98",
      "",
      "Coverage by commodity:",
    ]);
  });

  test("commodity rows", () => {
    assert.ok(lines.includes("  Cobalt (CO): 2 records, 1/10 cells covered, avg top score 3.5"));
    assert.ok(
      lines.includes("  Light Rare Earth Elements (LREE): 0 records, 0/12 cells covered, avg top score N/A")
    );
    assert.equal(lines.length, 23);
  });
});
