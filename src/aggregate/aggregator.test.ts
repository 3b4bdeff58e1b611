/**
 * Recommendation matrix tests.
 *
 * Run: node --import tsx --test src/aggregate/aggregator.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { fileURLToPath } from "node:url";

import { buildRecommendationMatrix } from "./index.js";
import { loadMatrixFile } from "../matrix/loader.js";
import type { CellEvaluation, RecordEvaluation } from "../types/evaluation.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const MATRIX_PATH = fileURLToPath(new URL("../../data/allocation-matrix.md", import.meta.url));
const registry = loadMatrixFile(MATRIX_PATH, { expectedCellCount: 100 });

const CO_TEC = "CMM-CO-TEC-L4-001";
const CO_TPM = "CMM-CO-TPM-L1-002";
const HREE_TEC = "CMM-HREE-TEC-L1-001";

function cellEval(cellId: string, relevanceScore: number): CellEvaluation {
  return {
    cellId,
    relevanceScore,
    justification: `Evidence for ${cellId}`,
    suggestedAngle: `Angle on ${cellId}`,
    supportsDeepAnalysis: relevanceScore >= 4,
  };
}

function evaluation(recordId: string, cells: CellEvaluation[], overallRelevance = 3): RecordEvaluation {
  return {
    recordId,
    overallRelevance,
    depthAssessment: "Moderate",
    cellEvaluations: cells,
    bestCells: cells.filter((c) => c.relevanceScore >= 4).map((c) => c.cellId),
    recommended: cells.some((c) => c.relevanceScore >= 4),
    wasSalvaged: false,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPLETENESS
// ═══════════════════════════════════════════════════════════════════════════

describe("buildRecommendationMatrix completeness", () => {
  test("contains every cell even with no evaluations", () => {
    const matrix = buildRecommendationMatrix(registry, []);
    assert.equal(matrix.size, 100);
    assert.deepEqual(
      matrix.cellIds(),
      registry.allCells().map((c) => c.cellId)
    );
    for (const cellId of matrix.cellIds()) {
      assert.deepEqual(matrix.entriesFor(cellId), []);
    }
    assert.equal(matrix.coverage(3).size, 0);
    assert.equal(matrix.gaps(3).length, 100);
  });

  test("counts entries for cells outside the matrix", () => {
    const matrix = buildRecommendationMatrix(registry, [
      evaluation("r1", [cellEval(CO_TEC, 4), cellEval("CMM-XX-TEC-L1-001", 5)]),
    ]);
    assert.equal(matrix.size, 100);
    assert.equal(matrix.unmatchedEntries, 1);
    assert.deepEqual(matrix.entriesFor("CMM-XX-TEC-L1-001"), []);
    assert.equal(matrix.entriesFor(CO_TEC).length, 1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING
// ═══════════════════════════════════════════════════════════════════════════

describe("buildRecommendationMatrix ordering", () => {
  test("sorts by score descending and keeps input order on ties", () => {
    const matrix = buildRecommendationMatrix(registry, [
      evaluation("A", [cellEval(CO_TEC, 3)]),
      evaluation("B", [cellEval(CO_TEC, 5)]),
      evaluation("C", [cellEval(CO_TEC, 5)]),
      evaluation("D", [cellEval(CO_TEC, 1)]),
    ]);
    assert.deepEqual(
      matrix.entriesFor(CO_TEC).map((e) => e.recordId),
      ["B", "C", "A", "D"]
    );
    assert.equal(matrix.bestScore(CO_TEC), 5);
    assert.equal(matrix.bestScore(CO_TPM), undefined);
  });

  test("entries carry the cell judgment and the record's overall relevance", () => {
    const matrix = buildRecommendationMatrix(registry, [evaluation("r7", [cellEval(HREE_TEC, 4)], 5)]);
    assert.deepEqual(matrix.entriesFor(HREE_TEC), [
      {
        recordId: "r7",
        relevanceScore: 4,
        justification: `Evidence for ${HREE_TEC}`,
        suggestedAngle: `Angle on ${HREE_TEC}`,
        supportsDeepAnalysis: true,
        overallRelevance: 5,
      },
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// COVERAGE & SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════

describe("RecommendationMatrix coverage", () => {
  const matrix = buildRecommendationMatrix(registry, [
    evaluation("r1", [cellEval(CO_TEC, 5), cellEval(CO_TPM, 2)]),
    evaluation("r2", [cellEval(HREE_TEC, 3)]),
  ]);

  test("coverage uses the best score per cell, in matrix order", () => {
    assert.deepEqual([...matrix.coverage(3)], [HREE_TEC, CO_TEC]);
    assert.deepEqual([...matrix.coverage(4)], [CO_TEC]);
    assert.deepEqual([...matrix.coverage(6)], []);
  });

  test("gaps are the complement of coverage", () => {
    const gaps = matrix.gaps(3);
    assert.equal(gaps.length, 98);
    assert.ok(gaps.includes(CO_TPM));
    assert.ok(!gaps.includes(CO_TEC));
    assert.equal(gaps[0], "CMM-HREE-TPM-L2-002");
  });

  test("serializes with keys in matrix order", () => {
    const json = matrix.toJSON();
    assert.deepEqual(Object.keys(json), matrix.cellIds());
    assert.equal(json[CO_TEC].length, 1);
    assert.equal(json[CO_TEC][0].recordId, "r1");
  });

  test("rebuilding from the same evaluations is byte-identical", () => {
    const evaluations = [
      evaluation("r1", [cellEval(CO_TEC, 4), cellEval(CO_TPM, 4)]),
      evaluation("r2", [cellEval(CO_TEC, 4)]),
      evaluation("r3", [cellEval(HREE_TEC, 2)]),
    ];
    const first = JSON.stringify(buildRecommendationMatrix(registry, evaluations), null, 2);
    const second = JSON.stringify(buildRecommendationMatrix(registry, evaluations), null, 2);
    assert.equal(first, second);
  });
});
