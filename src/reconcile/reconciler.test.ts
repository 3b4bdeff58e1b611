/**
 * Reconciler tests.
 *
 * Run: node --import tsx --test src/reconcile/reconciler.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { Reconciler, type RoutingManifest } from "./reconciler.js";
import { ReconcileState } from "../types/evaluation.js";
import type { RawResponse, RawResponseBody } from "../types/batch.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/defaults.js";
import { createLogger } from "../logging/logger.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

interface WireCell {
  cell_id: string;
  relevance_score: number;
  justification: string;
  suggested_angle: string;
  supports_deep_analysis: boolean;
}

const C1 = "CMM-LI-TEC-L1-001";
const C2 = "CMM-LI-TPM-L2-002";
const C3 = "CMM-LI-QPS-L1-003";
const C4 = "CMM-LI-GPR-L3-004";
const C5 = "CMM-LI-SST-L4-005";

const ROUTING: RoutingManifest = {
  r1: [C1, C2, C3, C4, C5],
  r2: [C1, C2],
  r3: [C1, C2, C3],
};

function wireCell(cellId: string, score: number): WireCell {
  return {
    cell_id: cellId,
    relevance_score: score,
    justification: `Covers ${cellId}.`,
    suggested_angle: `Ask about ${cellId}`,
    supports_deep_analysis: score >= 4,
  };
}

function document(recordId: string, cells: WireCell[], bestCells?: string[]): string {
  const best = bestCells ?? cells.filter((c) => c.relevance_score >= 4).map((c) => c.cell_id);
  return JSON.stringify({
    record_id: recordId,
    overall_relevance: 4,
    depth_assessment: "Plant-level yield data.",
    cell_evaluations: cells,
    best_cells: best,
    recommended: best.length > 0,
  });
}

function body(recordId: string, text: string, truncated = false): RawResponseBody {
  return {
    kind: "body",
    recordId,
    body: text,
    finishReason: truncated ? "length" : "stop",
    truncated,
  };
}

/** Full document for 5 cells, cut just before the 3rd cell's closing brace */
function truncatedThirdCell(recordId: string): string {
  const cells = [wireCell(C1, 5), wireCell(C2, 3), wireCell(C3, 4), wireCell(C4, 2), wireCell(C5, 1)];
  const full = document(recordId, cells);
  const third = JSON.stringify(cells[2]);
  return full.slice(0, full.indexOf(third) + third.length - 1);
}

function makeReconciler(options: { routing?: RoutingManifest } = { routing: ROUTING }) {
  const entries: string[] = [];
  const logger = createLogger({ level: "debug", console: false, file: false, sink: (e) => entries.push(e) });
  const reconciler = new Reconciler({ scoring: DEFAULT_PIPELINE_CONFIG.scoring, routing: options.routing, logger });
  return { reconciler, entries };
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLE RESPONSES
// ═══════════════════════════════════════════════════════════════════════════

describe("Reconciler.reconcile", () => {
  test("a clean response with three cells is PARSED", () => {
    const { reconciler } = makeReconciler();
    const text = document("r3", [wireCell(C1, 4), wireCell(C2, 2), wireCell(C3, 5)]);
    const outcome = reconciler.reconcile(body("r3", text));

    assert.equal(outcome.state, ReconcileState.Parsed);
    assert.equal(outcome.evaluation?.wasSalvaged, false);
    assert.equal(outcome.evaluation?.overallRelevance, 4);
    assert.equal(outcome.evaluation?.cellEvaluations.length, 3);
    assert.deepEqual(outcome.evaluation?.bestCells, [C1, C3]);
    assert.equal(outcome.evaluation?.recommended, true);
    assert.equal(outcome.discardedCells, 0);
  });

  test("a response cut inside the 3rd of 5 cells is SALVAGED with 2", () => {
    const { reconciler } = makeReconciler();
    const outcome = reconciler.reconcile(body("r1", truncatedThirdCell("r1"), true));

    assert.equal(outcome.state, ReconcileState.Salvaged);
    assert.equal(outcome.truncated, true);
    assert.equal(outcome.evaluation?.wasSalvaged, true);
    assert.deepEqual(
      outcome.evaluation?.cellEvaluations.map((c) => c.cellId),
      [C1, C2]
    );
    assert.deepEqual(outcome.evaluation?.bestCells, [C1]);
    assert.ok(outcome.reason?.startsWith("truncated: "));
  });

  test("an error response is DROPPED with its reason", () => {
    const { reconciler, entries } = makeReconciler();
    const outcome = reconciler.reconcile({ kind: "error", recordId: "r2", reason: "HTTP 500" });

    assert.deepEqual(outcome, {
      recordId: "r2",
      state: ReconcileState.Dropped,
      reason: "HTTP 500",
      discardedCells: 0,
      truncated: false,
    });
    assert.ok(entries[0]?.endsWith('Dropped response {"recordId":"r2","reason":"HTTP 500"}'));
  });

  test("a response cut before the top-level fields is DROPPED", () => {
    const { reconciler } = makeReconciler();
    const outcome = reconciler.reconcile(body("r2", '{"record_id":"r2","overall_rel', true));

    assert.equal(outcome.state, ReconcileState.Dropped);
    assert.equal(outcome.evaluation, undefined);
    assert.ok(outcome.reason?.startsWith("nothing salvageable (truncated: "));
  });

  test("complete JSON with an out-of-scale cell keeps every other cell", () => {
    const { reconciler } = makeReconciler();
    const text = document("r3", [wireCell(C1, 4), wireCell(C2, 7), wireCell(C3, 5)]);
    const outcome = reconciler.reconcile(body("r3", text));

    assert.equal(outcome.state, ReconcileState.Salvaged);
    assert.equal(outcome.reason, "schema: cell_evaluations.1.relevance_score: Number must be less than or equal to 5");
    assert.deepEqual(
      outcome.evaluation?.cellEvaluations.map((c) => c.cellId),
      [C1, C3]
    );
    assert.deepEqual(outcome.evaluation?.bestCells, [C1, C3]);
    assert.equal(outcome.discardedCells, 1);
  });

  test("a bad second cell of five drops only that cell", () => {
    const { reconciler } = makeReconciler();
    const cells = [wireCell(C1, 5), wireCell(C2, 0), wireCell(C3, 4), wireCell(C4, 2), wireCell(C5, 1)];
    const outcome = reconciler.reconcile(body("r1", document("r1", cells)));

    assert.equal(outcome.state, ReconcileState.Salvaged);
    assert.deepEqual(
      outcome.evaluation?.cellEvaluations.map((c) => c.cellId),
      [C1, C3, C4, C5]
    );
    assert.equal(outcome.discardedCells, 1);
  });

  test("complete JSON with a bad top-level field is DROPPED", () => {
    const { reconciler } = makeReconciler();
    const text = JSON.stringify({
      record_id: "r2",
      overall_relevance: 9,
      depth_assessment: "Survey.",
      cell_evaluations: [wireCell(C1, 5)],
      best_cells: [C1],
      recommended: true,
    });
    const outcome = reconciler.reconcile(body("r2", text));

    assert.equal(outcome.state, ReconcileState.Dropped);
    assert.equal(outcome.reason, "nothing salvageable (schema: overall_relevance: Number must be less than or equal to 5)");
  });

  test("unrouted and duplicated cells are discarded", () => {
    const { reconciler } = makeReconciler();
    const text = document(
      "r2",
      [wireCell(C1, 5), wireCell(C3, 5), { ...wireCell(C1, 2), justification: "Second take." }],
      [C1, C3, C1]
    );
    const outcome = reconciler.reconcile(body("r2", text));

    assert.equal(outcome.state, ReconcileState.Parsed);
    assert.equal(outcome.discardedCells, 2);
    assert.deepEqual(outcome.evaluation?.cellEvaluations, [
      {
        cellId: C1,
        relevanceScore: 5,
        justification: `Covers ${C1}.`,
        suggestedAngle: `Ask about ${C1}`,
        supportsDeepAnalysis: true,
      },
    ]);
    assert.deepEqual(outcome.evaluation?.bestCells, [C1]);
  });

  test("a record outside the routing manifest is DROPPED", () => {
    const { reconciler } = makeReconciler();
    const outcome = reconciler.reconcile(body("r9", document("r9", [wireCell(C1, 5)])));
    assert.equal(outcome.state, ReconcileState.Dropped);
    assert.equal(outcome.reason, "record is not in the routing manifest");
  });

  test("without a manifest no cell is filtered", () => {
    const { reconciler } = makeReconciler({});
    const outcome = reconciler.reconcile(body("r9", document("r9", [wireCell(C1, 5), wireCell(C5, 1)])));
    assert.equal(outcome.state, ReconcileState.Parsed);
    assert.equal(outcome.evaluation?.cellEvaluations.length, 2);
  });

  test("the response record id wins over the model's", () => {
    const { reconciler, entries } = makeReconciler();
    const outcome = reconciler.reconcile(body("r2", document("r-other", [wireCell(C2, 3)])));

    assert.equal(outcome.evaluation?.recordId, "r2");
    assert.ok(
      entries.some((e) =>
        e.endsWith('Model record_id does not match response {"recordId":"r2","reported":"r-other"}')
      )
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// RUNS AND THE LEDGER
// ═══════════════════════════════════════════════════════════════════════════

describe("Reconciler.reconcileAll", () => {
  const responses: RawResponse[] = [
    body("r1", truncatedThirdCell("r1"), true),
    body("r2", document("r2", [wireCell(C1, 5), wireCell(C2, 4)])),
    { kind: "error", recordId: "r3", reason: "rate_limited: slow down" },
  ];

  test("counts every outcome and records the ledger", () => {
    const { reconciler } = makeReconciler();
    const result = reconciler.reconcileAll(responses);

    assert.deepEqual(result.counts, {
      received: 3,
      parsed: 1,
      salvaged: 1,
      dropped: 1,
      skipped: 0,
      truncated: 1,
      salvagedCells: 2,
      discardedCells: 0,
    });
    assert.deepEqual(result.ledger, { r1: "salvaged", r2: "parsed", r3: "dropped" });
    assert.deepEqual(
      result.evaluations.map((e) => e.recordId),
      ["r1", "r2"]
    );
    assert.ok(Object.isFrozen(result.ledger));
  });

  test("skips completed records and retries dropped ones", () => {
    const { reconciler } = makeReconciler();
    const ledger = Object.freeze({ r1: "salvaged", r2: "dropped" } as const);
    const result = reconciler.reconcileAll(responses, ledger);

    assert.equal(result.counts.skipped, 1);
    assert.deepEqual(
      result.outcomes.map((o) => [o.recordId, o.state]),
      [
        ["r2", ReconcileState.Parsed],
        ["r3", ReconcileState.Dropped],
      ]
    );
    assert.deepEqual(result.ledger, { r1: "salvaged", r2: "parsed", r3: "dropped" });
    assert.deepEqual(ledger, { r1: "salvaged", r2: "dropped" });
  });

  test("a later response for a completed record is skipped", () => {
    const { reconciler } = makeReconciler();
    const clean = body("r2", document("r2", [wireCell(C1, 5)]));
    const result = reconciler.reconcileAll([clean, clean]);
    assert.equal(result.counts.parsed, 1);
    assert.equal(result.counts.skipped, 1);
    assert.equal(result.evaluations.length, 1);
  });

  test("never emits a cell with an empty field", () => {
    const { reconciler } = makeReconciler();
    const { evaluations } = reconciler.reconcileAll(responses);
    for (const evaluation of evaluations) {
      for (const cell of evaluation.cellEvaluations) {
        assert.ok(cell.cellId && cell.justification && cell.suggestedAngle);
        assert.ok(Number.isInteger(cell.relevanceScore));
        assert.equal(typeof cell.supportsDeepAnalysis, "boolean");
      }
    }
  });

  test("is deterministic", () => {
    const first = makeReconciler().reconciler.reconcileAll(responses);
    const second = makeReconciler().reconciler.reconcileAll(responses);
    assert.equal(JSON.stringify(first), JSON.stringify(second));
  });
});
