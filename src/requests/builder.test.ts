/**
 * Request builder tests.
 *
 * Run: node --import tsx --test src/requests/builder.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";
import { z } from "zod";

import { RequestBuilder, RECORD_EVALUATION_SCHEMA } from "./index.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/defaults.js";
import { applyEnvOverrides } from "../config/pipeline/loader.js";
import { createLogger } from "../logging/logger.js";
import type { MatrixCell } from "../matrix/schema.js";
import type { SourceRecord } from "../catalog/schema.js";
import type { RoutedRecord } from "../routing/router.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function cell(cellId: string, topic: MatrixCell["topic"], tier: MatrixCell["tier"]): MatrixCell {
  return {
    questionNumber: 1,
    cellId,
    category: "CO",
    topic,
    tier,
    stratum: "A",
    topicFocus: `Focus for ${cellId}`,
  };
}

const CO_CELLS = [
  cell("CMM-CO-TPM-L2-002", "T-PM", "L2"),
  cell("CMM-CO-QTF-L1-003", "Q-TF", "L1"),
];

function routed(recordId: string, overrides: Partial<SourceRecord> = {}): RoutedRecord {
  return {
    record: {
      recordId,
      categoryTag: "CO",
      title: `Cobalt study ${recordId}`,
      abstract: "Cobalt refining capacity.",
      authors: ["Doe, J."],
      subjects: ["cobalt"],
      ...overrides,
    },
    cells: CO_CELLS,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLE REQUEST
// ═══════════════════════════════════════════════════════════════════════════

describe("RequestBuilder.build", () => {
  const builder = new RequestBuilder(DEFAULT_PIPELINE_CONFIG);

  test("carries the generation settings and cell order", () => {
    const request = builder.build(routed("7001"));
    assert.equal(request.recordId, "7001");
    assert.equal(request.model, "gpt-4o-mini");
    assert.equal(request.temperature, 0.2);
    assert.equal(request.maxOutputTokens, 4096);
    assert.deepEqual(request.cellIds, ["CMM-CO-TPM-L2-002", "CMM-CO-QTF-L1-003"]);
    assert.equal(request.textSource, "abstract");
    assert.deepEqual(request.responseSchema, RECORD_EVALUATION_SCHEMA);
    assert.ok(Object.isFrozen(request));
  });

  test("renders the system instruction with the scoring scale", () => {
    const request = builder.build(routed("7001"));
    assert.ok(request.systemInstruction.includes("Scoring guide (relevance_score 1-5):"));
    assert.ok(!request.systemInstruction.includes("{{"));
  });

  test("renders the record and its cells into the prompt", () => {
    const request = builder.build(routed("7001"));
    assert.ok(request.prompt.includes("- Record ID: 7001\n"));
    assert.ok(request.prompt.includes("- Category: Commodity: Cobalt (CO)\n"));
    assert.ok(request.prompt.includes("- Publication Date: Unknown\n"));
    assert.ok(request.prompt.includes("**Evaluate against these 2 matrix cells:**"));
    assert.ok(request.prompt.includes("2. Cell CMM-CO-QTF-L1-003\n   Subdomain: Trade Flows (Q-TF)\n"));
    assert.ok(request.prompt.endsWith('Use "7001" as record_id.\n'));
  });

  test("describes the response fields on the configured scale", () => {
    const config = {
      ...DEFAULT_PIPELINE_CONFIG,
      scoring: { ...DEFAULT_PIPELINE_CONFIG.scoring, scaleMin: 0, scaleMax: 10, recommendThreshold: 7 },
    };
    const request = new RequestBuilder(config).build(routed("7001"));
    const described = z.object({ description: z.string() });
    const schema = z
      .object({
        properties: z.object({
          overall_relevance: described,
          best_cells: described,
          cell_evaluations: z.object({
            items: z.object({ properties: z.object({ relevance_score: described }) }),
          }),
        }),
      })
      .parse(request.responseSchema);

    assert.equal(
      schema.properties.overall_relevance.description,
      "0-10 scale: 0 = no relevance, 10 = highly relevant with deep content"
    );
    assert.equal(
      schema.properties.cell_evaluations.items.properties.relevance_score.description,
      "0-10: how well this document supports a gold Q&A for this cell"
    );
    assert.equal(schema.properties.best_cells.description, "Cell ids scored 7 or higher");
    assert.ok(request.systemInstruction.includes("Scoring guide (relevance_score 0-10):"));
  });

  test("passes a configured output cap through unchanged", () => {
    const config = applyEnvOverrides(DEFAULT_PIPELINE_CONFIG, { batchMaxOutputTokens: 1024 });
    const request = new RequestBuilder(config).build(routed("7001"));
    assert.equal(request.maxOutputTokens, 1024);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BATCH
// ═══════════════════════════════════════════════════════════════════════════

describe("RequestBuilder.buildAll", () => {
  test("builds one request per record and counts text sources", () => {
    const entries: string[] = [];
    const logger = createLogger({ console: false, file: false, sink: (e) => entries.push(e) });
    const builder = new RequestBuilder(DEFAULT_PIPELINE_CONFIG, { logger });

    const { requests, stats } = builder.buildAll([
      routed("1"),
      routed("2", { abstract: "", auxiliaryText: "Recovered body text." }),
      routed("3", { abstract: "", categoryTag: "subdomain_T-PM" }),
    ]);

    assert.deepEqual(
      requests.map((r) => [r.recordId, r.textSource]),
      [
        ["1", "abstract"],
        ["2", "excerpt"],
        ["3", "limited"],
      ]
    );
    assert.deepEqual(stats, {
      requests: 3,
      withAbstract: 1,
      excerptFallback: 1,
      limitedMetadata: 1,
      cellsRequested: 6,
      requestsByTag: { CO: 2, "subdomain_T-PM": 1 },
    });
    assert.ok(requests[2]?.prompt.includes(DEFAULT_PIPELINE_CONFIG.textContext.limitedMetadataSentinel));
    assert.equal(entries.length, 1);
    assert.ok(entries[0]?.includes("] Requests built {\"requests\":3,"));
  });

  test("an empty input builds nothing", () => {
    const { requests, stats } = new RequestBuilder(DEFAULT_PIPELINE_CONFIG).buildAll([]);
    assert.equal(requests.length, 0);
    assert.equal(stats.cellsRequested, 0);
  });
});
