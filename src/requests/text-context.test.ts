/**
 * Text context tests.
 *
 * Run: node --import tsx --test src/requests/text-context.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { resolveTextContext, excerptText } from "./text-context.js";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/defaults.js";

const settings = DEFAULT_PIPELINE_CONFIG.textContext;

describe("resolveTextContext", () => {
  test("prefers the abstract", () => {
    const result = resolveTextContext(
      { abstract: "  Yield data for cobalt refining.  ", auxiliaryText: "Ignored." },
      settings
    );
    assert.deepEqual(result, { text: "Yield data for cobalt refining.", source: "abstract" });
  });

  test("falls back to auxiliary text", () => {
    const result = resolveTextContext({ abstract: " ", auxiliaryText: "Short text. More" }, settings);
    assert.deepEqual(result, { text: "Short text. More", source: "excerpt" });
  });

  test("falls back to the sentinel", () => {
    const result = resolveTextContext({ abstract: "", auxiliaryText: "   " }, settings);
    assert.deepEqual(result, { text: settings.limitedMetadataSentinel, source: "limited" });
  });

  test("is idempotent", () => {
    const record = { abstract: "", auxiliaryText: "A".repeat(300) + ". " + "B".repeat(400) };
    assert.deepEqual(resolveTextContext(record, settings), resolveTextContext(record, settings));
  });
});

describe("excerptText", () => {
  test("cuts at the last period beyond the boundary", () => {
    const text = "A".repeat(300) + "." + "B".repeat(400);
    assert.equal(excerptText(text, settings), "A".repeat(300) + ".");
  });

  test("keeps the full window when the period is too early", () => {
    const text = "A".repeat(150) + "." + "B".repeat(600);
    const excerpt = excerptText(text, settings);
    assert.equal(excerpt.length, 600);
    assert.equal(excerpt, "A".repeat(150) + "." + "B".repeat(449));
  });

  test("a period exactly at the boundary does not cut", () => {
    const text = "A".repeat(200) + "." + "B".repeat(600);
    assert.equal(excerptText(text, settings).length, 600);
  });

  test("ignores periods past the window", () => {
    const text = "A".repeat(250) + "." + "B".repeat(400) + ".";
    assert.equal(excerptText(text, settings), "A".repeat(250) + ".");
  });

  test("leaves short text without a period alone", () => {
    assert.equal(excerptText("no sentence end", settings), "no sentence end");
  });
});
