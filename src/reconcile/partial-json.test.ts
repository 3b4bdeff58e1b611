/**
 * Partial JSON parser tests.
 *
 * Run: node --import tsx --test src/reconcile/partial-json.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { parsePartialJson, getEntry, toPlainValue } from "./partial-json.js";

describe("parsePartialJson", () => {
  test("parses a complete document", () => {
    const text = '{"a": [1, {"b": null}], "c": "d", "e": false}';
    const { root, stop } = parsePartialJson(text);
    assert.equal(stop, "end");
    assert.equal(root?.complete, true);
    assert.deepEqual(root && toPlainValue(root), JSON.parse(text));
  });

  test("keeps open containers and drops the cut-off scalar", () => {
    const result = parsePartialJson('{"a": 1, "b": [true, {"c": "x');
    assert.equal(result.stop, "incomplete");
    assert.equal(result.stoppedAt, 27);
    assert.deepEqual(result.root, {
      kind: "object",
      complete: false,
      entries: [
        { key: "a", value: { kind: "number", value: 1, complete: true } },
        {
          key: "b",
          value: {
            kind: "array",
            complete: false,
            items: [
              { kind: "boolean", value: true, complete: true },
              { kind: "object", entries: [], complete: false },
            ],
          },
        },
      ],
    });
  });

  test("a trailing number is not materialized", () => {
    const { root, stop } = parsePartialJson('{"score": 4');
    assert.equal(stop, "incomplete");
    assert.deepEqual(root, { kind: "object", entries: [], complete: false });
  });

  test("a key without its value is not materialized", () => {
    assert.deepEqual(parsePartialJson('{"a"').root, { kind: "object", entries: [], complete: false });
    assert.deepEqual(parsePartialJson('{"a":').root, { kind: "object", entries: [], complete: false });
  });

  test("stops at a missing separator", () => {
    const { root, stop } = parsePartialJson('{"a": 1 "b": 2}');
    assert.equal(stop, "invalid");
    assert.equal(root?.complete, false);
    assert.equal(root && getEntry(root, "b"), undefined);
  });

  test("rejects a trailing comma", () => {
    const { root, stop } = parsePartialJson("[1,]");
    assert.equal(stop, "invalid");
    assert.deepEqual(root, {
      kind: "array",
      items: [{ kind: "number", value: 1, complete: true }],
      complete: false,
    });
  });

  test("flags trailing content after a closed root", () => {
    const { root, stop } = parsePartialJson('{"a":1} x');
    assert.equal(stop, "invalid");
    assert.equal(root?.complete, true);
    assert.equal(parsePartialJson('{"a":1}  \n').stop, "end");
  });

  test("empty input has no root", () => {
    assert.deepEqual(parsePartialJson(""), { root: undefined, stop: "incomplete", stoppedAt: 0 });
  });
});

describe("helpers", () => {
  test("getEntry returns the last duplicate", () => {
    const { root } = parsePartialJson('{"k": 1, "k": 2}');
    assert.ok(root);
    assert.deepEqual(getEntry(root, "k"), { kind: "number", value: 2, complete: true });
    assert.equal(getEntry(root, "missing"), undefined);
  });

  test("toPlainValue refuses incomplete subtrees", () => {
    const { root } = parsePartialJson('{"a": [1, 2');
    assert.ok(root);
    assert.equal(toPlainValue(root), undefined);
    const a = getEntry(root, "a");
    assert.ok(a);
    assert.equal(toPlainValue(a), undefined);
  });
});
