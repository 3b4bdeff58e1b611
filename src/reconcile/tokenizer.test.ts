/**
 * JSON tokenizer tests.
 *
 * Run: node --import tsx --test src/reconcile/tokenizer.test.ts
 */

import { describe, test } from "node:test";
import { strict as assert } from "node:assert";

import { JsonTokenizer, type JsonToken } from "./tokenizer.js";

function describeToken(token: JsonToken): string {
  switch (token.type) {
    case "punct":
      return token.value;
    case "string":
      return JSON.stringify(token.value);
    case "number":
    case "literal":
      return String(token.value);
    default:
      return token.type;
  }
}

/** Every token up to and including the first end/incomplete/invalid */
function tokenize(text: string): string[] {
  const tokenizer = new JsonTokenizer(text);
  const out: string[] = [];
  for (;;) {
    const token = tokenizer.next();
    out.push(describeToken(token));
    if (token.type === "end" || token.type === "incomplete" || token.type === "invalid") {
      return out;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// COMPLETE INPUT
// ═══════════════════════════════════════════════════════════════════════════

describe("complete input", () => {
  test("produces every token kind", () => {
    assert.deepEqual(tokenize('{"a": [1, -2.5e3, true, null], "b": "x\\"y"}'), [
      "{", '"a"', ":", "[", "1", ",", "-2500", ",", "true", ",", "null", "]", ",",
      '"b"', ":", '"x\\"y"', "}", "end",
    ]);
  });

  test("decodes escapes", () => {
    assert.deepEqual(tokenize('"caf\\u00e9\\n" '), ['"café\\n"', "end"]);
  });

  test("skips surrounding whitespace", () => {
    assert.deepEqual(tokenize(" \n\t false \r\n"), ["false", "end"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// TRUNCATED INPUT
// ═══════════════════════════════════════════════════════════════════════════

describe("input ending inside a token", () => {
  test("an unterminated string is incomplete", () => {
    assert.deepEqual(tokenize('["abc'), ["[", "incomplete"]);
  });

  test("a string ending in an escape is incomplete", () => {
    assert.deepEqual(tokenize('"ab\\'), ["incomplete"]);
    assert.deepEqual(tokenize('"ab\\u00'), ["incomplete"]);
  });

  test("a number at end of input is incomplete", () => {
    assert.deepEqual(tokenize("12"), ["incomplete"]);
    assert.deepEqual(tokenize("[4"), ["[", "incomplete"]);
    assert.deepEqual(tokenize("1."), ["incomplete"]);
    assert.deepEqual(tokenize("-"), ["incomplete"]);
    assert.deepEqual(tokenize("2e"), ["incomplete"]);
  });

  test("a number followed by anything is complete", () => {
    assert.deepEqual(tokenize("12 "), ["12", "end"]);
    assert.deepEqual(tokenize("4}"), ["4", "}", "end"]);
  });

  test("a literal prefix is incomplete", () => {
    assert.deepEqual(tokenize("tru"), ["incomplete"]);
    assert.deepEqual(tokenize("nul"), ["incomplete"]);
    assert.deepEqual(tokenize("f"), ["incomplete"]);
  });

  test("stays halted", () => {
    const tokenizer = new JsonTokenizer('"open');
    assert.equal(tokenizer.next().type, "incomplete");
    assert.equal(tokenizer.next().type, "incomplete");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// INVALID INPUT
// ═══════════════════════════════════════════════════════════════════════════

describe("invalid input", () => {
  test("rejects unexpected characters", () => {
    assert.deepEqual(tokenize("[@]"), ["[", "invalid"]);
    assert.deepEqual(tokenize("tx"), ["invalid"]);
    assert.deepEqual(tokenize("-x"), ["invalid"]);
  });

  test("rejects raw control characters in strings", () => {
    assert.deepEqual(tokenize('"a\nb"'), ["invalid"]);
  });

  test("rejects unknown escapes", () => {
    assert.deepEqual(tokenize('"\\x"'), ["invalid"]);
  });

  test("reports where it stopped", () => {
    const tokenizer = new JsonTokenizer('{"a": ?');
    tokenizer.next();
    tokenizer.next();
    tokenizer.next();
    const token = tokenizer.next();
    assert.deepEqual(token, { type: "invalid", start: 6 });
  });
});
