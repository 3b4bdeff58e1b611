/**
 * Partial JSON parser.
 *
 * Builds a value tree from text that may stop at any point. Containers
 * record whether their closing token was observed; scalars only appear in
 * the tree once fully read, so a cut-off string or number is never
 * materialized. Parsing halts at the first incomplete or invalid token and
 * every open container on the path to it stays `complete: false`.
 *
 *   {"a": 1, "b": [true, {"c": "x"   →   object(incomplete)
 *                                           a: 1
 *                                           b: array(incomplete)
 *                                                true
 *                                                object(incomplete)  (c dropped)
 */

import { JsonTokenizer, type JsonToken } from "./tokenizer.js";

export interface PartialEntry {
  readonly key: string;
  readonly value: PartialValue;
}

export type PartialValue =
  | { readonly kind: "object"; readonly entries: readonly PartialEntry[]; readonly complete: boolean }
  | { readonly kind: "array"; readonly items: readonly PartialValue[]; readonly complete: boolean }
  | { readonly kind: "string"; readonly value: string; readonly complete: true }
  | { readonly kind: "number"; readonly value: number; readonly complete: true }
  | { readonly kind: "boolean"; readonly value: boolean; readonly complete: true }
  | { readonly kind: "null"; readonly complete: true };

/**
 * Why parsing stopped. `end` means the root value closed and nothing but
 * whitespace followed.
 */
export type StopReason = "end" | "incomplete" | "invalid";

export interface PartialParseResult {
  /** Undefined when the input holds no complete scalar and no container start */
  readonly root?: PartialValue;
  readonly stop: StopReason;
  /** Offset of the token parsing stopped at */
  readonly stoppedAt: number;
}

class PartialParser {
  private readonly tokens: JsonTokenizer;
  private stop: StopReason | undefined;
  private stoppedAt = 0;

  constructor(text: string) {
    this.tokens = new JsonTokenizer(text);
  }

  parse(): PartialParseResult {
    const root = this.parseValue(this.tokens.next());

    if (this.stop === undefined) {
      const trailing = this.tokens.next();
      this.halt(trailing.type === "end" ? "end" : "invalid", trailing);
    }

    return { root, stop: this.stop ?? "end", stoppedAt: this.stoppedAt };
  }

  private halt(reason: StopReason, token: JsonToken): void {
    if (this.stop === undefined) {
      this.stop = reason;
      this.stoppedAt = token.start;
    }
  }

  /** Halt on a token that cannot continue the document */
  private haltOn(token: JsonToken): void {
    this.halt(token.type === "incomplete" || token.type === "end" ? "incomplete" : "invalid", token);
  }

  private parseValue(token: JsonToken): PartialValue | undefined {
    switch (token.type) {
      case "string":
        return { kind: "string", value: token.value, complete: true };
      case "number":
        return { kind: "number", value: token.value, complete: true };
      case "literal":
        return token.value === null
          ? { kind: "null", complete: true }
          : { kind: "boolean", value: token.value, complete: true };
      case "punct":
        if (token.value === "{") return this.parseObject();
        if (token.value === "[") return this.parseArray();
        this.haltOn(token);
        return undefined;
      default:
        this.haltOn(token);
        return undefined;
    }
  }

  private parseObject(): PartialValue {
    const entries: PartialEntry[] = [];
    const incomplete = (): PartialValue => ({ kind: "object", entries, complete: false });

    let token = this.tokens.next();
    if (token.type === "punct" && token.value === "}") {
      return { kind: "object", entries, complete: true };
    }

    for (;;) {
      if (token.type !== "string") {
        this.haltOn(token);
        return incomplete();
      }
      const key = token.value;

      const colon = this.tokens.next();
      if (colon.type !== "punct" || colon.value !== ":") {
        this.haltOn(colon);
        return incomplete();
      }

      const value = this.parseValue(this.tokens.next());
      if (value === undefined) {
        return incomplete();
      }
      entries.push({ key, value });
      if (!value.complete) {
        return incomplete();
      }

      const separator = this.tokens.next();
      if (separator.type === "punct" && separator.value === "}") {
        return { kind: "object", entries, complete: true };
      }
      if (separator.type !== "punct" || separator.value !== ",") {
        this.haltOn(separator);
        return incomplete();
      }
      token = this.tokens.next();
    }
  }

  private parseArray(): PartialValue {
    const items: PartialValue[] = [];
    const incomplete = (): PartialValue => ({ kind: "array", items, complete: false });

    let token = this.tokens.next();
    if (token.type === "punct" && token.value === "]") {
      return { kind: "array", items, complete: true };
    }

    for (;;) {
      const value = this.parseValue(token);
      if (value === undefined) {
        return incomplete();
      }
      items.push(value);
      if (!value.complete) {
        return incomplete();
      }

      const separator = this.tokens.next();
      if (separator.type === "punct" && separator.value === "]") {
        return { kind: "array", items, complete: true };
      }
      if (separator.type !== "punct" || separator.value !== ",") {
        this.haltOn(separator);
        return incomplete();
      }
      token = this.tokens.next();
    }
  }
}

export function parsePartialJson(text: string): PartialParseResult {
  return new PartialParser(text).parse();
}

/**
 * Last entry for `key`, matching JSON.parse on duplicate keys.
 */
export function getEntry(value: PartialValue, key: string): PartialValue | undefined {
  if (value.kind !== "object") return undefined;
  let found: PartialValue | undefined;
  for (const entry of value.entries) {
    if (entry.key === key) found = entry.value;
  }
  return found;
}

/**
 * Plain JavaScript value of a complete subtree; undefined if any part of it
 * is incomplete.
 */
export function toPlainValue(value: PartialValue): unknown {
  switch (value.kind) {
    case "string":
    case "number":
    case "boolean":
      return value.value;
    case "null":
      return null;
    case "array": {
      if (!value.complete) return undefined;
      const items: unknown[] = [];
      for (const item of value.items) {
        const plain = toPlainValue(item);
        if (plain === undefined) return undefined;
        items.push(plain);
      }
      return items;
    }
    case "object": {
      if (!value.complete) return undefined;
      const entries: Array<[string, unknown]> = [];
      for (const entry of value.entries) {
        const plain = toPlainValue(entry.value);
        if (plain === undefined) return undefined;
        entries.push([entry.key, plain]);
      }
      return Object.fromEntries(entries);
    }
  }
}
