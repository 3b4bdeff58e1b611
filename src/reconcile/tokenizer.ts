/**
 * JSON tokenizer that tolerates input cut off at any byte.
 *
 * Tokens are produced one at a time. When the input ends inside a token
 * (an unterminated string, a literal prefix such as `tr`, or a number that
 * could still continue) the tokenizer reports `incomplete` instead of
 * guessing. An unexpected character is reported as `invalid`. Both are
 * final: every later call returns the same token.
 */

export type Punctuation = "{" | "}" | "[" | "]" | ":" | ",";

export type JsonToken =
  | { type: "punct"; value: Punctuation; start: number }
  | { type: "string"; value: string; start: number }
  | { type: "number"; value: number; start: number }
  | { type: "literal"; value: boolean | null; start: number }
  | { type: "end"; start: number }
  | { type: "incomplete"; start: number }
  | { type: "invalid"; start: number };

const PUNCTUATION = new Set<string>(["{", "}", "[", "]", ":", ","]);

const LITERALS: ReadonlyArray<readonly [string, boolean | null]> = [
  ["true", true],
  ["false", false],
  ["null", null],
];

/** A complete JSON number */
const NUMBER_RE = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/** Input from here to the end could be the start of a number */
const NUMBER_PREFIX_RE = /-?(?:0|[1-9]\d*)?(?:\.\d*)?(?:[eE][+-]?\d*)?$/y;

function isPunctuation(char: string): char is Punctuation {
  return PUNCTUATION.has(char);
}

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r";
}

export class JsonTokenizer {
  private readonly text: string;
  private pos = 0;
  private halted: JsonToken | undefined;

  constructor(text: string) {
    this.text = text;
  }

  /** Offset of the next unread character */
  get position(): number {
    return this.pos;
  }

  next(): JsonToken {
    if (this.halted) return this.halted;

    while (this.pos < this.text.length && isWhitespace(this.text.charAt(this.pos))) {
      this.pos++;
    }

    const start = this.pos;
    if (start >= this.text.length) {
      return { type: "end", start };
    }

    const char = this.text.charAt(start);
    let token: JsonToken;

    if (isPunctuation(char)) {
      this.pos++;
      token = { type: "punct", value: char, start };
    } else if (char === '"') {
      token = this.readString(start);
    } else if (char === "-" || (char >= "0" && char <= "9")) {
      token = this.readNumber(start);
    } else {
      token = this.readLiteral(start);
    }

    if (token.type === "incomplete" || token.type === "invalid") {
      this.halted = token;
    }
    return token;
  }

  private readString(start: number): JsonToken {
    let i = start + 1;
    while (i < this.text.length) {
      const code = this.text.charCodeAt(i);
      if (code === 0x22) {
        // closing quote
        const raw = this.text.slice(start, i + 1);
        try {
          const value: unknown = JSON.parse(raw);
          if (typeof value !== "string") return { type: "invalid", start };
          this.pos = i + 1;
          return { type: "string", value, start };
        } catch {
          return { type: "invalid", start };
        }
      }
      if (code === 0x5c) {
        // backslash: skip the escaped character (and \uXXXX digits)
        const escaped = this.text.charAt(i + 1);
        i += escaped === "u" ? 6 : 2;
        continue;
      }
      if (code < 0x20) {
        return { type: "invalid", start };
      }
      i++;
    }
    return { type: "incomplete", start };
  }

  private readNumber(start: number): JsonToken {
    NUMBER_PREFIX_RE.lastIndex = start;
    if (NUMBER_PREFIX_RE.test(this.text)) {
      return { type: "incomplete", start };
    }

    NUMBER_RE.lastIndex = start;
    const match = NUMBER_RE.exec(this.text);
    if (!match) {
      return { type: "invalid", start };
    }
    this.pos = start + match[0].length;
    return { type: "number", value: Number(match[0]), start };
  }

  private readLiteral(start: number): JsonToken {
    for (const [word, value] of LITERALS) {
      if (this.text.startsWith(word, start)) {
        this.pos = start + word.length;
        return { type: "literal", value, start };
      }
      if (this.text.length - start < word.length && word.startsWith(this.text.slice(start))) {
        return { type: "incomplete", start };
      }
    }
    return { type: "invalid", start };
  }
}
