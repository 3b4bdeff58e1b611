/**
 * Conditional block parsing, validation, and evaluation.
 *
 * Extends the prompt template syntax with `{{#if …}}…{{/if}}` blocks
 * that include or exclude content based on context values.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUPPORTED SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   BOOLEAN (truthy) check: include block when value is non-empty/non-UNSET:
 *
 *     {{#if record.subjects}}
 *     Subjects: {{record.subjects}}
 *     {{/if}}
 *
 *   EQUALITY check: include block when value matches a literal:
 *
 *     {{#if record.textSource == "limited"}}
 *     Limited metadata available. Score conservatively.
 *     {{/if}}
 *
 *   INEQUALITY check: include block when value does NOT match:
 *
 *     {{#if record.textSource != "abstract"}}
 *     The abstract below was not supplied by the catalog.
 *     {{/if}}
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSTRAINTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - No nesting: `{{#if}}` blocks cannot contain other `{{#if}}` blocks
 *   - No `{{#else}}`: use a separate `{{#if}}` with `!=` instead
 *   - No arbitrary expressions: only variable references and string literals
 *   - Variable names validated at parse time against PromptContextMap
 *   - Enum values validated at parse time for variables with known enum sets
 *   - UNSET variables evaluate to false for truthy, never match for equality
 */

import type { PromptContext, PromptVariable } from "./context.js";
import { isUnset } from "./context.js";
import { TEXT_SOURCES } from "../requests/text-context.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Supported conditional operators. */
export type ConditionalOperator = "==" | "!=" | "truthy";

/**
 * A parsed conditional block from a template.
 */
export interface ConditionalBlock {
  /** The context variable being tested. */
  variable: PromptVariable;
  /** The comparison operator. */
  operator: ConditionalOperator;
  /** The literal value for == / != comparisons (undefined for truthy). */
  value?: string;
  /** The body text inside the block (may contain {{var}} placeholders). */
  body: string;
  /** The full raw text of the block including opening/closing tags. */
  raw: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`
    );
    this.name = "ConditionalParseError";
  }
}

// ---------------------------------------------------------------------------
// Enum validation map
// ---------------------------------------------------------------------------

/**
 * Variables with constrained enum values.
 *
 * When a conditional uses `==` or `!=` with one of these variables, the
 * comparison value is validated at parse time against this set.
 * Variables NOT in this map accept any string comparison.
 */
const ENUM_VALUES: Partial<Record<PromptVariable, ReadonlySet<string>>> = {
  "record.textSource": new Set<string>(TEXT_SOURCES),
};

/**
 * Check whether a variable has a known enum value set.
 */
export function getEnumValues(variable: PromptVariable): ReadonlySet<string> | undefined {
  return ENUM_VALUES[variable];
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{#if variable}}`, `{{#if variable == "value"}}`, or
 * `{{#if variable != "value"}}` followed by body and `{{/if}}`.
 *
 * Groups:
 *   1: variable name
 *   2: operator (== or !=), optional
 *   3: comparison value (inside quotes), optional
 *   4: body content
 */
const CONDITIONAL_RE =
  /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

/**
 * Detects nested conditionals (invalid).
 */
const NESTED_IF_RE = /\{\{#if\s/;

function toOperator(operator: string | undefined): ConditionalOperator {
  return operator === "==" || operator === "!=" ? operator : "truthy";
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Extract all conditional blocks from a template source string.
 *
 * @param source       - The raw template text
 * @param templateName - Template name for error messages
 * @param isValidVar   - Variable name validator function
 * @throws ConditionalParseError if blocks reference invalid variables or enum values
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string,
  isValidVar: (name: string) => name is PromptVariable
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  for (const match of source.matchAll(CONDITIONAL_RE)) {
    const [raw, variable = "", operator, value, body = ""] = match;

    // 1. Validate variable name
    if (!isValidVar(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }

    // 2. Check for nested conditionals
    if (NESTED_IF_RE.test(body)) {
      issues.push(
        `Nested conditionals are not supported (found {{#if inside {{#if ${variable}…}})`
      );
      continue;
    }

    // 3. Validate enum value for == / != checks
    const op = toOperator(operator);

    if (op !== "truthy" && value !== undefined) {
      const enumSet = ENUM_VALUES[variable];
      if (enumSet && !enumSet.has(value)) {
        const allowed = [...enumSet].sort().join(", ");
        issues.push(
          `Invalid value "${value}" for "${variable}" (allowed: ${allowed})`
        );
        continue;
      }
    }

    blocks.push({
      variable,
      operator: op,
      value: op !== "truthy" ? value : undefined,
      body,
      raw,
    });
  }

  // Check for unmatched {{#if}} or {{/if}} tags
  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(/\{\{\/if\}\}/g) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  }

  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }

  return blocks;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a single conditional block against a context value.
 *
 * Rules:
 *   - UNSET values → false for truthy, false for ==, true for !=
 *   - Empty string → false for truthy
 *   - ==: exact string match
 *   - !=: not an exact string match
 */
export function evaluateCondition(
  block: Pick<ConditionalBlock, "operator" | "value">,
  contextValue: string
): boolean {
  const unset = isUnset(contextValue);

  switch (block.operator) {
    case "truthy":
      return !unset && contextValue !== "";

    case "==":
      return !unset && contextValue === block.value;

    case "!=":
      return unset || contextValue !== block.value;
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve all conditional blocks in a template source string.
 *
 * Each `{{#if …}}…{{/if}}` block is replaced with its body when the
 * condition holds, or removed otherwise.
 */
export function resolveConditionals(
  source: string,
  context: PromptContext,
  isValidVar: (name: string) => name is PromptVariable
): string {
  return source.replace(
    CONDITIONAL_RE,
    (_match, variable: string, op: string | undefined, value: string | undefined, body: string) => {
      const operator = toOperator(op);
      const contextValue = isValidVar(variable) ? context[variable] : "";
      return evaluateCondition({ operator, value }, contextValue) ? body : "";
    }
  );
}
