/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is a plain-text string (typically loaded from a .md or
 * .txt file) containing `{{variable.path}}` placeholders and optional
 * `{{#if …}}…{{/if}}` conditional blocks.  This module extracts those
 * constructs and validates them against the typed PromptContextMap so that
 * invalid variable references are caught before rendering.
 *
 * TEMPLATE FORMAT:
 *
 *   VARIABLE SUBSTITUTION:
 *     {{record.title}}           : simple variable substitution
 *     {{ record.cellList }}      : inner whitespace is trimmed
 *
 *   CONDITIONAL BLOCKS:
 *     {{#if record.textSource == "limited"}}
 *     Score conservatively.
 *     {{/if}}
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are dotted alphanumeric paths
 *   - Unrecognized variable names are rejected at validation time
 *   - Duplicate placeholders in a template are fine (same value rendered)
 *   - Conditional variables are validated for name and (where applicable)
 *     enum value correctness at parse time
 *   - No nested conditionals
 */

import type { PromptVariable } from "./context.js";
import {
  parseConditionalBlocks,
  type ConditionalBlock,
} from "./conditional.js";

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

// ---------------------------------------------------------------------------
// Parsed template
// ---------------------------------------------------------------------------

/**
 * A parsed and validated prompt template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: PromptVariable[];
  /** Parsed conditional blocks ({{#if …}}…{{/if}}). */
  conditionals: ConditionalBlock[];
  /** Optional name/id for error messages. */
  name?: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

// ---------------------------------------------------------------------------
// All valid variable names (derived from the PromptContextMap interface)
// ---------------------------------------------------------------------------

/**
 * Complete set of legal variable names.
 *
 * This list MUST stay in sync with PromptContextMap in context.ts.
 * It is the single runtime source of truth for validation.
 */
const VALID_VARIABLES: ReadonlySet<PromptVariable> = new Set<PromptVariable>([
  // Record metadata
  "record.id",
  "record.title",
  "record.authors",
  "record.publicationDate",
  "record.categoryLabel",
  "record.subjects",
  // Text context
  "record.textContext",
  "record.textSource",
  // Routed cells
  "record.cellCount",
  "record.cellList",
  // Scoring
  "evaluation.scaleMin",
  "evaluation.scaleMax",
  "evaluation.recommendThreshold",
]);

/**
 * Check whether a string is a valid prompt variable name.
 */
export function isValidVariable(name: string): name is PromptVariable {
  return [...VALID_VARIABLES].some((variable) => variable === name);
}

/**
 * Return all valid variable names (sorted).
 */
export function getValidVariables(): PromptVariable[] {
  return [...VALID_VARIABLES].sort();
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    const name = match[1];
    if (name !== undefined) {
      found.add(name);
    }
  }
  return [...found].sort();
}

// ---------------------------------------------------------------------------
// Parsing + validation
// ---------------------------------------------------------------------------

/**
 * Parse a template string, extracting and validating all variables
 * and conditional blocks.
 *
 * @param source - The raw template text
 * @param name   - Optional template name for error messages
 * @throws TemplateParseError      if any {{variable}} name is invalid
 * @throws ConditionalParseError   if any conditional references invalid vars/enums
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  // 1. Parse conditional blocks (validates variable names + enum values)
  const conditionals = parseConditionalBlocks(
    source,
    name ?? "(anonymous)",
    isValidVariable
  );

  // 2. Extract {{variable}} placeholders
  const rawVariables = extractVariables(source);
  const invalid = rawVariables.filter((v) => !isValidVariable(v));

  if (invalid.length > 0) {
    throw new TemplateParseError(name ?? "(anonymous)", invalid);
  }

  return {
    source,
    variables: rawVariables.filter(isValidVariable),
    conditionals,
    name,
  };
}
