/**
 * Typed prompt context.
 *
 * Defines the strongly-typed context object that templates are rendered against.
 * Every valid `{{path.to.value}}` placeholder in a prompt template maps to a
 * concrete path in this context tree. Invalid paths produce compile-time errors
 * when building the context, and runtime errors when rendering.
 *
 * DESIGN:
 *
 * The context is a *flat namespace of dotted paths* backed by the real domain
 * objects. Template authors see display-ready strings, not raw records:
 *
 *   record.authors        → first five authors, "; "-joined, "(and N more)"
 *   record.categoryLabel  → "Commodity: Lithium (LI)" or "Subdomain: Trade Flows (Q-TF)"
 *   record.cellList       → numbered cell blocks (id, subdomain, tier, focus)
 *   evaluation.scaleMax   → scoring.scaleMax
 *
 * Adding a new variable requires exactly two changes:
 *   1. Add the key to PromptContextMap (and VALID_VARIABLES in template.ts)
 *   2. Add the extraction in buildPromptContext()
 */

import type { SourceRecord } from "../catalog/schema.js";
import type { MatrixCell } from "../matrix/schema.js";
import type { ScoringSettings } from "../config/pipeline/schema.js";
import type { TextContext } from "../requests/text-context.js";
import {
  COMMODITY_DISPLAY,
  SUBDOMAIN_DISPLAY,
  COMPLEXITY_DISPLAY,
  CommodityCode,
  SubdomainCode,
} from "../config/pipeline/enums.js";

// ---------------------------------------------------------------------------
// Context map: every legal template variable and its string type
// ---------------------------------------------------------------------------

/**
 * Exhaustive map of every variable available inside prompt templates.
 *
 * Keys are dotted paths exactly as they appear in `{{…}}` placeholders.
 * Values are always strings (template rendering is text-to-text).
 */
export interface PromptContextMap {
  // ── Record metadata ────────────────────────────────────────
  "record.id": string;
  "record.title": string;
  "record.authors": string;
  "record.publicationDate": string;
  "record.categoryLabel": string;
  "record.subjects": string;

  // ── Text context ───────────────────────────────────────────
  "record.textContext": string;
  "record.textSource": string;

  // ── Routed cells ───────────────────────────────────────────
  "record.cellCount": string;
  "record.cellList": string;

  // ── Scoring scale ──────────────────────────────────────────
  "evaluation.scaleMin": string;
  "evaluation.scaleMax": string;
  "evaluation.recommendThreshold": string;
}

/** A legal prompt variable name. */
export type PromptVariable = keyof PromptContextMap;

/** The concrete context object passed to the renderer. */
export type PromptContext = Readonly<PromptContextMap>;

// ---------------------------------------------------------------------------
// Builder input
// ---------------------------------------------------------------------------

/**
 * Input for building a prompt context.
 *
 * `record`, `cells` and `textContext` are always required: prompts are
 * per-record. Without `scoring`, the evaluation variables are UNSET and a
 * template that references them fails to render.
 */
export interface PromptContextInput {
  record: Readonly<SourceRecord>;
  cells: ReadonlyArray<Readonly<MatrixCell>>;
  textContext: TextContext;
  /** Prefix marking a topic-wildcard category tag */
  topicTagPrefix: string;
  scoring?: Readonly<ScoringSettings>;
}

/** Sentinel for variables whose source was not provided. */
const UNSET = "__UNSET__";

const MAX_LISTED_AUTHORS = 5;

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

export function formatAuthors(authors: readonly string[]): string {
  if (authors.length === 0) {
    return "Unknown";
  }
  const listed = authors.slice(0, MAX_LISTED_AUTHORS).join("; ");
  const rest = authors.length - MAX_LISTED_AUTHORS;
  return rest > 0 ? `${listed} (and ${rest} more)` : listed;
}

export function formatSubjects(subjects: readonly string[]): string {
  return subjects.length > 0 ? subjects.join("; ") : "None listed";
}

export function formatCategoryLabel(categoryTag: string, topicTagPrefix: string): string {
  if (categoryTag.startsWith(topicTagPrefix)) {
    const code = categoryTag.slice(topicTagPrefix.length);
    const parsed = SubdomainCode.safeParse(code);
    const display = parsed.success ? SUBDOMAIN_DISPLAY[parsed.data] : code;
    return `Subdomain: ${display} (${code})`;
  }
  const parsed = CommodityCode.safeParse(categoryTag);
  const display = parsed.success ? COMMODITY_DISPLAY[parsed.data] : categoryTag;
  return `Commodity: ${display} (${categoryTag})`;
}

/**
 * Numbered list of cells, one block per cell:
 *
 *   1. Cell CMM-LI-TEC-L3-001
 *      Subdomain: Extraction Chemistry (T-EC)
 *      Complexity: Inferential (L3)
 *      Topic: Separation chemistry used to isolate lithium
 */
export function formatCellList(cells: ReadonlyArray<Readonly<MatrixCell>>): string {
  return cells
    .map((cell, i) =>
      [
        `${i + 1}. Cell ${cell.cellId}`,
        `   Subdomain: ${SUBDOMAIN_DISPLAY[cell.topic]} (${cell.topic})`,
        `   Complexity: ${COMPLEXITY_DISPLAY[cell.tier]} (${cell.tier})`,
        `   Topic: ${cell.topicFocus}`,
      ].join("\n")
    )
    .join("\n");
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build a fully-populated prompt context from domain objects.
 */
export function buildPromptContext(input: PromptContextInput): PromptContext {
  const { record, cells, textContext, topicTagPrefix, scoring } = input;

  const ctx: PromptContextMap = {
    // ── Record metadata ──────────────────────────────────────
    "record.id": record.recordId,
    "record.title": record.title,
    "record.authors": formatAuthors(record.authors),
    "record.publicationDate": record.publicationDate ?? "Unknown",
    "record.categoryLabel": formatCategoryLabel(record.categoryTag, topicTagPrefix),
    "record.subjects": formatSubjects(record.subjects),

    // ── Text context ─────────────────────────────────────────
    "record.textContext": textContext.text,
    "record.textSource": textContext.source,

    // ── Routed cells ─────────────────────────────────────────
    "record.cellCount": String(cells.length),
    "record.cellList": formatCellList(cells),

    // ── Scoring scale ────────────────────────────────────────
    "evaluation.scaleMin": scoring ? String(scoring.scaleMin) : UNSET,
    "evaluation.scaleMax": scoring ? String(scoring.scaleMax) : UNSET,
    "evaluation.recommendThreshold": scoring ? String(scoring.recommendThreshold) : UNSET,
  };

  return Object.freeze(ctx);
}

/**
 * Check whether a context value is the UNSET sentinel.
 * Used by the renderer to produce clear errors.
 */
export function isUnset(value: string): boolean {
  return value === UNSET;
}
