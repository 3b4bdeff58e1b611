/**
 * Text context resolution.
 *
 * Every request carries some descriptive text for the record, chosen in order:
 *
 *   1. the catalog abstract, when not empty
 *   2. an excerpt of the auxiliary (extracted) text
 *   3. the limited-metadata sentinel
 *
 * The excerpt takes the first `excerptCharBudget` characters and, when the
 * last period in that window lies beyond `minSentenceBoundary`, cuts just
 * after it so the excerpt ends on a sentence.
 */

import type { SourceRecord } from "../catalog/schema.js";
import type { TextContextSettings } from "../config/pipeline/schema.js";

export const TEXT_SOURCES = ["abstract", "excerpt", "limited"] as const;

export type TextSource = (typeof TEXT_SOURCES)[number];

export interface TextContext {
  readonly text: string;
  readonly source: TextSource;
}

/**
 * Cut auxiliary text down to an excerpt.
 */
export function excerptText(text: string, settings: TextContextSettings): string {
  const window = text.trim().slice(0, settings.excerptCharBudget);
  const lastPeriod = window.lastIndexOf(".");
  return lastPeriod > settings.minSentenceBoundary ? window.slice(0, lastPeriod + 1) : window;
}

export function resolveTextContext(
  record: Pick<SourceRecord, "abstract" | "auxiliaryText">,
  settings: TextContextSettings
): TextContext {
  const abstract = record.abstract.trim();
  if (abstract) {
    return { text: abstract, source: "abstract" };
  }

  const auxiliary = (record.auxiliaryText ?? "").trim();
  if (auxiliary) {
    return { text: excerptText(auxiliary, settings), source: "excerpt" };
  }

  return { text: settings.limitedMetadataSentinel, source: "limited" };
}
