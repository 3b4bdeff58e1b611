/**
 * Per-cell recommendation matrix.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SHAPE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   cellId ──► [ entry, entry, ... ]   best score first
 *
 * Every cell of the registry is present, in matrix definition order, even
 * when no record was evaluated against it. Entries with equal scores keep the
 * order in which their evaluations were supplied, so the same evaluations
 * always serialize to the same bytes.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { MatrixRegistry } from "../matrix/registry.js";
import type { RecordEvaluation } from "../types/evaluation.js";

/**
 * One record's judgment against one cell.
 */
export interface RecommendationEntry {
  readonly recordId: string;
  readonly relevanceScore: number;
  readonly justification: string;
  readonly suggestedAngle: string;
  readonly supportsDeepAnalysis: boolean;
  /** Overall relevance of the record, for tie-breaking by the reader */
  readonly overallRelevance: number;
}

export type RecommendationMatrixJSON = Record<string, RecommendationEntry[]>;

export class RecommendationMatrix {
  private readonly byCell: ReadonlyMap<string, readonly RecommendationEntry[]>;

  /** Cell evaluations whose cell id is not in the registry */
  readonly unmatchedEntries: number;

  private constructor(byCell: ReadonlyMap<string, readonly RecommendationEntry[]>, unmatchedEntries: number) {
    this.byCell = byCell;
    this.unmatchedEntries = unmatchedEntries;
  }

  static build(registry: MatrixRegistry, evaluations: readonly RecordEvaluation[]): RecommendationMatrix {
    const buckets = new Map<string, RecommendationEntry[]>();
    for (const cell of registry.allCells()) {
      buckets.set(cell.cellId, []);
    }

    let unmatched = 0;
    for (const evaluation of evaluations) {
      for (const cell of evaluation.cellEvaluations) {
        const bucket = buckets.get(cell.cellId);
        if (bucket === undefined) {
          unmatched++;
          continue;
        }
        bucket.push(
          Object.freeze({
            recordId: evaluation.recordId,
            relevanceScore: cell.relevanceScore,
            justification: cell.justification,
            suggestedAngle: cell.suggestedAngle,
            supportsDeepAnalysis: cell.supportsDeepAnalysis,
            overallRelevance: evaluation.overallRelevance,
          })
        );
      }
    }

    const frozen = new Map<string, readonly RecommendationEntry[]>();
    for (const [cellId, entries] of buckets) {
      // Array.prototype.sort is stable
      entries.sort((a, b) => b.relevanceScore - a.relevanceScore);
      frozen.set(cellId, Object.freeze(entries));
    }
    return new RecommendationMatrix(frozen, unmatched);
  }

  /** Cell ids in matrix definition order */
  cellIds(): string[] {
    return [...this.byCell.keys()];
  }

  /** Entries for a cell, best first; empty for an unknown cell */
  entriesFor(cellId: string): readonly RecommendationEntry[] {
    return this.byCell.get(cellId) ?? [];
  }

  bestScore(cellId: string): number | undefined {
    return this.entriesFor(cellId)[0]?.relevanceScore;
  }

  /**
   * Cells whose best entry scores at least `threshold`, in matrix order.
   */
  coverage(threshold: number): ReadonlySet<string> {
    const covered = new Set<string>();
    for (const cellId of this.byCell.keys()) {
      const best = this.bestScore(cellId);
      if (best !== undefined && best >= threshold) {
        covered.add(cellId);
      }
    }
    return covered;
  }

  /**
   * Cells with no entry scoring at least `threshold`, in matrix order.
   */
  gaps(threshold: number): string[] {
    const covered = this.coverage(threshold);
    return this.cellIds().filter((id) => !covered.has(id));
  }

  get size(): number {
    return this.byCell.size;
  }

  toJSON(): RecommendationMatrixJSON {
    const json: RecommendationMatrixJSON = {};
    for (const [cellId, entries] of this.byCell) {
      json[cellId] = entries.map((e) => ({ ...e }));
    }
    return json;
  }
}

/**
 * Build the recommendation matrix for a set of evaluations.
 */
export function buildRecommendationMatrix(
  registry: MatrixRegistry,
  evaluations: readonly RecordEvaluation[]
): RecommendationMatrix {
  return RecommendationMatrix.build(registry, evaluations);
}
