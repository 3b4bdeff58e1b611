/**
 * Matrix registry with deterministic indexing.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * THE EVALUATION MATRIX AS A READ-ONLY INDEX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The registry is built once at startup from a validated list of cells and
 * never changes afterwards. It provides:
 *
 * 1. DEFINITION ORDER: `allCells()` returns cells in the order the matrix
 *    file lists them. Aggregated output is keyed in this order.
 *
 * 2. AXIS LOOKUP: cells by commodity (category axis) and by subdomain
 *    (topic axis), which is all the router needs.
 *
 * 3. COMPLETENESS: the cell count must equal the configured total and cell
 *    ids must be unique, or creation fails with MalformedMatrixError.
 */

import type { MatrixCell } from "./schema.js";
import type {
  CommodityCode,
  SubdomainCode,
  ComplexityLevel,
  Stratum,
} from "../config/pipeline/enums.js";
import { MalformedMatrixError, type MatrixIssue } from "./errors.js";

/**
 * Composite key for the category + topic index.
 * Format: "{category}:{topic}"
 */
export type CategoryTopicKey = `${CommodityCode}:${SubdomainCode}`;

export function makeCategoryTopicKey(
  category: CommodityCode,
  topic: SubdomainCode
): CategoryTopicKey {
  return `${category}:${topic}`;
}

export interface MatrixRegistryOptions {
  /** Required number of cells */
  expectedCellCount: number;
}

/**
 * Statistics about the matrix contents.
 */
export interface MatrixStats {
  totalCells: number;
  byCategory: Partial<Record<CommodityCode, number>>;
  byTopic: Partial<Record<SubdomainCode, number>>;
  byTier: Partial<Record<ComplexityLevel, number>>;
  byStratum: Partial<Record<Stratum, number>>;
  uniqueCombinations: number;
}

type CellList = ReadonlyArray<Readonly<MatrixCell>>;

function groupBy<K>(cells: CellList, keyOf: (cell: Readonly<MatrixCell>) => K): ReadonlyMap<K, CellList> {
  const index = new Map<K, Readonly<MatrixCell>[]>();
  for (const cell of cells) {
    const key = keyOf(cell);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(cell);
    } else {
      index.set(key, [cell]);
    }
  }

  const frozenIndex = new Map<K, CellList>();
  for (const [key, value] of index) {
    frozenIndex.set(key, Object.freeze(value));
  }
  return frozenIndex;
}

function countBy<K extends string>(cells: CellList, keyOf: (cell: Readonly<MatrixCell>) => K): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const cell of cells) {
    const key = keyOf(cell);
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/**
 * Immutable matrix registry.
 *
 * @example
 *   const registry = MatrixRegistry.create(cells, { expectedCellCount: 100 });
 *
 *   registry.cellsForCategory("HREE");   // 16 cells across all subdomains
 *   registry.cellsForTopic("G-PR");      // 10 cells across all commodities
 */
export class MatrixRegistry {
  /** All cells in definition order */
  private readonly _cells: CellList;

  private readonly _byId: ReadonlyMap<string, Readonly<MatrixCell>>;

  private readonly _byCategory: ReadonlyMap<CommodityCode, CellList>;

  private readonly _byTopic: ReadonlyMap<SubdomainCode, CellList>;

  private readonly _byCategoryAndTopic: ReadonlyMap<CategoryTopicKey, CellList>;

  private constructor(cells: readonly MatrixCell[]) {
    this._cells = Object.freeze(cells.map((c) => Object.freeze({ ...c })));

    const byId = new Map<string, Readonly<MatrixCell>>();
    for (const cell of this._cells) {
      byId.set(cell.cellId, cell);
    }
    this._byId = byId;
    this._byCategory = groupBy(this._cells, (c) => c.category);
    this._byTopic = groupBy(this._cells, (c) => c.topic);
    this._byCategoryAndTopic = groupBy(this._cells, (c) =>
      makeCategoryTopicKey(c.category, c.topic)
    );
  }

  /**
   * Create a registry from validated cells.
   *
   * @throws MalformedMatrixError on a count mismatch or duplicate cell id
   */
  static create(cells: readonly MatrixCell[], options: MatrixRegistryOptions): MatrixRegistry {
    const issues: MatrixIssue[] = [];

    const seen = new Set<string>();
    for (const cell of cells) {
      if (seen.has(cell.cellId)) {
        issues.push({
          cellId: cell.cellId,
          field: "cellId",
          message: `Duplicate cell id: ${cell.cellId}`,
          type: "duplicate",
        });
      }
      seen.add(cell.cellId);
    }

    if (cells.length !== options.expectedCellCount) {
      issues.push({
        field: "cells",
        message: `Expected ${options.expectedCellCount} cells, found ${cells.length}`,
        type: "count",
      });
    }

    if (issues.length > 0) {
      throw new MalformedMatrixError(
        `Matrix definition rejected: ${issues.length} issue(s)`,
        issues
      );
    }

    return new MatrixRegistry(cells);
  }

  // ============================================================
  // Public Accessors
  // ============================================================

  /**
   * All cells in definition order.
   */
  allCells(): CellList {
    return this._cells;
  }

  get size(): number {
    return this._cells.length;
  }

  getById(cellId: string): Readonly<MatrixCell> | undefined {
    return this._byId.get(cellId);
  }

  /**
   * Cells of one commodity, across every subdomain, in definition order.
   */
  cellsForCategory(category: CommodityCode): CellList {
    return this._byCategory.get(category) ?? [];
  }

  /**
   * Cells of one subdomain, across every commodity, in definition order.
   */
  cellsForTopic(topic: SubdomainCode): CellList {
    return this._byTopic.get(topic) ?? [];
  }

  cellsForCategoryAndTopic(category: CommodityCode, topic: SubdomainCode): CellList {
    return this._byCategoryAndTopic.get(makeCategoryTopicKey(category, topic)) ?? [];
  }

  /**
   * Commodities that have at least one cell, in order of first appearance.
   */
  categories(): ReadonlyArray<CommodityCode> {
    return Object.freeze([...this._byCategory.keys()]);
  }

  /**
   * Subdomains that have at least one cell, in order of first appearance.
   */
  topics(): ReadonlyArray<SubdomainCode> {
    return Object.freeze([...this._byTopic.keys()]);
  }

  hasCategory(value: string): value is CommodityCode {
    return this.categories().some((category) => category === value);
  }

  hasTopic(value: string): value is SubdomainCode {
    return this.topics().some((topic) => topic === value);
  }

  getStats(): MatrixStats {
    return {
      totalCells: this._cells.length,
      byCategory: countBy(this._cells, (c) => c.category),
      byTopic: countBy(this._cells, (c) => c.topic),
      byTier: countBy(this._cells, (c) => c.tier),
      byStratum: countBy(this._cells, (c) => c.stratum),
      uniqueCombinations: this._byCategoryAndTopic.size,
    };
  }
}
