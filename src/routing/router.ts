/**
 * Cell router.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ROUTING RULES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A record's category tag selects the cells it is evaluated against:
 *
 *   "HREE"              → every HREE cell, across all subdomains
 *   "subdomain_G-PR"    → every G-PR cell, across all commodities
 *   anything else       → UnroutableRecordError
 *
 * The two axes fan out differently (a commodity has 7–16 cells, a subdomain
 * 6–13) and that is intentional: the tag assigned upstream decides how much
 * each record costs to evaluate. Fan-out is never normalized, and a bare
 * subdomain code without the prefix is not a tag.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { MatrixRegistry } from "../matrix/registry.js";
import type { MatrixCell } from "../matrix/schema.js";
import type { SourceRecord } from "../catalog/schema.js";
import type { UnroutablePolicy } from "../config/pipeline/schema.js";
import { createNullLogger, type Logger } from "../logging/logger.js";

export class UnroutableRecordError extends Error {
  public readonly categoryTag: string;
  public readonly recordId?: string;

  constructor(categoryTag: string, recordId?: string) {
    super(
      recordId === undefined
        ? `No matrix cells for category tag: ${categoryTag}`
        : `No matrix cells for record ${recordId} (category tag: ${categoryTag})`
    );
    this.name = "UnroutableRecordError";
    this.categoryTag = categoryTag;
    this.recordId = recordId;
  }
}

/**
 * A record paired with the cells it will be evaluated against.
 */
export interface RoutedRecord {
  readonly record: SourceRecord;
  readonly cells: ReadonlyArray<Readonly<MatrixCell>>;
}

export interface TagRoutingStats {
  records: number;
  cellsPerRecord: number;
}

export interface RoutingResult {
  routed: RoutedRecord[];
  skipped: UnroutableRecordError[];
  stats: {
    records: number;
    routed: number;
    skipped: number;
    cellsRequested: number;
    byTag: Record<string, TagRoutingStats>;
  };
}

export interface CellRouterOptions {
  /** Prefix marking a topic-wildcard tag */
  topicTagPrefix: string;
  logger?: Logger;
}

export class CellRouter {
  private readonly registry: MatrixRegistry;
  private readonly topicTagPrefix: string;
  private readonly logger: Logger;

  constructor(registry: MatrixRegistry, options: CellRouterOptions) {
    this.registry = registry;
    this.topicTagPrefix = options.topicTagPrefix;
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * Cells selected by a category tag.
   *
   * @throws UnroutableRecordError if the tag names no known commodity or subdomain
   */
  route(categoryTag: string): ReadonlyArray<Readonly<MatrixCell>> {
    if (categoryTag.startsWith(this.topicTagPrefix)) {
      const topic = categoryTag.slice(this.topicTagPrefix.length);
      if (this.registry.hasTopic(topic)) {
        return this.registry.cellsForTopic(topic);
      }
      throw new UnroutableRecordError(categoryTag);
    }

    if (this.registry.hasCategory(categoryTag)) {
      return this.registry.cellsForCategory(categoryTag);
    }

    throw new UnroutableRecordError(categoryTag);
  }

  routeRecord(record: SourceRecord): RoutedRecord {
    try {
      return { record, cells: this.route(record.categoryTag) };
    } catch (err) {
      if (err instanceof UnroutableRecordError) {
        throw new UnroutableRecordError(record.categoryTag, record.recordId);
      }
      throw err;
    }
  }

  /**
   * Route a whole catalog.
   *
   * Under "skip" an unroutable record is logged and counted; under "abort"
   * the first one is rethrown.
   */
  routeAll(records: readonly SourceRecord[], policy: UnroutablePolicy): RoutingResult {
    const routed: RoutedRecord[] = [];
    const skipped: UnroutableRecordError[] = [];
    const byTag: Record<string, TagRoutingStats> = {};
    let cellsRequested = 0;

    for (const record of records) {
      let entry: RoutedRecord;
      try {
        entry = this.routeRecord(record);
      } catch (err) {
        if (err instanceof UnroutableRecordError && policy === "skip") {
          this.logger.warn("Skipping unroutable record", {
            recordId: record.recordId,
            categoryTag: record.categoryTag,
          });
          skipped.push(err);
          continue;
        }
        throw err;
      }

      routed.push(entry);
      cellsRequested += entry.cells.length;
      const tagStats = byTag[record.categoryTag] ?? { records: 0, cellsPerRecord: entry.cells.length };
      tagStats.records++;
      byTag[record.categoryTag] = tagStats;
    }

    this.logger.info("Routing complete", {
      records: records.length,
      routed: routed.length,
      skipped: skipped.length,
      cellsRequested,
    });

    return {
      routed,
      skipped,
      stats: {
        records: records.length,
        routed: routed.length,
        skipped: skipped.length,
        cellsRequested,
        byTag,
      },
    };
  }
}
