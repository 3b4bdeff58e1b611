/**
 * Response reconciler.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STATE MACHINE (per raw response)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   RECEIVED ─ JSON.parse + schema ok ─────────────► PARSED
 *            ─ otherwise, salvage finds top fields ─► SALVAGED
 *            ─ error response / nothing salvageable ► DROPPED
 *
 * Complete JSON that fails the schema only in some cells keeps every valid
 * cell; the invalid ones are discarded. Cut-off text keeps the valid prefix.
 *
 * After either success path, cell evaluations are restricted to the cells
 * routed to the record and de-duplicated by cell id (first one wins). The
 * record id always comes from the raw response, never from the model text.
 *
 * Truncated and malformed responses never throw. They are outcomes.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { ScoringSettings } from "../config/pipeline/schema.js";
import type { RawResponse, RawResponseBody } from "../types/batch.js";
import {
  ReconcileState,
  type CellEvaluation,
  type LedgerStatus,
  type ProcessingLedger,
  type RecordEvaluation,
} from "../types/evaluation.js";
import { createNullLogger, type Logger } from "../logging/logger.js";
import {
  createResponseSchemas,
  describeSchemaError,
  toCellEvaluation,
  type ResponseSchemas,
  type WireRecordEvaluation,
} from "./schema.js";
import { salvageRecordEvaluation, deriveBestCells, type SalvagedEvaluation } from "./salvage.js";

/** Record id → ids of the cells the record was evaluated against */
export type RoutingManifest = Readonly<Record<string, readonly string[]>>;

export interface ReconcileOutcome {
  readonly recordId: string;
  readonly state: ReconcileState.Parsed | ReconcileState.Salvaged | ReconcileState.Dropped;
  readonly evaluation?: RecordEvaluation;
  /** Why the response was dropped, or why strict parsing failed before salvage */
  readonly reason?: string;
  /** Cell evaluations removed as unrouted, duplicated or failing the cell schema */
  readonly discardedCells: number;
  /** The provider reported the output token cap was hit */
  readonly truncated: boolean;
}

export interface ReconcileCounts {
  received: number;
  parsed: number;
  salvaged: number;
  dropped: number;
  /** Already parsed or salvaged according to the incoming ledger */
  skipped: number;
  truncated: number;
  salvagedCells: number;
  discardedCells: number;
}

export interface ReconcileRunResult {
  /** In response order */
  readonly evaluations: RecordEvaluation[];
  readonly outcomes: ReconcileOutcome[];
  readonly ledger: ProcessingLedger;
  readonly counts: ReconcileCounts;
}

export interface ReconcilerOptions {
  scoring: Pick<ScoringSettings, "scaleMin" | "scaleMax" | "recommendThreshold">;
  /**
   * Routed cells per record. When given, cells outside a record's routing are
   * discarded and responses for records not in the manifest are dropped.
   */
  routing?: RoutingManifest;
  logger?: Logger;
}

type StrictParseResult =
  | { success: true; data: WireRecordEvaluation }
  /** `document` is set when the body was complete JSON */
  | { success: false; reason: string; document?: { value: unknown } };

const LEDGER_STATUS: Readonly<Record<ReconcileOutcome["state"], LedgerStatus>> = {
  [ReconcileState.Parsed]: "parsed",
  [ReconcileState.Salvaged]: "salvaged",
  [ReconcileState.Dropped]: "dropped",
};

interface CellFilterResult {
  cells: CellEvaluation[];
  discarded: number;
}

export class Reconciler {
  private readonly scoring: ReconcilerOptions["scoring"];
  private readonly routing: RoutingManifest | undefined;
  private readonly schemas: ResponseSchemas;
  private readonly logger: Logger;

  constructor(options: ReconcilerOptions) {
    this.scoring = options.scoring;
    this.routing = options.routing;
    this.schemas = createResponseSchemas(options.scoring);
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * Reconcile one raw response.
   */
  reconcile(raw: RawResponse): ReconcileOutcome {
    const outcome = this.classify(raw);
    if (outcome.state === ReconcileState.Dropped) {
      this.logger.warn("Dropped response", { recordId: outcome.recordId, reason: outcome.reason });
    } else if (outcome.state === ReconcileState.Salvaged) {
      this.logger.debug("Salvaged response", {
        recordId: outcome.recordId,
        cells: outcome.evaluation?.cellEvaluations.length,
        reason: outcome.reason,
      });
    }
    return outcome;
  }

  /**
   * Reconcile a set of responses against the ledger of an earlier run.
   *
   * Records the ledger already holds as parsed or salvaged are skipped;
   * dropped ones are attempted again. The incoming ledger is not modified.
   */
  reconcileAll(responses: readonly RawResponse[], ledger: ProcessingLedger = {}): ReconcileRunResult {
    const next: Record<string, LedgerStatus> = { ...ledger };
    const evaluations: RecordEvaluation[] = [];
    const outcomes: ReconcileOutcome[] = [];
    const counts: ReconcileCounts = {
      received: responses.length,
      parsed: 0,
      salvaged: 0,
      dropped: 0,
      skipped: 0,
      truncated: 0,
      salvagedCells: 0,
      discardedCells: 0,
    };

    for (const raw of responses) {
      const status = next[raw.recordId];
      if (status === "parsed" || status === "salvaged") {
        counts.skipped++;
        continue;
      }

      const outcome = this.reconcile(raw);
      outcomes.push(outcome);
      next[raw.recordId] = LEDGER_STATUS[outcome.state];
      counts.discardedCells += outcome.discardedCells;
      if (outcome.truncated) counts.truncated++;

      switch (outcome.state) {
        case ReconcileState.Parsed:
          counts.parsed++;
          break;
        case ReconcileState.Salvaged:
          counts.salvaged++;
          counts.salvagedCells += outcome.evaluation?.cellEvaluations.length ?? 0;
          break;
        case ReconcileState.Dropped:
          counts.dropped++;
          break;
      }
      if (outcome.evaluation) {
        evaluations.push(outcome.evaluation);
      }
    }

    this.logger.info("Reconciliation complete", { ...counts });

    return { evaluations, outcomes, ledger: Object.freeze(next), counts };
  }

  // ─────────────────────────────────────────────────────────────────────────

  private classify(raw: RawResponse): ReconcileOutcome {
    if (raw.kind === "error") {
      return this.dropped(raw.recordId, raw.reason, false);
    }

    const routed = this.routedCells(raw.recordId);
    if (routed === null) {
      return this.dropped(raw.recordId, "record is not in the routing manifest", raw.truncated);
    }

    const strict = this.parseStrict(raw);
    if (strict.success) {
      const { cells, discarded } = this.filterCells(
        strict.data.cell_evaluations.map(toCellEvaluation),
        routed
      );
      const retained = new Set(cells.map((c) => c.cellId));
      const bestCells = [...new Set(strict.data.best_cells)].filter((id) => retained.has(id));
      this.checkRecordId(raw.recordId, strict.data.record_id);

      return {
        recordId: raw.recordId,
        state: ReconcileState.Parsed,
        evaluation: Object.freeze({
          recordId: raw.recordId,
          overallRelevance: strict.data.overall_relevance,
          depthAssessment: strict.data.depth_assessment,
          cellEvaluations: Object.freeze(cells),
          bestCells: Object.freeze(bestCells),
          recommended: strict.data.recommended && bestCells.length > 0,
          wasSalvaged: false,
        }),
        discardedCells: discarded,
        truncated: raw.truncated,
      };
    }

    if (strict.document !== undefined) {
      const checked = this.checkCells(strict.document.value);
      if (checked !== undefined) {
        return this.salvagedOutcome(raw, checked.evaluation, routed, strict.reason, checked.invalid);
      }
    }

    const salvaged = salvageRecordEvaluation(raw.body, {
      ...this.scoring,
      schemas: this.schemas,
    });
    if (salvaged === undefined) {
      return this.dropped(raw.recordId, `nothing salvageable (${strict.reason})`, raw.truncated);
    }
    return this.salvagedOutcome(raw, salvaged, routed, strict.reason);
  }

  private salvagedOutcome(
    raw: RawResponseBody,
    salvaged: SalvagedEvaluation,
    routed: ReadonlySet<string> | undefined,
    reason: string,
    invalidCells = 0
  ): ReconcileOutcome {
    const { cells, discarded } = this.filterCells(salvaged.cellEvaluations, routed);
    const bestCells = deriveBestCells(cells, this.scoring.recommendThreshold);
    this.checkRecordId(raw.recordId, salvaged.recordId);

    return {
      recordId: raw.recordId,
      state: ReconcileState.Salvaged,
      evaluation: Object.freeze({
        recordId: raw.recordId,
        overallRelevance: salvaged.overallRelevance,
        depthAssessment: salvaged.depthAssessment,
        cellEvaluations: Object.freeze(cells),
        bestCells: Object.freeze(bestCells),
        recommended: bestCells.length > 0,
        wasSalvaged: true,
      }),
      reason,
      discardedCells: discarded + invalidCells,
      truncated: raw.truncated,
    };
  }

  /**
   * Validate the cells of a complete document one by one.
   *
   * @returns undefined when the top-level fields or the cell list fail
   */
  private checkCells(value: unknown): { evaluation: SalvagedEvaluation; invalid: number } | undefined {
    const parsed = this.schemas.WireCellListSchema.safeParse(value);
    if (!parsed.success) return undefined;

    const cells: CellEvaluation[] = [];
    for (const item of parsed.data.cell_evaluations) {
      const cell = this.schemas.WireCellEvaluationSchema.safeParse(item);
      if (cell.success) cells.push(toCellEvaluation(cell.data));
    }
    const bestCells = deriveBestCells(cells, this.scoring.recommendThreshold);

    return {
      evaluation: {
        recordId: parsed.data.record_id,
        overallRelevance: parsed.data.overall_relevance,
        depthAssessment: parsed.data.depth_assessment,
        cellEvaluations: cells,
        bestCells,
        recommended: bestCells.length > 0,
      },
      invalid: parsed.data.cell_evaluations.length - cells.length,
    };
  }

  private parseStrict(raw: RawResponseBody): StrictParseResult {
    let value: unknown;
    try {
      value = JSON.parse(raw.body);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      return { success: false, reason: raw.truncated ? `truncated: ${detail}` : `invalid JSON: ${detail}` };
    }

    const parsed = this.schemas.WireRecordEvaluationSchema.safeParse(value);
    if (!parsed.success) {
      return {
        success: false,
        reason: `schema: ${describeSchemaError(parsed.error)}`,
        document: { value },
      };
    }
    return { success: true, data: parsed.data };
  }

  /**
   * Routed cell ids for a record: undefined when no manifest is in use,
   * null when the manifest does not know the record.
   */
  private routedCells(recordId: string): ReadonlySet<string> | undefined | null {
    if (this.routing === undefined) return undefined;
    const cells = this.routing[recordId];
    return cells === undefined ? null : new Set(cells);
  }

  private filterCells(
    cells: readonly CellEvaluation[],
    routed: ReadonlySet<string> | undefined
  ): CellFilterResult {
    const seen = new Set<string>();
    const kept: CellEvaluation[] = [];
    for (const cell of cells) {
      if ((routed && !routed.has(cell.cellId)) || seen.has(cell.cellId)) continue;
      seen.add(cell.cellId);
      kept.push(Object.freeze(cell));
    }
    return { cells: kept, discarded: cells.length - kept.length };
  }

  private checkRecordId(expected: string, reported: string): void {
    if (expected !== reported) {
      this.logger.warn("Model record_id does not match response", { recordId: expected, reported });
    }
  }

  private dropped(recordId: string, reason: string, truncated: boolean): ReconcileOutcome {
    return { recordId, state: ReconcileState.Dropped, reason, discardedCells: 0, truncated };
  }
}
