/**
 * Evaluation results produced by reconciling model responses.
 */

/**
 * Lifecycle of one raw response through reconciliation.
 *
 *   RECEIVED ──► PARSED      (strict parse + schema conformance)
 *            ├─► SALVAGED    (truncated; complete cells recovered)
 *            └─► DROPPED     (error response, or nothing salvageable)
 */
export enum ReconcileState {
  Received = "RECEIVED",
  Parsed = "PARSED",
  Salvaged = "SALVAGED",
  Dropped = "DROPPED",
}

/**
 * One model judgment of a record against one matrix cell.
 * Only ever constructed with all five fields present and well-formed.
 */
export interface CellEvaluation {
  readonly cellId: string;
  /** Integer on the configured relevance scale */
  readonly relevanceScore: number;
  readonly justification: string;
  readonly suggestedAngle: string;
  readonly supportsDeepAnalysis: boolean;
}

export interface RecordEvaluation {
  readonly recordId: string;
  readonly overallRelevance: number;
  readonly depthAssessment: string;
  /** In model order, restricted to cells routed to the record */
  readonly cellEvaluations: readonly CellEvaluation[];
  readonly bestCells: readonly string[];
  readonly recommended: boolean;
  readonly wasSalvaged: boolean;
}

/**
 * Completion status of a record, as stored in the processing ledger.
 */
export type LedgerStatus = "parsed" | "salvaged" | "dropped";

/**
 * Resumability state owned by the caller: record id → completion status.
 */
export type ProcessingLedger = Readonly<Record<string, LedgerStatus>>;
