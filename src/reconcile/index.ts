/**
 * Response reconciliation: strict parsing, truncation salvage and the
 * processing ledger.
 */

export { JsonTokenizer, type JsonToken, type Punctuation } from "./tokenizer.js";

export {
  parsePartialJson,
  getEntry,
  toPlainValue,
  type PartialValue,
  type PartialEntry,
  type PartialParseResult,
  type StopReason,
} from "./partial-json.js";

export {
  createResponseSchemas,
  toCellEvaluation,
  describeSchemaError,
  type ResponseSchemas,
  type WireCellEvaluation,
  type WireHeader,
  type WireRecordEvaluation,
} from "./schema.js";

export {
  salvageRecordEvaluation,
  deriveBestCells,
  type SalvageOptions,
  type SalvagedEvaluation,
} from "./salvage.js";

export {
  Reconciler,
  type ReconcileOutcome,
  type ReconcileCounts,
  type ReconcileRunResult,
  type ReconcilerOptions,
  type RoutingManifest,
} from "./reconciler.js";
