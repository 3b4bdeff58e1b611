/**
 * Record-to-cell routing.
 */

export {
  CellRouter,
  UnroutableRecordError,
  type RoutedRecord,
  type RoutingResult,
  type TagRoutingStats,
  type CellRouterOptions,
} from "./router.js";
