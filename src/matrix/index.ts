/**
 * Evaluation matrix module.
 *
 * Usage:
 *   import { loadMatrixFile } from "./matrix/index.js";
 *
 *   const registry = loadMatrixFile("data/allocation-matrix.md", { expectedCellCount: 100 });
 *   registry.cellsForCategory("LI");
 */

export { MatrixCellSchema, CELL_ID_PATTERN, type MatrixCell } from "./schema.js";

export { MalformedMatrixError, type MatrixIssue } from "./errors.js";

export {
  MatrixRegistry,
  makeCategoryTopicKey,
  type CategoryTopicKey,
  type MatrixRegistryOptions,
  type MatrixStats,
} from "./registry.js";

export {
  parseMatrixTable,
  validateMatrixTable,
  loadMatrix,
  loadMatrixFile,
  type MatrixTableRow,
  type MatrixValidationResult,
} from "./loader.js";
