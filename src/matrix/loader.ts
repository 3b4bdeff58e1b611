/**
 * Matrix definition loader.
 *
 * Responsible for:
 * - Extracting candidate rows from the Markdown allocation table
 * - Deriving each cell's subdomain from its cell id
 * - Validating rows against the cell schema
 * - Building the immutable registry (count and uniqueness checks)
 *
 * A candidate row is any table row whose first column is a question number:
 *
 *   | 1 | CMM-HREE-TEC-L1-001 | HREE | L1 | A | Separation chemistry ... |
 *
 * Header rows, separator rows and the commodity summary table do not start
 * with a number and are ignored. Every candidate row must be well-formed;
 * a single bad row rejects the whole matrix.
 */

import { readFileSync } from "node:fs";
import { CELL_ID_SUBDOMAIN } from "../config/pipeline/enums.js";
import { formatZodIssues } from "../config/pipeline/loader.js";
import { MatrixCellSchema, CELL_ID_PATTERN, type MatrixCell } from "./schema.js";
import { MatrixRegistry, type MatrixRegistryOptions } from "./registry.js";
import { MalformedMatrixError, type MatrixIssue } from "./errors.js";

const CANDIDATE_ROW = /^\|\s*\d+\s*\|/;

const COLUMN_COUNT = 6;

/**
 * A table row that looks like a cell assignment.
 */
export interface MatrixTableRow {
  /** 1-based line number in the source */
  line: number;
  /** Trimmed column values */
  columns: string[];
}

/**
 * Result of validating a matrix definition.
 */
export interface MatrixValidationResult {
  success: boolean;
  cells?: MatrixCell[];
  errors?: MatrixIssue[];
  stats: {
    candidateRows: number;
    validRows: number;
    invalidRows: number;
  };
}

/**
 * Extract candidate rows from Markdown.
 */
export function parseMatrixTable(markdown: string): MatrixTableRow[] {
  const rows: MatrixTableRow[] = [];
  const lines = markdown.split(/\r?\n/);

  lines.forEach((text, index) => {
    const trimmed = text.trim();
    if (!CANDIDATE_ROW.test(trimmed)) {
      return;
    }
    const inner = trimmed.replace(/^\|/, "").replace(/\|$/, "");
    rows.push({
      line: index + 1,
      columns: inner.split("|").map((column) => column.trim()),
    });
  });

  return rows;
}

/**
 * Turn a row's columns into an unvalidated cell object.
 * The subdomain comes from the cell id; the table has no subdomain column.
 */
function rowToCellInput(row: MatrixTableRow): Record<string, unknown> {
  const [questionNumber = "", cellId = "", category = "", tier = "", stratum = "", topicFocus = ""] =
    row.columns;

  const match = CELL_ID_PATTERN.exec(cellId);
  const idSubdomain = match?.[2] ?? "";

  return {
    questionNumber: Number.parseInt(questionNumber, 10),
    cellId,
    category,
    topic: CELL_ID_SUBDOMAIN[idSubdomain] ?? idSubdomain,
    tier,
    stratum,
    topicFocus,
  };
}

/**
 * Validate a matrix definition without building a registry.
 */
export function validateMatrixTable(markdown: string): MatrixValidationResult {
  const rows = parseMatrixTable(markdown);
  const cells: MatrixCell[] = [];
  const errors: MatrixIssue[] = [];

  for (const row of rows) {
    const cellId = row.columns[1];

    if (row.columns.length !== COLUMN_COUNT) {
      errors.push({
        line: row.line,
        cellId,
        field: "row",
        message: `Expected ${COLUMN_COUNT} columns, found ${row.columns.length}`,
        type: "row_format",
      });
      continue;
    }

    const result = MatrixCellSchema.safeParse(rowToCellInput(row));
    if (!result.success) {
      for (const issue of formatZodIssues(result.error.issues)) {
        errors.push({
          line: row.line,
          cellId,
          field: issue.path.join(".") || "row",
          message: issue.message,
          type: "schema",
        });
      }
      continue;
    }

    cells.push(result.data);
  }

  const stats = {
    candidateRows: rows.length,
    validRows: cells.length,
    invalidRows: rows.length - cells.length,
  };

  if (errors.length > 0) {
    return { success: false, errors, stats };
  }
  return { success: true, cells, stats };
}

/**
 * Parse and validate a matrix definition, and build its registry.
 *
 * @throws MalformedMatrixError if any row is malformed, the cell count is
 *         wrong, or a cell id repeats
 */
export function loadMatrix(markdown: string, options: MatrixRegistryOptions): MatrixRegistry {
  const result = validateMatrixTable(markdown);

  if (!result.success || result.cells === undefined) {
    const errors = result.errors ?? [];
    throw new MalformedMatrixError(
      `Matrix definition rejected: ${errors.length} issue(s) in ${result.stats.invalidRows} row(s)`,
      errors
    );
  }

  return MatrixRegistry.create(result.cells, options);
}

/**
 * Read a matrix definition from disk and load it.
 */
export function loadMatrixFile(path: string, options: MatrixRegistryOptions): MatrixRegistry {
  let markdown: string;
  try {
    markdown = readFileSync(path, "utf-8");
  } catch (err) {
    throw new MalformedMatrixError(`Cannot read matrix definition: ${path}`, [
      {
        field: "file",
        message: err instanceof Error ? err.message : String(err),
        type: "file",
      },
    ]);
  }
  return loadMatrix(markdown, options);
}
