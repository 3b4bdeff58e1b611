/**
 * Matrix definition errors.
 */

export interface MatrixIssue {
  /** 1-based line in the matrix file, when the issue belongs to a row */
  line?: number;
  cellId?: string;
  field: string;
  message: string;
  type: "row_format" | "schema" | "duplicate" | "count" | "file";
}

/**
 * The matrix definition could not be turned into a complete matrix.
 * Raised at startup; no partial matrix is ever returned.
 */
export class MalformedMatrixError extends Error {
  public readonly issues: MatrixIssue[];

  constructor(message: string, issues: MatrixIssue[]) {
    super(message);
    this.name = "MalformedMatrixError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Matrix definition is malformed:"];
    for (const issue of this.issues) {
      const location =
        issue.line !== undefined
          ? `[line ${issue.line}${issue.cellId ? ` ${issue.cellId}` : ""}]`
          : "[matrix]";
      lines.push(`  - ${location} ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
