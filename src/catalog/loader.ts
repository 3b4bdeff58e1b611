/**
 * Source catalog loader and validator.
 *
 * Responsible for:
 * - Validating catalog entries against the schema
 * - Rejecting duplicate record ids
 * - Attaching auxiliary text from an optional extracted-text directory
 *
 * Validation collects every issue before failing, so one run of the loader
 * reports all bad entries at once.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { formatZodIssues } from "../config/pipeline/loader.js";
import {
  CatalogEntrySchema,
  CatalogSchema,
  AuxiliaryTextFileSchema,
  type SourceRecord,
} from "./schema.js";

/**
 * Validation error for catalog loading.
 */
export class CatalogValidationError extends Error {
  public readonly issues: CatalogIssue[];

  constructor(message: string, issues: CatalogIssue[]) {
    super(message);
    this.name = "CatalogValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Catalog validation failed:"];
    for (const issue of this.issues) {
      const location =
        issue.recordId !== undefined
          ? `[${issue.recordId}]`
          : issue.index !== undefined
            ? `[entry ${issue.index}]`
            : "[catalog]";
      lines.push(`  - ${location} ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface CatalogIssue {
  /** Position in the catalog array */
  index?: number;
  recordId?: string;
  field: string;
  message: string;
  type: "schema" | "duplicate" | "file" | "auxiliary_text";
}

export interface CatalogLoadResult {
  success: boolean;
  records?: SourceRecord[];
  errors?: CatalogIssue[];
  stats: {
    total: number;
    valid: number;
    invalid: number;
    duplicates: number;
  };
}

export interface LoadCatalogFileOptions {
  /** Directory of `<recordId>.json` extracted-text files; empty to skip */
  auxTextDir?: string;
}

/**
 * Validate a parsed catalog.
 */
export function loadCatalog(input: unknown): CatalogLoadResult {
  const parsed = CatalogSchema.safeParse(input);
  if (!parsed.success) {
    return {
      success: false,
      errors: [{ field: "catalog", message: "catalog must be a JSON array", type: "schema" }],
      stats: { total: 0, valid: 0, invalid: 0, duplicates: 0 },
    };
  }

  const records: SourceRecord[] = [];
  const errors: CatalogIssue[] = [];
  const seen = new Set<string>();
  let invalid = 0;
  let duplicates = 0;

  parsed.data.forEach((entry, index) => {
    const result = CatalogEntrySchema.safeParse(entry);
    if (!result.success) {
      invalid++;
      for (const issue of formatZodIssues(result.error.issues)) {
        errors.push({
          index,
          field: issue.path.join(".") || "entry",
          message: issue.message,
          type: "schema",
        });
      }
      return;
    }

    const record = result.data;
    if (seen.has(record.recordId)) {
      duplicates++;
      errors.push({
        index,
        recordId: record.recordId,
        field: "recordId",
        message: `Duplicate record id: ${record.recordId}`,
        type: "duplicate",
      });
      return;
    }
    seen.add(record.recordId);
    records.push(record);
  });

  const stats = {
    total: parsed.data.length,
    valid: records.length,
    invalid,
    duplicates,
  };

  if (errors.length > 0) {
    return { success: false, errors, stats };
  }
  return { success: true, records, stats };
}

/**
 * Validate a parsed catalog, throwing on the first failure report.
 *
 * @throws CatalogValidationError listing every invalid entry
 */
export function loadCatalogOrThrow(input: unknown): SourceRecord[] {
  const result = loadCatalog(input);
  if (!result.success || result.records === undefined) {
    const errors = result.errors ?? [];
    throw new CatalogValidationError(
      `Invalid catalog: ${errors.length} issue(s) in ${result.stats.total} entries`,
      errors
    );
  }
  return result.records;
}

/**
 * Read the extracted text for one record.
 * Prefers a recovered abstract over the full text. Returns undefined when
 * there is no file or it holds no usable text.
 *
 * @throws CatalogValidationError when the record id would name a file
 *   outside `dir`
 */
export function readAuxiliaryText(dir: string, recordId: string): string | undefined {
  const root = resolve(dir);
  const path = resolve(root, `${recordId}.json`);
  if (dirname(path) !== root) {
    throw new CatalogValidationError(`Record id does not name a file in ${root}: ${recordId}`, [
      {
        recordId,
        field: "recordId",
        message: "record id must not contain path separators or '..'",
        type: "auxiliary_text",
      },
    ]);
  }
  if (!existsSync(path)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new CatalogValidationError(`Unreadable extracted-text file: ${path}`, [
      {
        recordId,
        field: "auxiliaryText",
        message: err instanceof Error ? err.message : String(err),
        type: "auxiliary_text",
      },
    ]);
  }

  const result = AuxiliaryTextFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogValidationError(`Invalid extracted-text file: ${path}`, [
      {
        recordId,
        field: "auxiliaryText",
        message: result.error.issues.map((i) => i.message).join("; "),
        type: "auxiliary_text",
      },
    ]);
  }

  const abstract = (result.data.abstract ?? "").trim();
  if (abstract) {
    return abstract;
  }
  const text = (result.data.text ?? "").trim();
  return text || undefined;
}

/**
 * Attach auxiliary text to records whose abstract is empty.
 */
export function attachAuxiliaryText(
  records: readonly SourceRecord[],
  dir: string
): SourceRecord[] {
  return records.map((record) => {
    if (record.abstract) {
      return record;
    }
    const auxiliaryText = readAuxiliaryText(dir, record.recordId);
    return auxiliaryText === undefined ? record : { ...record, auxiliaryText };
  });
}

/**
 * Load and validate a catalog file.
 */
export function loadCatalogFile(
  path: string,
  options: LoadCatalogFileOptions = {}
): SourceRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new CatalogValidationError(`Cannot read catalog: ${path}`, [
      {
        field: "file",
        message: err instanceof Error ? err.message : String(err),
        type: "file",
      },
    ]);
  }

  const records = loadCatalogOrThrow(raw);
  return options.auxTextDir ? attachAuxiliaryText(records, options.auxTextDir) : records;
}
