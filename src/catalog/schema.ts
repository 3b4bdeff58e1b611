/**
 * Source catalog schema.
 *
 * The catalog is a JSON array of bibliographic records as exported by the
 * document retrieval step. Field names follow the export (snake_case); both
 * the OSTI names (`osti_id`, `commodity_category`, `description`) and the
 * generic names (`record_id`, `category_tag`, `abstract`) are accepted.
 */

import { z } from "zod";

/**
 * A bibliographic record to be evaluated.
 */
export interface SourceRecord {
  /** Unique within the catalog; numeric ids are stored as strings */
  readonly recordId: string;
  /** Commodity code, or `subdomain_<code>` for a topic wildcard */
  readonly categoryTag: string;
  readonly title: string;
  /** May be empty */
  readonly abstract: string;
  readonly authors: readonly string[];
  readonly subjects: readonly string[];
  readonly publicationDate?: string;
  /** Extracted full text or recovered abstract, when available */
  readonly auxiliaryText?: string;
}

const RecordIdSchema = z
  .union([z.string().min(1), z.number().int().nonnegative()])
  .transform((id) => String(id));

const StringListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (typeof value === "string" ? (value ? [value] : []) : value));

export const CatalogEntrySchema = z
  .object({
    osti_id: RecordIdSchema.optional(),
    record_id: RecordIdSchema.optional(),
    commodity_category: z.string().min(1).optional(),
    category_tag: z.string().min(1).optional(),
    title: z.string().min(1, "title must not be empty"),
    description: z.string().nullish(),
    abstract: z.string().nullish(),
    authors: StringListSchema.default([]),
    subjects: StringListSchema.default([]),
    publication_date: z.string().nullish(),
  })
  .passthrough()
  .transform((entry, ctx): SourceRecord => {
    const recordId = entry.osti_id ?? entry.record_id;
    const categoryTag = entry.commodity_category ?? entry.category_tag;

    if (recordId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["osti_id"],
        message: "record needs osti_id or record_id",
      });
    }
    if (categoryTag === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["commodity_category"],
        message: "record needs commodity_category or category_tag",
      });
    }
    if (recordId === undefined || categoryTag === undefined) {
      return z.NEVER;
    }

    const publicationDate = entry.publication_date ?? undefined;
    return {
      recordId,
      categoryTag,
      title: entry.title,
      abstract: (entry.description || entry.abstract || "").trim(),
      authors: entry.authors,
      subjects: entry.subjects,
      ...(publicationDate ? { publicationDate } : {}),
    };
  });

export const CatalogSchema = z.array(z.unknown());

/**
 * Extracted-text file stored beside the catalog as `<recordId>.json`.
 */
export const AuxiliaryTextFileSchema = z
  .object({
    abstract: z.string().nullish(),
    text: z.string().nullish(),
  })
  .passthrough();

export type AuxiliaryTextFile = z.infer<typeof AuxiliaryTextFileSchema>;
