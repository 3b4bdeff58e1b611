/**
 * Matrix cell schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CELL IDENTITY
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A cell is one scoring target: commodity × subdomain × complexity tier.
 * Its id encodes all three plus a per-commodity sequence number:
 *
 *   CMM-HREE-TEC-L1-001
 *       │    │   │  └── sequence within the commodity
 *       │    │   └───── complexity tier
 *       │    └───────── subdomain code without its hyphen (T-EC)
 *       └────────────── commodity code
 *
 * The id segments must agree with the row's own columns; a disagreement
 * means the matrix file was edited by hand and is rejected.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { z } from "zod";
import {
  CommodityCode,
  SubdomainCode,
  ComplexityLevel,
  Stratum,
} from "../config/pipeline/enums.js";

export const CELL_ID_PATTERN = /^CMM-([A-Z]+)-([A-Z]{3})-(L[1-4])-(\d{3})$/;

export const MatrixCellSchema = z
  .object({
    /** Position in the matrix definition (1-based) */
    questionNumber: z.number().int().min(1),

    cellId: z.string().regex(CELL_ID_PATTERN, "cell id must look like CMM-HREE-TEC-L1-001"),

    /** Commodity code (the category axis) */
    category: CommodityCode,

    /** Subdomain code (the topic axis) */
    topic: SubdomainCode,

    tier: ComplexityLevel,

    stratum: Stratum,

    /** What questions in this cell are about */
    topicFocus: z.string().min(1, "topic focus must not be empty"),
  })
  .strict()
  .superRefine((cell, ctx) => {
    const match = CELL_ID_PATTERN.exec(cell.cellId);
    if (match === null) {
      return;
    }
    const [, commodity, subdomain, tier] = match;
    if (commodity !== cell.category) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cellId"],
        message: `cell id commodity ${commodity} does not match column ${cell.category}`,
      });
    }
    if (subdomain !== cell.topic.replace("-", "")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cellId"],
        message: `cell id subdomain ${subdomain} does not match ${cell.topic}`,
      });
    }
    if (tier !== cell.tier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cellId"],
        message: `cell id tier ${tier} does not match column ${cell.tier}`,
      });
    }
  });

export type MatrixCell = z.infer<typeof MatrixCellSchema>;
