/**
 * Domain enumerations for the evaluation matrix.
 *
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║  These enums are the canonical axes of the allocation matrix.             ║
 * ║                                                                           ║
 * ║  Any change to these enums affects:                                       ║
 * ║    - The allocation matrix definition (data/allocation-matrix.md)         ║
 * ║    - Routing of catalog records to cells                                  ║
 * ║    - Prompt rendering and coverage reporting                              ║
 * ║    - Comparability with earlier batch runs                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { z } from "zod";

/**
 * Commodity groups (the category axis).
 *
 * Catalog records tagged with one of these codes are evaluated against every
 * cell of that commodity, across all subdomains.
 */
export const CommodityCode = z.enum([
  "HREE",
  "CO",
  "LI",
  "GA",
  "GR",
  "LREE",
  "NI",
  "CU",
  "GE",
  "OTH",
]);
export type CommodityCode = z.infer<typeof CommodityCode>;

/**
 * Knowledge subdomains (the topic axis).
 *
 * Grouped into four domains:
 *   Technical:     T-EC, T-PM, T-GO
 *   Quantitative:  Q-PS, Q-TF, Q-EP
 *   Geopolitical:  G-PR, G-BM
 *   Systemic:      S-CC, S-ST
 */
export const SubdomainCode = z.enum([
  "T-EC",
  "T-PM",
  "T-GO",
  "Q-PS",
  "Q-TF",
  "Q-EP",
  "G-PR",
  "G-BM",
  "S-CC",
  "S-ST",
]);
export type SubdomainCode = z.infer<typeof SubdomainCode>;

/**
 * Question complexity tiers, from single-fact recall (L1) to multi-source
 * synthesis (L4).
 */
export const ComplexityLevel = z.enum(["L1", "L2", "L3", "L4"]);
export type ComplexityLevel = z.infer<typeof ComplexityLevel>;

/**
 * Sampling stratum of a cell: A is the core sample, B extends coverage.
 */
export const Stratum = z.enum(["A", "B"]);
export type Stratum = z.infer<typeof Stratum>;

export const COMMODITY_DISPLAY: Readonly<Record<CommodityCode, string>> = {
  HREE: "Heavy Rare Earth Elements",
  CO: "Cobalt",
  LI: "Lithium",
  GA: "Gallium",
  GR: "Graphite",
  LREE: "Light Rare Earth Elements",
  NI: "Nickel",
  CU: "Copper",
  GE: "Germanium",
  OTH: "Other (PGMs, Tungsten, Manganese, Titanium)",
};

export const SUBDOMAIN_DISPLAY: Readonly<Record<SubdomainCode, string>> = {
  "T-EC": "Extraction Chemistry",
  "T-PM": "Processing Metallurgy",
  "T-GO": "Geological Occurrence",
  "Q-PS": "Production Statistics",
  "Q-TF": "Trade Flows",
  "Q-EP": "Economic Parameters",
  "G-PR": "Policy/Regulatory",
  "G-BM": "Bilateral/Multilateral",
  "S-CC": "Cross-Commodity",
  "S-ST": "Supply Chain Topology",
};

export const COMPLEXITY_DISPLAY: Readonly<Record<ComplexityLevel, string>> = {
  L1: "Factual",
  L2: "Relational",
  L3: "Inferential",
  L4: "Analytical",
};

export const DOMAIN_GROUPS: Readonly<Record<string, readonly SubdomainCode[]>> = {
  Technical: ["T-EC", "T-PM", "T-GO"],
  Quantitative: ["Q-PS", "Q-TF", "Q-EP"],
  Geopolitical: ["G-PR", "G-BM"],
  Systemic: ["S-CC", "S-ST"],
};

/**
 * Subdomain codes as they appear inside cell ids (hyphen removed),
 * e.g. CMM-HREE-TEC-L1-001.
 */
export const CELL_ID_SUBDOMAIN: Readonly<Record<string, SubdomainCode>> = Object.fromEntries(
  SubdomainCode.options.map((code) => [code.replace("-", ""), code])
);
