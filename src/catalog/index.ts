/**
 * Source catalog module.
 */

export {
  CatalogEntrySchema,
  AuxiliaryTextFileSchema,
  type SourceRecord,
  type AuxiliaryTextFile,
} from "./schema.js";

export {
  loadCatalog,
  loadCatalogOrThrow,
  loadCatalogFile,
  readAuxiliaryText,
  attachAuxiliaryText,
  CatalogValidationError,
  type CatalogIssue,
  type CatalogLoadResult,
  type LoadCatalogFileOptions,
} from "./loader.js";
