export { CatalogFormatError, InputFormatError } from "./errors.js";
export { CATALOG_HEADER_ALIASES, readCatalogFile, resolveCatalogHeaders } from "./catalog/load.js";
export {
  buildCatalogIndex,
  EXCLUSION_LABEL,
  extendCatalog,
  isExclusionLabel,
  summarizeCatalog,
} from "./pipeline/catalog-index.js";
export { buildSemanticIndex } from "./pipeline/semantic-index.js";
export { reclassifyRecords, type ReclassifyOptions } from "./pipeline/run.js";
export { runReclassificationJob } from "./pipeline/run-job.js";
export {
  buildCurationQueue,
  defaultCategoryFor,
  suggestCanonicalLabels,
  summarizePendingSubcategories,
} from "./pipeline/curation.js";
export { readInputFile } from "./pipeline/ingest.js";
export { RunLogger } from "./logging/run-logger.js";
export { normalizeText, stripStorePrefix } from "./utils/text.js";
export type * from "./types.js";
