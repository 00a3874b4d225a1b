import type { CatalogIndex, ContainsField, WorkingRecord } from "../types.js";
import { normalizeSubcategoryLabel, normalizeText } from "../utils/text.js";
import { assignCanonical } from "./guard-rail.js";

export const EXACT_MATCH_CONFIDENCE = 0.99;
export const CONTAINS_MATCH_CONFIDENCE = 0.92;
const MIN_CONTAINS_KEY_LENGTH = 2;

export interface MatchStageResult {
  matched: number;
}

export function applyExactCatalogMatch(
  records: WorkingRecord[],
  index: CatalogIndex,
): MatchStageResult {
  let matched = 0;
  for (const record of records) {
    const key = normalizeSubcategoryLabel(record.currentSubcategory);
    const canonical = key ? index.originalToCanonical.get(key) : undefined;
    if (canonical === undefined) {
      continue;
    }
    assignCanonical(
      record,
      canonical,
      { action: "Correct", source: "catalog", confidence: EXACT_MATCH_CONFIDENCE },
      index,
    );
    matched += 1;
  }
  return { matched };
}

function buildHaystack(record: WorkingRecord, fields: readonly ContainsField[]): string {
  return normalizeText(fields.map((field) => record[field]).join(" "));
}

/**
 * Catalog order is the tie-break: the first original label found inside the
 * haystack wins, however short it is.
 */
export function findContainedOriginalKey(haystack: string, index: CatalogIndex): string | null {
  if (!haystack) {
    return null;
  }
  for (const key of index.originalKeys) {
    if (key.length >= MIN_CONTAINS_KEY_LENGTH && haystack.includes(key)) {
      return key;
    }
  }
  return null;
}

export function applyContainsCatalogMatch(
  records: WorkingRecord[],
  index: CatalogIndex,
  fields: readonly ContainsField[] = ["name", "address"],
): MatchStageResult {
  let matched = 0;
  for (const record of records) {
    if (record.action !== null) {
      continue;
    }
    const key = findContainedOriginalKey(buildHaystack(record, fields), index);
    const canonical = key ? index.originalToCanonical.get(key) : undefined;
    if (canonical === undefined) {
      continue;
    }
    assignCanonical(
      record,
      canonical,
      { action: "Correct", source: "catalog-contains", confidence: CONTAINS_MATCH_CONFIDENCE },
      index,
    );
    matched += 1;
  }
  return { matched };
}
