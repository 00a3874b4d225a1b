import type { CatalogIndex, RecordAction, RecordSource, WorkingRecord } from "../types.js";
import { normalizeText } from "../utils/text.js";
import { isExclusionLabel } from "./catalog-index.js";

export interface CanonicalDecision {
  /** Action used unless the label is the exclusion sentinel, which always means Exclude. */
  action: Extract<RecordAction, "Correct" | "Infer">;
  source: RecordSource;
  confidence: number;
}

/** Pulls the record's category onto the owning category of `canonicalKey`, if the catalog knows it. */
export function applyGuardRail(
  record: WorkingRecord,
  canonicalKey: string,
  index: CatalogIndex,
): WorkingRecord {
  if (!canonicalKey) {
    return record;
  }
  const owningCategory = index.canonicalKeyToCategory.get(canonicalKey);
  if (owningCategory) {
    record.currentCategory = owningCategory;
  }
  return record;
}

export function assignCanonical(
  record: WorkingRecord,
  canonicalLabel: string,
  decision: CanonicalDecision,
  index: CatalogIndex,
): WorkingRecord {
  record.previousSubcategory = record.currentSubcategory;
  record.currentSubcategory = canonicalLabel;
  record.action = isExclusionLabel(canonicalLabel) ? "Exclude" : decision.action;
  record.source = decision.source;
  record.confidence = decision.confidence;
  return applyGuardRail(record, normalizeText(canonicalLabel), index);
}
