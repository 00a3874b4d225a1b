import type { WorkingRecord } from "../types.js";
import { normalizeText } from "../utils/text.js";
import { EXCLUSION_LABEL, isExclusionLabel } from "./catalog-index.js";

export const ADDRESS_EXCLUSION_KEYWORDS = [
  "shopping",
  "loja",
  "lojas",
  "lj",
  "quiosque",
  "box",
  "galeria",
  "mall",
] as const;

const ADDRESS_EXCLUSION_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}_])(?:${ADDRESS_EXCLUSION_KEYWORDS.join("|")})(?![\\p{L}\\p{N}_])`,
  "u",
);

export function isExcludedAddress(address: string): boolean {
  return ADDRESS_EXCLUSION_PATTERN.test(normalizeText(address));
}

/**
 * Last word on every record, whatever earlier stages decided. The guard rail is
 * not applied here: excluded records leave the normal category reporting.
 */
export function applyAddressRule(records: WorkingRecord[]): { excluded: number } {
  let excluded = 0;
  for (const record of records) {
    if (!isExcludedAddress(record.address)) {
      continue;
    }
    if (!isExclusionLabel(record.currentSubcategory)) {
      record.previousSubcategory = record.currentSubcategory;
    }
    record.currentSubcategory = EXCLUSION_LABEL;
    record.action = "Exclude";
    record.source = "rule-address";
    record.confidence = 1;
    excluded += 1;
  }
  return { excluded };
}
