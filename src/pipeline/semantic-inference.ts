import type { CatalogIndex, SemanticIndex, WorkingRecord } from "../types.js";
import { isBlankLabel, normalizeText, roundTo } from "../utils/text.js";
import { isExclusionLabel } from "./catalog-index.js";
import { assignCanonical } from "./guard-rail.js";

export interface SemanticInferenceContext {
  index: CatalogIndex;
  /** Index over the catalog's canonical labels. */
  canonicalIndex: SemanticIndex;
  loThreshold: number;
}

export interface SemanticInferenceResult {
  inferred: number;
  kept: number;
}

/** Name counts twice when there is no subcategory to lean on. */
export function buildInferenceQuery(record: WorkingRecord): string {
  const parts = isBlankLabel(record.currentSubcategory)
    ? [record.name, record.name, record.address, record.currentCategory]
    : [record.name, record.address, record.currentCategory];
  return normalizeText(parts.join(" "));
}

export function applySemanticInference(
  records: WorkingRecord[],
  ctx: SemanticInferenceContext,
): SemanticInferenceResult {
  const result: SemanticInferenceResult = { inferred: 0, kept: 0 };

  for (const record of records) {
    if (record.action !== null) {
      continue;
    }

    const query = buildInferenceQuery(record);
    const best = query ? ctx.canonicalIndex.query(query) : { term: "", similarity: 0 };
    const label = best.term ? ctx.index.canonicalKeyToLabel.get(best.term) : undefined;

    if (label !== undefined && best.similarity >= ctx.loThreshold) {
      assignCanonical(
        record,
        label,
        { action: "Infer", source: "semantic", confidence: roundTo(best.similarity, 4) },
        ctx.index,
      );
      result.inferred += 1;
      continue;
    }

    // A label that already reads as the sentinel stays excluded.
    record.action = isExclusionLabel(record.currentSubcategory) ? "Exclude" : "Keep";
    record.source = "none";
    record.confidence = roundTo(best.similarity, 4);
    result.kept += 1;
  }

  return result;
}
