import type { CatalogIndex, SemanticIndex, WorkingRecord } from "../types.js";
import { normalizeText, roundTo } from "../utils/text.js";
import { isExclusionLabel } from "./catalog-index.js";
import { assignCanonical } from "./guard-rail.js";

export const DEFAULT_PROBLEMATIC_THRESHOLD = 0.35;

export interface SemanticValidatorContext {
  index: CatalogIndex;
  /** Index over the catalog's original labels. */
  originalIndex: SemanticIndex;
  loThreshold: number;
  problematicThreshold: number;
  /** Canonical labels that are prone to false positives, as given in configuration. */
  problematicSubcategories: readonly string[];
}

export interface SemanticValidatorResult {
  reviewed: number;
  overridden: number;
  flaggedForVerification: number;
}

export function applySemanticValidator(
  records: WorkingRecord[],
  ctx: SemanticValidatorContext,
): SemanticValidatorResult {
  const problematicKeys = new Set(ctx.problematicSubcategories.map((label) => normalizeText(label)));
  const result: SemanticValidatorResult = { reviewed: 0, overridden: 0, flaggedForVerification: 0 };

  for (const record of records) {
    if (record.source !== "catalog" && record.source !== "catalog-contains") {
      continue;
    }
    result.reviewed += 1;

    const currentKey = normalizeText(record.currentSubcategory);
    const isProblematic = problematicKeys.has(currentKey);
    const threshold = isProblematic ? ctx.problematicThreshold : ctx.loThreshold;

    const query = normalizeText(record.name);
    const best = query ? ctx.originalIndex.query(query) : { term: "", similarity: 0 };
    const predictedKey = best.term ? ctx.index.originalToCanonicalKey.get(best.term) : undefined;
    const predictedLabel =
      predictedKey !== undefined ? ctx.index.canonicalKeyToLabel.get(predictedKey) : undefined;

    if (
      predictedKey !== undefined &&
      predictedLabel !== undefined &&
      predictedKey !== currentKey &&
      best.similarity >= threshold
    ) {
      assignCanonical(
        record,
        predictedLabel,
        {
          action: "Correct",
          source: "semantic-validator",
          confidence: roundTo(best.similarity, 4),
        },
        ctx.index,
      );
      result.overridden += 1;
      continue;
    }

    if (
      isProblematic &&
      best.similarity < ctx.problematicThreshold &&
      !isExclusionLabel(record.currentSubcategory)
    ) {
      record.action = "Verify";
      result.flaggedForVerification += 1;
    }
  }

  return result;
}
