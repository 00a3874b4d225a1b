import * as fuzz from "fuzzball";
import type { CatalogIndex, ReclassifiedRecord } from "../types.js";
import { normalizeText, roundTo } from "../utils/text.js";

export interface PendingSubcategory {
  originalSubcategory: string;
  records: number;
  meanConfidence: number;
  maxConfidence: number;
}

export interface CanonicalSuggestion {
  label: string;
  /** 0–100 */
  score: number;
}

/** Records left as Keep, grouped so the most frequent labels get curated first. */
export function summarizePendingSubcategories(records: ReclassifiedRecord[]): PendingSubcategory[] {
  const groups = new Map<string, number[]>();
  for (const record of records) {
    if (record.action !== "Keep") {
      continue;
    }
    const scores = groups.get(record.originalSubcategory) ?? [];
    scores.push(record.confidence);
    groups.set(record.originalSubcategory, scores);
  }

  return [...groups.entries()]
    .map(([originalSubcategory, scores]) => ({
      originalSubcategory,
      records: scores.length,
      meanConfidence: roundTo(scores.reduce((sum, score) => sum + score, 0) / scores.length, 3),
      maxConfidence: roundTo(Math.max(...scores), 3),
    }))
    .sort(
      (left, right) =>
        right.records - left.records ||
        left.originalSubcategory.localeCompare(right.originalSubcategory, "pt-BR"),
    );
}

/** Character-level WRatio ranking over the distinct canonical labels; typos still match. */
export function suggestCanonicalLabels(
  query: string,
  index: CatalogIndex,
  limit = 5,
): CanonicalSuggestion[] {
  const normalized = normalizeText(query);
  if (!normalized || index.canonicalKeys.length === 0) {
    return [];
  }

  const matches = fuzz.extract(normalized, index.canonicalKeys, {
    scorer: fuzz.WRatio,
    limit,
  });

  const suggestions: CanonicalSuggestion[] = [];
  for (const [key, score] of matches) {
    const label = typeof key === "string" ? index.canonicalKeyToLabel.get(key) : undefined;
    if (label) {
      suggestions.push({ label, score: roundTo(score, 1) });
    }
  }
  return suggestions;
}

export function defaultCategoryFor(canonicalLabel: string, index: CatalogIndex): string | null {
  const key = normalizeText(canonicalLabel);
  if (!key) {
    return null;
  }
  return index.canonicalKeyToCategory.get(key) ?? null;
}

export interface CurationQueueItem extends PendingSubcategory {
  suggestions: CanonicalSuggestion[];
  suggestedCategory: string | null;
}

export function buildCurationQueue(
  records: ReclassifiedRecord[],
  index: CatalogIndex,
  limit = 5,
): CurationQueueItem[] {
  return summarizePendingSubcategories(records).map((pending) => {
    const suggestions = suggestCanonicalLabels(pending.originalSubcategory, index, limit);
    return {
      ...pending,
      suggestions,
      suggestedCategory: suggestions[0] ? defaultCategoryFor(suggestions[0].label, index) : null,
    };
  });
}
