import { CatalogFormatError } from "../errors.js";
import type { CatalogEntry, CatalogIndex, CatalogRow } from "../types.js";
import { uniqueInOrder } from "../utils/collections.js";
import { normalizeSubcategoryLabel, normalizeText } from "../utils/text.js";

export const EXCLUSION_LABEL = "Excluir";

export function isExclusionLabel(label: string): boolean {
  return label.trim().toLowerCase() === EXCLUSION_LABEL.toLowerCase();
}

export function toCatalogEntry(row: CatalogRow): CatalogEntry {
  return {
    originalLabel: row.originalLabel,
    canonicalLabel: row.canonicalLabel,
    owningCategory: row.owningCategory,
    kOriginal: normalizeSubcategoryLabel(row.originalLabel),
    kCanonical: normalizeText(row.canonicalLabel),
    kCategory: normalizeText(row.owningCategory),
  };
}

function assertCompleteRows(rows: CatalogRow[]): void {
  const incomplete = rows.findIndex(
    (row) =>
      !row.originalLabel.trim() || !row.canonicalLabel.trim() || !row.owningCategory.trim(),
  );
  if (incomplete >= 0) {
    throw new CatalogFormatError(
      `Catalog row ${incomplete + 1} is missing originalLabel, canonicalLabel or owningCategory.`,
    );
  }
}

/**
 * Rows repeating the same (original, canonical, category) keys collapse to the
 * last one, which also takes the position of that last occurrence.
 */
export function deduplicateCatalogEntries(entries: CatalogEntry[]): CatalogEntry[] {
  const byKey = new Map<string, CatalogEntry>();
  for (const entry of entries) {
    const key = JSON.stringify([entry.kOriginal, entry.kCanonical, entry.kCategory]);
    byKey.delete(key);
    byKey.set(key, entry);
  }
  return [...byKey.values()];
}

export function buildCatalogIndex(rows: CatalogRow[]): CatalogIndex {
  assertCompleteRows(rows);

  const entries = deduplicateCatalogEntries(rows.map(toCatalogEntry));
  const originalToCanonical = new Map<string, string>();
  const originalToCanonicalKey = new Map<string, string>();
  const canonicalKeyToCategory = new Map<string, string>();
  const canonicalKeyToLabel = new Map<string, string>();

  for (const entry of entries) {
    if (entry.kOriginal) {
      originalToCanonical.set(entry.kOriginal, entry.canonicalLabel);
      originalToCanonicalKey.set(entry.kOriginal, entry.kCanonical);
    }
    if (entry.kCanonical) {
      canonicalKeyToCategory.set(entry.kCanonical, entry.owningCategory);
      canonicalKeyToLabel.set(entry.kCanonical, entry.canonicalLabel);
    }
  }

  return {
    entries,
    originalKeys: uniqueInOrder(entries.map((entry) => entry.kOriginal).filter(Boolean)),
    canonicalKeys: uniqueInOrder(entries.map((entry) => entry.kCanonical).filter(Boolean)),
    originalToCanonical,
    originalToCanonicalKey,
    canonicalKeyToCategory,
    canonicalKeyToLabel,
  };
}

/** Returns a new snapshot; session additions win over earlier rows with the same keys. */
export function extendCatalog(rows: CatalogRow[], additions: CatalogRow[]): CatalogRow[] {
  if (additions.length === 0) {
    return [...rows];
  }
  return deduplicateCatalogEntries([...rows, ...additions].map(toCatalogEntry)).map((entry) => ({
    originalLabel: entry.originalLabel,
    canonicalLabel: entry.canonicalLabel,
    owningCategory: entry.owningCategory,
  }));
}

export interface CatalogCategorySummary {
  category: string;
  originalLabels: number;
  canonicalLabels: number;
  mappings: number;
}

export interface CatalogSummary {
  categories: number;
  originalLabels: number;
  canonicalLabels: number;
  mappings: number;
  byCategory: CatalogCategorySummary[];
}

export function summarizeCatalog(index: CatalogIndex): CatalogSummary {
  const groups = new Map<string, CatalogEntry[]>();
  for (const entry of index.entries) {
    const list = groups.get(entry.owningCategory) ?? [];
    list.push(entry);
    groups.set(entry.owningCategory, list);
  }

  const byCategory = [...groups.entries()]
    .map(([category, entries]) => ({
      category,
      originalLabels: new Set(entries.map((entry) => entry.originalLabel)).size,
      canonicalLabels: new Set(entries.map((entry) => entry.canonicalLabel)).size,
      mappings: entries.length,
    }))
    .sort((left, right) => left.category.localeCompare(right.category, "pt-BR"));

  return {
    categories: groups.size,
    originalLabels: new Set(index.entries.map((entry) => entry.originalLabel)).size,
    canonicalLabels: new Set(index.entries.map((entry) => entry.canonicalLabel)).size,
    mappings: index.entries.length,
    byCategory,
  };
}
