import path from "node:path";
import { CatalogFormatError } from "../errors.js";
import type { CatalogRow } from "../types.js";
import { cellToString, readTableFile, resolveColumn, type TableSheet } from "../utils/table.js";

export type CatalogField = keyof CatalogRow;

/** Accepted spellings per logical catalog column. Compared after header normalization. */
export const CATALOG_HEADER_ALIASES: Record<CatalogField, readonly string[]> = {
  originalLabel: [
    "SubCat Original",
    "SubCat_Original",
    "Subcategoria Original",
    "Sub-Categoria Original",
    "Sub Categoria Original",
    "original_label",
    "original",
  ],
  canonicalLabel: [
    "Nova SubCat",
    "Nova_SubCat",
    "Nova Subcategoria",
    "Subcategoria Nova",
    "Nova Sub-Categoria",
    "canonical_label",
    "canonical",
  ],
  owningCategory: [
    "categoria_oficial",
    "Categoria Oficial",
    "Categoria",
    "owning_category",
    "category",
  ],
};

export interface ResolveHeadersOptions {
  /** Used when the table has no category column (workbook tabs named after their category). */
  fallbackCategory?: string;
  tableName?: string;
}

export type ResolvedCatalogHeaders = {
  originalLabel: string;
  canonicalLabel: string;
  owningCategory: string | null;
};

export function resolveCatalogHeaders(
  headers: string[],
  options: ResolveHeadersOptions = {},
): ResolvedCatalogHeaders {
  const originalLabel = resolveColumn(headers, CATALOG_HEADER_ALIASES.originalLabel);
  const canonicalLabel = resolveColumn(headers, CATALOG_HEADER_ALIASES.canonicalLabel);
  const owningCategory = resolveColumn(headers, CATALOG_HEADER_ALIASES.owningCategory);

  const missing: CatalogField[] = [];
  if (!originalLabel) missing.push("originalLabel");
  if (!canonicalLabel) missing.push("canonicalLabel");
  if (!owningCategory && !options.fallbackCategory?.trim()) missing.push("owningCategory");

  if (!originalLabel || !canonicalLabel || missing.length > 0) {
    const where = options.tableName ? ` in "${options.tableName}"` : "";
    throw new CatalogFormatError(
      `Catalog${where} is missing required columns: ${missing.join(", ")}. Found headers: ${
        headers.length > 0 ? headers.join(", ") : "(none)"
      }.`,
      missing,
    );
  }

  return { originalLabel, canonicalLabel, owningCategory: owningCategory ?? null };
}

export interface CatalogTableResult {
  rows: CatalogRow[];
  skippedRows: number;
}

export function mapTableToCatalog(
  table: TableSheet,
  options: ResolveHeadersOptions = {},
): CatalogTableResult {
  const headers = resolveCatalogHeaders(table.headers, {
    tableName: options.tableName ?? table.name,
    fallbackCategory: options.fallbackCategory,
  });
  const fallbackCategory = options.fallbackCategory?.trim() ?? "";

  const rows: CatalogRow[] = [];
  let skippedRows = 0;
  for (const raw of table.rows) {
    const originalLabel = cellToString(raw[headers.originalLabel]);
    const canonicalLabel = cellToString(raw[headers.canonicalLabel]);
    const owningCategory =
      (headers.owningCategory ? cellToString(raw[headers.owningCategory]) : "") || fallbackCategory;

    if (!originalLabel || !canonicalLabel || !owningCategory) {
      skippedRows += 1;
      continue;
    }
    rows.push({ originalLabel, canonicalLabel, owningCategory });
  }

  return { rows, skippedRows };
}

export interface LoadedCatalog extends CatalogTableResult {
  fileName: string;
  sheets: string[];
}

/**
 * CSV catalogs need a category column. In workbooks every sheet is read, and a
 * sheet without a category column takes its own name as the category.
 */
export async function readCatalogFile(filePath: string): Promise<LoadedCatalog> {
  const extension = path.extname(filePath).toLowerCase();
  const tables = await readTableFile(filePath);
  const isWorkbook = extension !== ".csv";

  const rows: CatalogRow[] = [];
  let skippedRows = 0;
  for (const table of tables) {
    if (isWorkbook && table.headers.length === 0 && table.rows.length === 0) {
      continue;
    }
    const mapped = mapTableToCatalog(table, {
      tableName: table.name,
      fallbackCategory: isWorkbook ? table.name : undefined,
    });
    rows.push(...mapped.rows);
    skippedRows += mapped.skippedRows;
  }

  if (rows.length === 0) {
    throw new CatalogFormatError(`Catalog file ${path.basename(filePath)} has no usable rows.`);
  }

  return {
    fileName: path.basename(filePath),
    sheets: tables.map((table) => table.name),
    rows,
    skippedRows,
  };
}
