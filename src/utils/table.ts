import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";
import { normalizeText } from "./text.js";

export type TableRow = Record<string, unknown>;

export interface TableSheet {
  name: string;
  headers: string[];
  rows: TableRow[];
}

export function normalizeHeader(header: string): string {
  return normalizeText(header).replace(/\s+/g, "_");
}

/** Finds the real header matching one of `aliases`; aliases are compared in normalized form. */
export function resolveColumn(headers: string[], aliases: readonly string[]): string | undefined {
  const normalizedMap = new Map<string, string>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    if (!normalizedMap.has(key)) {
      normalizedMap.set(key, header);
    }
  }

  for (const alias of aliases) {
    const realHeader = normalizedMap.get(normalizeHeader(alias));
    if (realHeader !== undefined) {
      return realHeader;
    }
  }
  return undefined;
}

export function cellToString(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "number" && Number.isNaN(value)) {
    return "";
  }
  return String(value).trim();
}

function headersOf(rows: TableRow[], fallback: string[] = []): string[] {
  const seen = new Set<string>(fallback);
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}

export function parseCsvTable(content: string, name = "csv"): TableSheet {
  const records: string[][] = parse(content, {
    skip_empty_lines: true,
    bom: true,
    trim: true,
  });

  const [headerRow = [], ...body] = records;
  const headers = headerRow.filter(Boolean);
  const rows = body.map((values) => {
    const row: TableRow = {};
    headerRow.forEach((header, position) => {
      if (header) {
        row[header] = values[position] ?? "";
      }
    });
    return row;
  });
  return { name, headers, rows };
}

export function workbookToTables(workbook: XLSX.WorkBook): TableSheet[] {
  return workbook.SheetNames.map((sheetName) => {
    const worksheet = workbook.Sheets[sheetName];
    const headerRows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: "" });
    const declared = (headerRows[0] ?? []).map((cell) => cellToString(cell)).filter(Boolean);
    const rows = XLSX.utils.sheet_to_json<TableRow>(worksheet, { defval: "" });
    return { name: sheetName, headers: headersOf(rows, declared), rows };
  });
}

/** Reads every sheet of a workbook, or the single table of a CSV file. */
export async function readTableFile(filePath: string): Promise<TableSheet[]> {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === ".csv") {
    const content = await readFile(filePath, "utf8");
    return [parseCsvTable(content, path.basename(filePath, extension))];
  }

  if (extension === ".xlsx" || extension === ".xls") {
    const buffer = await readFile(filePath);
    return workbookToTables(XLSX.read(buffer, { type: "buffer" }));
  }

  throw new Error(`Unsupported input format: ${extension}. Use .csv or .xlsx.`);
}
