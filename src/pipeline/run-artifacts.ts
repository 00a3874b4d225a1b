import * as XLSX from "xlsx";
import type {
  ReclassificationResult,
  ReclassifiedRecord,
  RunArtifactFormat,
  RunArtifactSummary,
} from "../types.js";
import { makeSlug } from "../utils/text.js";
import type { CurationQueueItem } from "./curation.js";

export type RunArtifactKey = "result_xlsx" | "all_records_csv";

const ARTIFACT_MIME_TYPE: Record<RunArtifactKey, string> = {
  result_xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  all_records_csv: "text/csv; charset=utf-8",
};

export interface RunArtifactPayload extends RunArtifactSummary {
  key: RunArtifactKey;
  mimeType: string;
  content: Buffer;
}

/** Deliverable column order; passthrough input columns follow these. */
export const FINAL_COLUMNS = [
  "Nome",
  "Cat Original",
  "SubCat Original",
  "Sub-Categoria",
  "Categoria",
  "fonte",
  "acao",
  "Endereço",
  "confianca",
  "SubCat_Intermediaria",
  "ID",
] as const;

export const LOW_CONFIDENCE_COLUMNS = [
  "ID",
  "Nome",
  "Endereço",
  "Categoria",
  "Sub-Categoria",
  "acao",
  "fonte",
  "confianca",
] as const;

type FinalColumn = (typeof FINAL_COLUMNS)[number];
type ExportRow = Record<string, string | number>;

const BRAZIL_OFFSET_MS = -3 * 60 * 60 * 1000;

export function formatTimestampTag(now: Date): string {
  const local = new Date(now.getTime() + BRAZIL_OFFSET_MS);
  const pad = (value: number): string => String(value).padStart(2, "0");
  return `${pad(local.getUTCDate())}${pad(local.getUTCMonth() + 1)}_${pad(local.getUTCHours())}${pad(
    local.getUTCMinutes(),
  )}`;
}

export function toExportRow(record: ReclassifiedRecord): ExportRow {
  const row: Record<FinalColumn, string | number> = {
    Nome: record.name,
    "Cat Original": record.originalCategory,
    "SubCat Original": record.originalSubcategory,
    "Sub-Categoria": record.currentSubcategory,
    Categoria: record.currentCategory,
    fonte: record.source,
    acao: record.action ?? "",
    Endereço: record.address,
    confianca: record.confidence,
    SubCat_Intermediaria: record.intermediateSubcategory ?? "",
    ID: record.id,
  };

  const output: ExportRow = { ...row };
  for (const [header, value] of Object.entries(record.extras)) {
    if (!(header in output)) {
      output[header] = value;
    }
  }
  return output;
}

function pickColumns(row: ExportRow, columns: readonly string[]): ExportRow {
  const output: ExportRow = {};
  for (const column of columns) {
    output[column] = row[column] ?? "";
  }
  return output;
}

function exportHeaders(rows: ExportRow[]): string[] {
  const headers: string[] = [...FINAL_COLUMNS];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!headers.includes(key)) {
        headers.push(key);
      }
    }
  }
  return headers;
}

function curationRows(queue: CurationQueueItem[]): ExportRow[] {
  return queue.map((item) => ({
    "SubCat Original": item.originalSubcategory,
    Registros: item.records,
    Conf_media: item.meanConfidence,
    Conf_max: item.maxConfidence,
    Sugestoes: item.suggestions
      .map((suggestion) => `${suggestion.label} (${suggestion.score.toFixed(0)})`)
      .join(" | "),
    "Categoria sugerida": item.suggestedCategory ?? "",
  }));
}

function escapeCsv(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(rows: ExportRow[], headers: string[]): string {
  const lines = rows.map((row) =>
    headers.map((header) => escapeCsv(String(row[header] ?? ""))).join(","),
  );
  return [headers.map(escapeCsv).join(","), ...lines].join("\n");
}

function sheetFromRows(rows: ExportRow[], headers: string[]): XLSX.WorkSheet {
  return XLSX.utils.json_to_sheet(rows.map((row) => pickColumns(row, headers)), { header: headers });
}

export function buildRunArtifacts(input: {
  result: ReclassificationResult;
  curationQueue: CurationQueueItem[];
  baseName: string;
  now?: Date;
}): RunArtifactPayload[] {
  const tag = formatTimestampTag(input.now ?? new Date());
  const stem = `${makeSlug(input.baseName)}_processado_${tag}`;

  const deliverableRows = input.result.deliverable.map(toExportRow);
  const allRows = input.result.all.map(toExportRow);
  const lowConfidenceRows = input.result.lowConfidence.map(toExportRow);

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    sheetFromRows(deliverableRows, exportHeaders(deliverableRows)),
    "final",
  );
  XLSX.utils.book_append_sheet(
    workbook,
    sheetFromRows(lowConfidenceRows, [...LOW_CONFIDENCE_COLUMNS]),
    "baixa_confianca",
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(curationRows(input.curationQueue), {
      header: ["SubCat Original", "Registros", "Conf_media", "Conf_max", "Sugestoes", "Categoria sugerida"],
    }),
    "pendentes",
  );
  const xlsxContent: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

  const csvContent = Buffer.from(stringifyCsv(allRows, exportHeaders(allRows)), "utf8");

  const payloads: Array<{ key: RunArtifactKey; format: RunArtifactFormat; fileName: string; content: Buffer }> = [
    { key: "result_xlsx", format: "xlsx", fileName: `${stem}.xlsx`, content: xlsxContent },
    { key: "all_records_csv", format: "csv", fileName: `${stem}_todos.csv`, content: csvContent },
  ];

  return payloads.map((payload) => ({
    ...payload,
    mimeType: ARTIFACT_MIME_TYPE[payload.key],
    sizeBytes: payload.content.byteLength,
  }));
}
