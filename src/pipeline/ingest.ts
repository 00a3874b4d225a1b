import { InputFormatError } from "../errors.js";
import type { InputRecord } from "../types.js";
import { cellToString, readTableFile, resolveColumn, type TableSheet } from "../utils/table.js";

type InputField = Exclude<keyof InputRecord, "extras">;

const INPUT_FIELDS: readonly InputField[] = ["id", "name", "category", "subcategory", "address"];

export const INPUT_HEADER_ALIASES: Record<InputField, readonly string[]> = {
  id: ["ID", "codigo", "código", "cod", "record_id"],
  name: ["Nome", "name", "Nome Fantasia", "razao_social", "titulo"],
  category: ["Categoria", "category", "cat"],
  subcategory: ["Sub-Categoria", "Subcategoria", "Sub Categoria", "subcategory", "sub_categoria"],
  address: ["Endereço", "endereco", "address", "logradouro"],
};

export function mapTableToInput(table: TableSheet): InputRecord[] {
  const columns: Partial<Record<InputField, string>> = {};
  for (const field of INPUT_FIELDS) {
    columns[field] = resolveColumn(table.headers, INPUT_HEADER_ALIASES[field]);
  }

  const nameColumn = columns.name;
  if (!nameColumn) {
    throw new InputFormatError(
      `Input table must include a name column (Nome or alias). Found headers: ${
        table.headers.join(", ") || "(none)"
      }.`,
    );
  }

  const known = new Set(Object.values(columns));
  const extraHeaders = table.headers.filter((header) => !known.has(header));
  const read = (row: Record<string, unknown>, field: InputField): string => {
    const column = columns[field];
    return column ? cellToString(row[column]) : "";
  };

  return table.rows.map((row) => {
    const extras: Record<string, string> = {};
    for (const header of extraHeaders) {
      extras[header] = cellToString(row[header]);
    }
    return {
      id: read(row, "id"),
      name: cellToString(row[nameColumn]),
      address: read(row, "address"),
      category: read(row, "category"),
      subcategory: read(row, "subcategory"),
      extras,
    };
  });
}

/** First sheet of a workbook, or the CSV table. */
export async function readInputFile(filePath: string): Promise<InputRecord[]> {
  const [first] = await readTableFile(filePath);
  if (!first) {
    return [];
  }
  return mapTableToInput(first);
}
