import type { CatalogRow, InputRecord } from "../src/types.js";

export function inputRecord(partial: Partial<InputRecord> & Pick<InputRecord, "name">): InputRecord {
  return {
    id: "",
    address: "",
    category: "",
    subcategory: "",
    extras: {},
    ...partial,
  };
}

export function catalogRow(
  originalLabel: string,
  canonicalLabel: string,
  owningCategory: string,
): CatalogRow {
  return { originalLabel, canonicalLabel, owningCategory };
}

export const BASE_CATALOG: CatalogRow[] = [
  catalogRow("Cabeleireiro", "Salão de Beleza", "Serviços"),
  catalogRow("Panificadora", "Padaria", "Alimentação"),
  catalogRow("Pizzaria Delivery", "Pizzaria", "Alimentação"),
  catalogRow("Igreja", "Excluir", "Outros"),
  catalogRow("Mecânica", "Oficina Mecânica", "Automotivo"),
];
