import slugifyModule from "slugify";

const STORE_PREFIX_PATTERN =
  /^\s*(?:lojas?|com[eé]rcio|store|shop)\s+(?:(?:de|da|do|das|dos|of)\s+)?(?=\S)/i;

const PLACEHOLDER_LABELS = new Set(["", "nan", "none", "null", "-"]);

function coerceText(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "number" && Number.isNaN(value)) {
    return "";
  }
  return typeof value === "string" ? value : String(value);
}

export function normalizeText(value: unknown): string {
  return coerceText(value)
    .normalize("NFD")
    .toLowerCase()
    .replace(/\p{M}/gu, "")
    .replace(/[^\p{L}\p{N}_\s,.-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** "Loja de Roupas" and "Roupas" should land on the same key. */
export function stripStorePrefix(label: unknown): string {
  return coerceText(label).normalize("NFC").replace(STORE_PREFIX_PATTERN, "");
}

export function normalizeSubcategoryLabel(label: unknown): string {
  return normalizeText(stripStorePrefix(label));
}

export function isBlankLabel(label: unknown): boolean {
  return PLACEHOLDER_LABELS.has(coerceText(label).trim().toLowerCase());
}

export function tokenizeTerms(text: string): string[] {
  return text.match(/[\p{L}\p{N}_]{2,}/gu) ?? [];
}

export function makeSlug(input: string): string {
  const slugify = slugifyModule as unknown as (
    value: string,
    options?: {
      lower?: boolean;
      strict?: boolean;
      trim?: boolean;
    },
  ) => string;

  const slug = slugify(input, {
    lower: true,
    strict: true,
    trim: true,
  });

  return slug.length > 0 ? slug.slice(0, 64) : "resultado";
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
