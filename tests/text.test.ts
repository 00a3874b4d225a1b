import { describe, expect, it } from "vitest";
import {
  isBlankLabel,
  normalizeSubcategoryLabel,
  normalizeText,
  stripStorePrefix,
  tokenizeTerms,
} from "../src/utils/text.js";

describe("text normalization", () => {
  it("lower-cases, strips accents and collapses punctuation to spaces", () => {
    expect(normalizeText("  Salão   de Beleza! ")).toBe("salao de beleza");
    expect(normalizeText("Café & Bar")).toBe("cafe bar");
    expect(normalizeText("Rua A, 12 - Centro.")).toBe("rua a, 12 - centro.");
    expect(normalizeText("AÇOUGUE_São-João")).toBe("acougue_sao-joao");
  });

  it("coerces non-string input and treats missing values as empty", () => {
    expect(normalizeText(null)).toBe("");
    expect(normalizeText(undefined)).toBe("");
    expect(normalizeText(Number.NaN)).toBe("");
    expect(normalizeText(42)).toBe("42");
  });

  it("is idempotent", () => {
    const samples = [
      "Loja 12, Shopping Center",
      "  Ótica   Visão!!  ",
      "ÁGUA/ESGOTO (SP)",
      "İstanbul Kebab",
      "Padaria Pão Quente #2",
      "",
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });

  it("removes a leading store prefix from subcategory labels", () => {
    expect(stripStorePrefix("Loja de Roupas")).toBe("Roupas");
    expect(stripStorePrefix("LOJAS DAS Tintas")).toBe("Tintas");
    expect(stripStorePrefix("Comércio de Peças")).toBe("Peças");
    expect(stripStorePrefix("Come\u0301rcio de Pec\u0327as")).toBe("Pe\u00e7as");
    expect(normalizeSubcategoryLabel("Come\u0301rcio de Pec\u0327as")).toBe("pecas");
    expect(stripStorePrefix("Loja")).toBe("Loja");
    expect(stripStorePrefix("Lojista")).toBe("Lojista");
    expect(normalizeSubcategoryLabel("Loja de Roupas")).toBe(normalizeSubcategoryLabel("Roupas"));
    expect(normalizeSubcategoryLabel("Loja de Roupas")).toBe("roupas");
  });

  it("recognizes blank and placeholder labels", () => {
    expect(isBlankLabel("")).toBe(true);
    expect(isBlankLabel("  ")).toBe(true);
    expect(isBlankLabel("nan")).toBe(true);
    expect(isBlankLabel("None")).toBe(true);
    expect(isBlankLabel("Padaria")).toBe(false);
  });

  it("tokenizes runs of at least two word characters", () => {
    expect(tokenizeTerms("salao de beleza a 1 22")).toEqual(["salao", "de", "beleza", "22"]);
  });
});
