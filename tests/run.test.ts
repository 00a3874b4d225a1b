import { describe, expect, it } from "vitest";
import { RunLogger } from "../src/logging/run-logger.js";
import { buildCatalogIndex, isExclusionLabel } from "../src/pipeline/catalog-index.js";
import { reclassifyRecords, resolveThresholds } from "../src/pipeline/run.js";
import type { InputRecord } from "../src/types.js";
import { normalizeText } from "../src/utils/text.js";
import { BASE_CATALOG, inputRecord } from "./fixtures.js";

const BATCH: InputRecord[] = [
  inputRecord({
    id: "1",
    name: "Studio Ana",
    category: "Outros",
    subcategory: "Cabeleireiro",
    address: "Rua A 1",
  }),
  inputRecord({
    id: "2",
    name: "Padaria Pão Quente",
    category: "Outros",
    subcategory: "",
    address: "Rua das Flores 10",
  }),
  inputRecord({
    id: "3",
    name: "Loja Boa",
    category: "Varejo",
    subcategory: "Roupas",
    address: "Shopping Center Norte, Loja 5",
  }),
  inputRecord({ id: "4", name: "Pizzaria Delivery do Zé", category: "Outros", subcategory: "Lanches" }),
  inputRecord({ id: "5", name: "Oficina do Zé", category: "Mecânica", subcategory: "Serviços Gerais" }),
  inputRecord({ id: "6", name: "Joana Silva", category: "Profissionais", subcategory: "Advocacia" }),
];

function silentLogger(lines: string[] = []): RunLogger {
  return new RunLogger({ runId: "test-run", consoleWrite: (line) => lines.push(line) });
}

describe("reclassifyRecords", () => {
  it("corrects an exact catalog hit and pulls the category along", () => {
    const [record] = reclassifyRecords([BATCH[0]], BASE_CATALOG).all;

    expect(record).toMatchObject({
      currentSubcategory: "Salão de Beleza",
      currentCategory: "Serviços",
      originalSubcategory: "Cabeleireiro",
      originalCategory: "Outros",
      action: "Correct",
      source: "catalog",
      confidence: 0.99,
      intermediateSubcategory: null,
    });
  });

  it("infers a blank subcategory from the name", () => {
    const [record] = reclassifyRecords([BATCH[1]], BASE_CATALOG).all;

    expect(record).toMatchObject({
      currentSubcategory: "Padaria",
      currentCategory: "Alimentação",
      action: "Infer",
      source: "semantic",
      confidence: 1,
    });
  });

  it("excludes store addresses after every other stage", () => {
    const [record] = reclassifyRecords([BATCH[2]], BASE_CATALOG).all;

    expect(record).toMatchObject({
      currentSubcategory: "Excluir",
      currentCategory: "Varejo",
      action: "Exclude",
      source: "rule-address",
      confidence: 1,
      intermediateSubcategory: "Roupas",
    });
  });

  it("matches original labels contained in the name", () => {
    const [record] = reclassifyRecords([BATCH[3]], BASE_CATALOG).all;

    expect(record).toMatchObject({
      currentSubcategory: "Pizzaria",
      currentCategory: "Alimentação",
      action: "Correct",
      source: "catalog-contains",
      confidence: 0.92,
    });
  });

  it("reports the batch metrics and low-confidence view", () => {
    const result = reclassifyRecords(BATCH, BASE_CATALOG);

    expect(result.metrics).toMatchObject({
      total: 6,
      catalogExact: 1,
      catalogContains: 1,
      semanticValidated: 0,
      semanticInferred: 2,
      kept: 1,
      verify: 0,
      excluded: 1,
      ruleAddress: 1,
      lowConfidence: 1,
    });
    expect(result.lowConfidence.map((record) => record.id)).toEqual(["5"]);
    expect(result.lowConfidence[0]).toMatchObject({
      currentSubcategory: "Oficina Mecânica",
      currentCategory: "Automotivo",
      confidence: 0.8165,
    });
    expect(result.deliverable).toHaveLength(6);
  });

  it("treats an input already labelled with the sentinel as excluded", () => {
    const result = reclassifyRecords(
      [inputRecord({ name: "Joana Silva", category: "Outros", subcategory: "Excluir" })],
      BASE_CATALOG,
      { dropExcludedFromDeliverable: true },
    );

    expect(result.all[0]).toMatchObject({
      currentSubcategory: "Excluir",
      action: "Exclude",
      source: "none",
      confidence: 0,
      intermediateSubcategory: "Excluir",
    });
    expect(result.metrics).toMatchObject({ excluded: 1, kept: 0 });
    expect(result.metrics.byAction.Exclude).toBe(1);
    expect(result.deliverable).toEqual([]);
  });

  it("keeps every record when the catalog is empty", () => {
    const result = reclassifyRecords(BATCH.slice(0, 2), []);

    expect(result.all.map((record) => [record.action, record.source, record.confidence])).toEqual([
      ["Keep", "none", 0],
      ["Keep", "none", 0],
    ]);
  });

  it("returns empty views for an empty batch", () => {
    const result = reclassifyRecords([], BASE_CATALOG);

    expect(result.all).toEqual([]);
    expect(result.deliverable).toEqual([]);
    expect(result.metrics.total).toBe(0);
  });

  it("drops exact duplicate rows", () => {
    const result = reclassifyRecords([BATCH[0], { ...BATCH[0] }, BATCH[5]], BASE_CATALOG);

    expect(result.all.map((record) => record.id)).toEqual(["1", "6"]);
  });

  it("does not mutate its inputs", () => {
    const input = structuredClone(BATCH);
    const catalog = structuredClone(BASE_CATALOG);

    reclassifyRecords(input, catalog);

    expect(input).toEqual(BATCH);
    expect(catalog).toEqual(BASE_CATALOG);
  });

  it("reports progress at fixed milestones", () => {
    const fractions: number[] = [];

    reclassifyRecords(BATCH, BASE_CATALOG, { onProgress: (fraction) => fractions.push(fraction) });

    expect(fractions).toEqual([0, 0.1, 0.15, 0.3, 0.45, 0.7, 0.9, 1]);
  });

  it("keeps going when the progress callback throws", () => {
    const logger = silentLogger();

    const result = reclassifyRecords(BATCH, BASE_CATALOG, {
      logger,
      onProgress: () => {
        throw new Error("ui gone");
      },
    });

    expect(result.all).toHaveLength(6);
    expect(logger.getStats().warn_count).toBe(8);
  });

  it("flags problematic labels the name does not support", () => {
    const [record] = reclassifyRecords([BATCH[0]], BASE_CATALOG, {
      problematicSubcategories: ["Salão de Beleza"],
    }).all;

    expect(record).toMatchObject({
      currentSubcategory: "Salão de Beleza",
      action: "Verify",
      source: "catalog",
      confidence: 0.99,
    });
  });

  it("honours the configured containment fields", () => {
    const [record] = reclassifyRecords([BATCH[3]], BASE_CATALOG, { containsFields: ["address"] }).all;

    expect(record.source).not.toBe("catalog-contains");
  });

  it("logs the start and completion of a run", () => {
    const lines: string[] = [];

    reclassifyRecords(BATCH, BASE_CATALOG, { logger: silentLogger(lines) });

    const events = lines.map((line) => JSON.parse(line).event);
    expect(events[0]).toBe("run.started");
    expect(events.at(-1)).toBe("run.completed");
  });

  it("keeps every category consistent with the catalog", () => {
    const index = buildCatalogIndex(BASE_CATALOG);
    const result = reclassifyRecords(BATCH, BASE_CATALOG);

    for (const record of result.all) {
      expect(record.confidence).toBeGreaterThanOrEqual(0);
      expect(record.confidence).toBeLessThanOrEqual(1);
      expect(isExclusionLabel(record.currentSubcategory)).toBe(record.action === "Exclude");
      if (record.source !== "none" && record.source !== "rule-address") {
        expect(record.currentCategory).toBe(
          index.canonicalKeyToCategory.get(normalizeText(record.currentSubcategory)),
        );
      }
    }
  });
});

describe("resolveThresholds", () => {
  it("fills in defaults", () => {
    expect(resolveThresholds({})).toEqual({
      hiThreshold: 0.9,
      loThreshold: 0.7,
      problematicThreshold: 0.35,
    });
  });

  it("rejects out-of-range or inverted thresholds", () => {
    expect(() => resolveThresholds({ hiThreshold: 0 })).toThrow("hiThreshold (0) must be in (0, 1].");
    expect(() => resolveThresholds({ hiThreshold: 0.6, loThreshold: 0.7 })).toThrow(
      "loThreshold (0.7) must be in (0, hiThreshold=0.6].",
    );
    expect(() => reclassifyRecords(BATCH, BASE_CATALOG, { problematicThreshold: 2 })).toThrow(
      "problematicThreshold (2) must be in (0, 1].",
    );
  });
});
