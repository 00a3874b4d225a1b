import { describe, expect, it } from "vitest";
import { buildCatalogIndex } from "../src/pipeline/catalog-index.js";
import { applyExactCatalogMatch } from "../src/pipeline/matchers.js";
import { toWorkingRecord } from "../src/pipeline/run.js";
import { buildSemanticIndex } from "../src/pipeline/semantic-index.js";
import {
  applySemanticValidator,
  type SemanticValidatorContext,
} from "../src/pipeline/semantic-validator.js";
import type { WorkingRecord } from "../src/types.js";
import { BASE_CATALOG, inputRecord } from "./fixtures.js";

const index = buildCatalogIndex(BASE_CATALOG);

function context(problematicSubcategories: string[] = []): SemanticValidatorContext {
  return {
    index,
    originalIndex: buildSemanticIndex(index.originalKeys),
    loThreshold: 0.7,
    problematicThreshold: 0.35,
    problematicSubcategories,
  };
}

function matchedHairdresser(name: string): WorkingRecord {
  const record = toWorkingRecord(inputRecord({ name, subcategory: "Cabeleireiro" }));
  applyExactCatalogMatch([record], index);
  return record;
}

describe("semantic validator", () => {
  it("overrides a catalog decision when the name clearly points elsewhere", () => {
    const record = matchedHairdresser("Panificadora Central");

    const result = applySemanticValidator([record], context());

    expect(result).toEqual({ reviewed: 1, overridden: 1, flaggedForVerification: 0 });
    expect(record).toMatchObject({
      currentSubcategory: "Padaria",
      currentCategory: "Alimentação",
      action: "Correct",
      source: "semantic-validator",
      confidence: 1,
    });
  });

  it("keeps the catalog decision when the similarity is below the low threshold", () => {
    // "pizzaria" is one of three features of "pizzaria delivery": 1/sqrt(3)
    const record = matchedHairdresser("Pizzaria Bella");

    applySemanticValidator([record], context());

    expect(record.currentSubcategory).toBe("Salão de Beleza");
    expect(record.source).toBe("catalog");
    expect(record.confidence).toBe(0.99);
  });

  it("keeps the catalog decision when the prediction agrees", () => {
    const record = matchedHairdresser("Cabeleireiro Ana");

    const result = applySemanticValidator([record], context(["Salão de Beleza"]));

    expect(result.overridden).toBe(0);
    expect(record.action).toBe("Correct");
    expect(record.source).toBe("catalog");
  });

  it("applies the lowered threshold to problematic labels", () => {
    const record = matchedHairdresser("Pizzaria Bella");

    applySemanticValidator([record], context(["Salão de Beleza"]));

    expect(record).toMatchObject({
      currentSubcategory: "Pizzaria",
      currentCategory: "Alimentação",
      action: "Correct",
      source: "semantic-validator",
      confidence: 0.5774,
    });
  });

  it("flags problematic labels for verification when nothing is similar enough", () => {
    const record = matchedHairdresser("Studio Ana");

    const result = applySemanticValidator([record], context(["salao de beleza"]));

    expect(result.flaggedForVerification).toBe(1);
    expect(record).toMatchObject({
      currentSubcategory: "Salão de Beleza",
      currentCategory: "Serviços",
      action: "Verify",
      source: "catalog",
      confidence: 0.99,
    });
  });

  it("ignores records that were not decided by the catalog", () => {
    const record = toWorkingRecord(inputRecord({ name: "Panificadora Central" }));

    const result = applySemanticValidator([record], context());

    expect(result.reviewed).toBe(0);
    expect(record.action).toBeNull();
  });
});
