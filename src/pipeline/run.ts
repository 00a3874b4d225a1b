import { createSilentLogger, type RunLogger } from "../logging/run-logger.js";
import type {
  CatalogRow,
  ContainsField,
  InputRecord,
  ProgressCallback,
  ReclassificationResult,
  WorkingRecord,
} from "../types.js";
import { applyAddressRule } from "./address-rule.js";
import { buildCatalogIndex } from "./catalog-index.js";
import { finalizeRecords } from "./finalize.js";
import { applyContainsCatalogMatch, applyExactCatalogMatch } from "./matchers.js";
import { applySemanticInference } from "./semantic-inference.js";
import { buildSemanticIndex } from "./semantic-index.js";
import { applySemanticValidator, DEFAULT_PROBLEMATIC_THRESHOLD } from "./semantic-validator.js";

export interface ReclassifyOptions {
  hiThreshold?: number;
  loThreshold?: number;
  problematicThreshold?: number;
  problematicSubcategories?: readonly string[];
  containsFields?: readonly ContainsField[];
  dropExcludedFromDeliverable?: boolean;
  onProgress?: ProgressCallback;
  logger?: RunLogger;
}

interface ResolvedThresholds {
  hiThreshold: number;
  loThreshold: number;
  problematicThreshold: number;
}

const STAGE = "reclassify";

export function resolveThresholds(options: ReclassifyOptions): ResolvedThresholds {
  const hiThreshold = options.hiThreshold ?? 0.9;
  const loThreshold = options.loThreshold ?? 0.7;
  const problematicThreshold = options.problematicThreshold ?? DEFAULT_PROBLEMATIC_THRESHOLD;

  if (!(hiThreshold > 0 && hiThreshold <= 1)) {
    throw new Error(`hiThreshold (${hiThreshold}) must be in (0, 1].`);
  }
  if (!(loThreshold > 0 && loThreshold <= hiThreshold)) {
    throw new Error(`loThreshold (${loThreshold}) must be in (0, hiThreshold=${hiThreshold}].`);
  }
  if (!(problematicThreshold > 0 && problematicThreshold <= 1)) {
    throw new Error(`problematicThreshold (${problematicThreshold}) must be in (0, 1].`);
  }

  return { hiThreshold, loThreshold, problematicThreshold };
}

export function toWorkingRecord(input: InputRecord): WorkingRecord {
  return {
    id: input.id,
    name: input.name,
    address: input.address,
    originalCategory: input.category,
    originalSubcategory: input.subcategory,
    currentCategory: input.category,
    currentSubcategory: input.subcategory,
    action: null,
    source: "none",
    confidence: 0,
    intermediateSubcategory: null,
    extras: { ...input.extras },
    previousSubcategory: input.subcategory,
  };
}

/**
 * Runs the whole reclassification over one batch against one catalog snapshot.
 * Neither argument is mutated; every call works on its own copy of the records.
 */
export function reclassifyRecords(
  input: readonly InputRecord[],
  catalogRows: readonly CatalogRow[],
  options: ReclassifyOptions = {},
): ReclassificationResult {
  const logger = options.logger ?? createSilentLogger();
  const thresholds = resolveThresholds(options);

  const report = (fraction: number, message: string): void => {
    logger.debug(STAGE, "progress", message, { fraction });
    if (!options.onProgress) {
      return;
    }
    try {
      options.onProgress(fraction, message);
    } catch (error) {
      logger.warn(STAGE, "progress.callback_failed", "Progress callback threw; continuing.", {
        fraction,
        error_message: error instanceof Error ? error.message : String(error),
      });
    }
  };

  const startedAt = Date.now();
  logger.info(STAGE, "run.started", "Reclassification started.", {
    input_rows: input.length,
    catalog_rows: catalogRows.length,
    hi_threshold: thresholds.hiThreshold,
    lo_threshold: thresholds.loThreshold,
  });

  try {
    report(0, "Preparando registros");
    const records = input.map(toWorkingRecord);

    const index = buildCatalogIndex([...catalogRows]);
    report(0.1, "Índice do catálogo construído");

    const canonicalIndex = buildSemanticIndex(index.canonicalKeys);
    const originalIndex = buildSemanticIndex(index.originalKeys);
    report(0.15, "Índices semânticos construídos");

    const exact = applyExactCatalogMatch(records, index);
    report(0.3, "Catálogo (exato) aplicado");

    const contains = applyContainsCatalogMatch(records, index, options.containsFields);
    const validator = applySemanticValidator(records, {
      index,
      originalIndex,
      loThreshold: thresholds.loThreshold,
      problematicThreshold: thresholds.problematicThreshold,
      problematicSubcategories: options.problematicSubcategories ?? [],
    });
    report(0.45, "Catálogo (contains) e validador semântico aplicados");

    const inference = applySemanticInference(records, {
      index,
      canonicalIndex,
      loThreshold: thresholds.loThreshold,
    });
    report(0.7, "Inferência semântica aplicada");

    const addressRule = applyAddressRule(records);
    report(0.9, "Regra de endereço aplicada");

    const result = finalizeRecords(records, {
      hiThreshold: thresholds.hiThreshold,
      dropExcludedFromDeliverable: options.dropExcludedFromDeliverable,
    });
    report(1, "Concluído");

    logger.info(STAGE, "run.completed", "Reclassification completed.", {
      catalog_entries: index.entries.length,
      exact_matches: exact.matched,
      contains_matches: contains.matched,
      validator_reviewed: validator.reviewed,
      validator_overridden: validator.overridden,
      validator_flagged: validator.flaggedForVerification,
      inferred: inference.inferred,
      kept: inference.kept,
      address_excluded: addressRule.excluded,
      duplicates_removed: records.length - result.all.length,
      metrics: result.metrics,
      elapsed_ms: Date.now() - startedAt,
    });

    return result;
  } catch (error) {
    logger.error(STAGE, "run.failed", "Reclassification failed.", {
      error_name: error instanceof Error ? error.name : "unknown",
      error_message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
