import type {
  ReclassificationMetrics,
  ReclassifiedRecord,
  RecordAction,
  RecordSource,
  WorkingRecord,
} from "../types.js";
import { countBy } from "../utils/collections.js";
import { isExclusionLabel } from "./catalog-index.js";

export interface FinalizeOptions {
  hiThreshold: number;
  dropExcludedFromDeliverable?: boolean;
}

export interface FinalizedViews {
  all: ReclassifiedRecord[];
  lowConfidence: ReclassifiedRecord[];
  deliverable: ReclassifiedRecord[];
  metrics: ReclassificationMetrics;
}

const EMPTY_SOURCE_COUNTS: Record<RecordSource, number> = {
  none: 0,
  catalog: 0,
  "catalog-contains": 0,
  "semantic-validator": 0,
  semantic: 0,
  "rule-address": 0,
};

const EMPTY_ACTION_COUNTS: Record<RecordAction, number> = {
  Keep: 0,
  Correct: 0,
  Infer: 0,
  Exclude: 0,
  Verify: 0,
};

function toOutputRecord(record: WorkingRecord): ReclassifiedRecord {
  const excluded = isExclusionLabel(record.currentSubcategory);
  return {
    id: record.id,
    name: record.name,
    address: record.address,
    originalCategory: record.originalCategory,
    originalSubcategory: record.originalSubcategory,
    currentCategory: record.currentCategory,
    currentSubcategory: record.currentSubcategory,
    action: record.action,
    source: record.source,
    confidence: record.confidence,
    intermediateSubcategory: excluded ? record.previousSubcategory : null,
    extras: { ...record.extras },
  };
}

export function dedupKey(record: ReclassifiedRecord): string {
  return JSON.stringify([
    record.id,
    record.name,
    record.address,
    record.currentCategory,
    record.currentSubcategory,
    record.originalCategory,
    record.originalSubcategory,
    record.intermediateSubcategory,
    record.action,
    record.source,
    record.confidence,
  ]);
}

/** Exact duplicates collapse to their first occurrence. */
export function deduplicateRecords(records: ReclassifiedRecord[]): ReclassifiedRecord[] {
  const seen = new Set<string>();
  const output: ReclassifiedRecord[] = [];
  for (const record of records) {
    const key = dedupKey(record);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(record);
  }
  return output;
}

export function isLowConfidence(record: ReclassifiedRecord, hiThreshold: number): boolean {
  return record.source === "semantic" && record.confidence < hiThreshold;
}

export function computeMetrics(
  records: ReclassifiedRecord[],
  hiThreshold: number,
): ReclassificationMetrics {
  const bySource = countBy(records, (record) => record.source, EMPTY_SOURCE_COUNTS);
  const byAction = countBy(
    records.filter((record): record is ReclassifiedRecord & { action: RecordAction } =>
      record.action !== null,
    ),
    (record) => record.action,
    EMPTY_ACTION_COUNTS,
  );

  return {
    total: records.length,
    catalogExact: bySource.catalog,
    catalogContains: bySource["catalog-contains"],
    semanticValidated: bySource["semantic-validator"],
    semanticInferred: bySource.semantic,
    kept: byAction.Keep,
    verify: byAction.Verify,
    excluded: records.filter((record) => isExclusionLabel(record.currentSubcategory)).length,
    ruleAddress: bySource["rule-address"],
    lowConfidence: records.filter((record) => isLowConfidence(record, hiThreshold)).length,
    bySource,
    byAction,
  };
}

export function finalizeRecords(records: WorkingRecord[], options: FinalizeOptions): FinalizedViews {
  const all = deduplicateRecords(records.map(toOutputRecord));
  const lowConfidence = all.filter((record) => isLowConfidence(record, options.hiThreshold));
  const deliverable = options.dropExcludedFromDeliverable
    ? all.filter((record) => !isExclusionLabel(record.currentSubcategory))
    : [...all];

  return {
    all,
    lowConfidence,
    deliverable,
    metrics: computeMetrics(all, options.hiThreshold),
  };
}
