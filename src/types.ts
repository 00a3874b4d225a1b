export type RecordAction = "Keep" | "Correct" | "Infer" | "Exclude" | "Verify";

export type RecordSource =
  | "none"
  | "catalog"
  | "catalog-contains"
  | "semantic-validator"
  | "semantic"
  | "rule-address";

export type ContainsField = "name" | "address";

export interface InputRecord {
  id: string;
  name: string;
  address: string;
  category: string;
  subcategory: string;
  extras: Record<string, string>;
}

export interface ReclassifiedRecord {
  id: string;
  name: string;
  address: string;
  originalCategory: string;
  originalSubcategory: string;
  currentCategory: string;
  currentSubcategory: string;
  action: RecordAction | null;
  source: RecordSource;
  confidence: number;
  intermediateSubcategory: string | null;
  extras: Record<string, string>;
}

/**
 * Record as it moves through the stages. `previousSubcategory` holds the label
 * that was in place right before the latest assignment, so the finalizer can
 * recover what an excluded record looked like.
 */
export interface WorkingRecord extends ReclassifiedRecord {
  previousSubcategory: string;
}

export interface CatalogRow {
  originalLabel: string;
  canonicalLabel: string;
  owningCategory: string;
}

export interface CatalogEntry extends CatalogRow {
  kOriginal: string;
  kCanonical: string;
  kCategory: string;
}

export interface CatalogIndex {
  entries: CatalogEntry[];
  originalKeys: string[];
  canonicalKeys: string[];
  originalToCanonical: Map<string, string>;
  originalToCanonicalKey: Map<string, string>;
  canonicalKeyToCategory: Map<string, string>;
  canonicalKeyToLabel: Map<string, string>;
}

export interface SemanticMatch {
  term: string;
  similarity: number;
}

export interface SemanticIndex {
  readonly terms: readonly string[];
  query(text: string): SemanticMatch;
  queryTop(text: string, limit: number): SemanticMatch[];
}

export type ProgressCallback = (fraction: number, message: string) => void;

export interface ReclassificationMetrics {
  total: number;
  catalogExact: number;
  catalogContains: number;
  semanticValidated: number;
  semanticInferred: number;
  kept: number;
  verify: number;
  excluded: number;
  ruleAddress: number;
  lowConfidence: number;
  bySource: Record<RecordSource, number>;
  byAction: Record<RecordAction, number>;
}

export interface ReclassificationResult {
  all: ReclassifiedRecord[];
  lowConfidence: ReclassifiedRecord[];
  deliverable: ReclassifiedRecord[];
  metrics: ReclassificationMetrics;
}

export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface PipelineRunLogRow {
  runId: string;
  seq: number;
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload: Record<string, unknown>;
  timestamp: string;
}

export type RunArtifactFormat = "xlsx" | "csv";

export interface RunArtifactSummary {
  key: string;
  fileName: string;
  format: RunArtifactFormat;
  sizeBytes: number;
}

export interface ReclassificationRunSummary {
  runId: string;
  inputFileName: string;
  catalogFileName: string;
  catalogEntries: number;
  metrics: ReclassificationMetrics;
  artifacts: Array<RunArtifactSummary & { path: string }>;
  elapsedMs: number;
}
