import type { SemanticIndex, SemanticMatch } from "../types.js";
import { normalizeText, tokenizeTerms } from "../utils/text.js";

type SparseVector = Map<number, number>;

const NO_MATCH: SemanticMatch = { term: "", similarity: 0 };

/** Unigrams followed by bigrams of adjacent unigrams. */
export function extractFeatures(text: string): string[] {
  const tokens = tokenizeTerms(normalizeText(text));
  const bigrams: string[] = [];
  for (let index = 0; index + 1 < tokens.length; index += 1) {
    bigrams.push(`${tokens[index]} ${tokens[index + 1]}`);
  }
  return [...tokens, ...bigrams];
}

function countFeatures(features: string[], vocabulary: Map<string, number>): Map<number, number> {
  const counts = new Map<number, number>();
  for (const feature of features) {
    const column = vocabulary.get(feature);
    if (column === undefined) {
      continue;
    }
    counts.set(column, (counts.get(column) ?? 0) + 1);
  }
  return counts;
}

function weightAndNormalize(counts: Map<number, number>, idf: number[]): SparseVector {
  const vector: SparseVector = new Map();
  let sumSquares = 0;
  for (const [column, count] of counts) {
    const weight = count * idf[column];
    vector.set(column, weight);
    sumSquares += weight * weight;
  }
  if (sumSquares === 0) {
    return new Map();
  }
  const norm = Math.sqrt(sumSquares);
  for (const [column, weight] of vector) {
    vector.set(column, weight / norm);
  }
  return vector;
}

function dot(left: SparseVector, right: SparseVector): number {
  const [small, large] = left.size <= right.size ? [left, right] : [right, left];
  let total = 0;
  for (const [column, weight] of small) {
    const other = large.get(column);
    if (other !== undefined) {
      total += weight * other;
    }
  }
  return total;
}

class TfidfSemanticIndex implements SemanticIndex {
  readonly terms: readonly string[];
  private readonly vocabulary: Map<string, number>;
  private readonly idf: number[];
  private readonly vectors: SparseVector[];

  constructor(terms: string[]) {
    this.terms = [...terms];
    this.vocabulary = new Map();

    const featuresByTerm = this.terms.map((term) => extractFeatures(term));
    const documentFrequency: number[] = [];
    for (const features of featuresByTerm) {
      for (const feature of new Set(features)) {
        let column = this.vocabulary.get(feature);
        if (column === undefined) {
          column = this.vocabulary.size;
          this.vocabulary.set(feature, column);
          documentFrequency.push(0);
        }
        documentFrequency[column] += 1;
      }
    }

    // Smoothed idf: every document counted once more, as if one extra document held every feature.
    const documentCount = this.terms.length;
    this.idf = documentFrequency.map((df) => Math.log((1 + documentCount) / (1 + df)) + 1);
    this.vectors = featuresByTerm.map((features) =>
      weightAndNormalize(countFeatures(features, this.vocabulary), this.idf),
    );
  }

  query(text: string): SemanticMatch {
    return this.queryTop(text, 1)[0] ?? NO_MATCH;
  }

  queryTop(text: string, limit: number): SemanticMatch[] {
    if (this.terms.length === 0 || limit <= 0) {
      return [];
    }

    const queryVector = weightAndNormalize(
      countFeatures(extractFeatures(text), this.vocabulary),
      this.idf,
    );
    if (queryVector.size === 0) {
      return [];
    }

    return this.vectors
      .map((vector, position) => ({
        position,
        similarity: Math.min(1, Math.max(0, dot(queryVector, vector))),
      }))
      .filter((scored) => scored.similarity > 0)
      .sort((left, right) => right.similarity - left.similarity || left.position - right.position)
      .slice(0, limit)
      .map((scored) => ({ term: this.terms[scored.position], similarity: scored.similarity }));
  }
}

export function buildSemanticIndex(terms: string[]): SemanticIndex {
  return new TfidfSemanticIndex(terms);
}
