import { VectorizationError } from './errors';
import { toTerms, tokenize } from './textUtils';
import type { SparseVector } from './types';

export const ZERO_VECTOR: SparseVector = Object.freeze({
  indices: Object.freeze([]),
  values: Object.freeze([]),
});

const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFD]/g;

/** Rejects inputs that are not text: NUL bytes, or mostly control / replacement characters. */
export function assertVectorizable(input: unknown): asserts input is string {
  if (typeof input !== 'string') {
    throw new VectorizationError(`expected text, received ${typeof input}`);
  }
  if (input.includes('\u0000')) {
    throw new VectorizationError('input contains NUL bytes');
  }
  const garbage = input.match(CONTROL_CHARS)?.length ?? 0;
  if (input.length > 0 && garbage / input.length > 0.1) {
    throw new VectorizationError('input is mostly non-text characters');
  }
}

export function analyze(input: unknown, maxTokens?: number): string[] {
  assertVectorizable(input);
  return toTerms(tokenize(input, maxTokens));
}

export function dot(a: SparseVector, b: SparseVector): number {
  let i = 0;
  let j = 0;
  let sum = 0;
  while (i < a.indices.length && j < b.indices.length) {
    const ai = a.indices[i];
    const bj = b.indices[j];
    if (ai === bj) {
      sum += a.values[i] * b.values[j];
      i += 1;
      j += 1;
    } else if (ai < bj) {
      i += 1;
    } else {
      j += 1;
    }
  }
  return sum;
}

export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  if (a.indices.length === 0 || b.indices.length === 0) {
    return 0;
  }
  return Math.max(0, Math.min(1, dot(a, b)));
}

/**
 * Frozen term table for one index build: term → column, plus smoothed IDF
 * (`ln((1 + n) / (1 + df)) + 1`). Built once from all passage texts before any
 * passage is vectorized.
 */
export class Vocabulary {
  private readonly columns: ReadonlyMap<string, number>;
  private readonly idf: readonly number[];
  readonly documentCount: number;

  private constructor(terms: readonly string[], idf: readonly number[], documentCount: number) {
    this.columns = new Map(terms.map((term, index) => [term, index]));
    this.idf = idf;
    this.documentCount = documentCount;
  }

  static fit(termLists: ReadonlyArray<readonly string[]>, maxFeatures: number): Vocabulary {
    const totals = new Map<string, number>();
    const documentFrequency = new Map<string, number>();
    for (const terms of termLists) {
      for (const term of terms) {
        totals.set(term, (totals.get(term) ?? 0) + 1);
      }
      for (const term of new Set(terms)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const kept = [...totals.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .slice(0, Math.max(0, maxFeatures))
      .map(([term]) => term)
      .sort();

    const n = termLists.length;
    const idf = kept.map((term) => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);
    return new Vocabulary(kept, idf, n);
  }

  get size(): number {
    return this.columns.size;
  }

  has(term: string): boolean {
    return this.columns.has(term);
  }

  idfOf(term: string): number | undefined {
    const column = this.columns.get(term);
    return column === undefined ? undefined : this.idf[column];
  }

  vectorizeTerms(terms: readonly string[]): SparseVector {
    const counts = new Map<number, number>();
    for (const term of terms) {
      const column = this.columns.get(term);
      if (column !== undefined) {
        counts.set(column, (counts.get(column) ?? 0) + 1);
      }
    }
    if (counts.size === 0) {
      return ZERO_VECTOR;
    }

    const indices = [...counts.keys()].sort((a, b) => a - b);
    const weights = indices.map((column) => (counts.get(column) ?? 0) * this.idf[column]);
    const norm = Math.sqrt(weights.reduce((sum, weight) => sum + weight * weight, 0));
    if (norm === 0) {
      return ZERO_VECTOR;
    }
    return { indices, values: weights.map((weight) => weight / norm) };
  }

  vectorize(input: unknown, maxTokens?: number): SparseVector {
    try {
      return this.vectorizeTerms(analyze(input, maxTokens));
    } catch (error) {
      if (error instanceof VectorizationError) {
        console.warn(`[rag:vector] ${error.message}; using zero vector`);
        return ZERO_VECTOR;
      }
      throw error;
    }
  }
}
