import { IndexNotBuiltError, VectorizationError } from './errors';
import type { CorpusIndex, IndexSnapshot } from './indexer';
import { normalizeCdpId } from './pageStore';
import { iterateTokens, normalizeText, toTerms } from './textUtils';
import { assertVectorizable, ZERO_VECTOR } from './vectorizer';
import type { Classification, Query } from './types';

export interface ClassifierOptions {
  scopeThreshold: number;
  tieMargin: number;
  maxQueryTokens: number;
}

export interface ClassifyOptions {
  cdps?: readonly string[];
}

/**
 * Turns raw query text into a {@link Query}. Only the first `maxQueryTokens` content
 * tokens are kept, in order; a query under the limit is left as it is.
 */
export function prepareQuery(rawText: string, snapshot: IndexSnapshot, maxQueryTokens: number): Query {
  try {
    assertVectorizable(rawText);
  } catch (error) {
    if (error instanceof VectorizationError) {
      console.warn(`[rag:query] ${error.message}; using zero vector`);
      return { rawText, normalizedText: '', tokens: [], truncated: false, vector: ZERO_VECTOR };
    }
    throw error;
  }

  const tokens: string[] = [];
  let truncated = false;
  for (const token of iterateTokens(rawText, maxQueryTokens + 1)) {
    if (tokens.length === maxQueryTokens) {
      truncated = true;
      break;
    }
    tokens.push(token);
  }

  return {
    rawText,
    normalizedText: normalizeText(rawText),
    tokens,
    truncated,
    vector: snapshot.vocabulary.vectorizeTerms(toTerms(tokens)),
  };
}

export function selectCorpora(snapshot: IndexSnapshot, cdps?: readonly string[]): CorpusIndex[] {
  if (!cdps || cdps.length === 0) {
    return [...snapshot.corpora.values()];
  }
  const wanted = new Set(cdps.map(normalizeCdpId));
  return [...snapshot.corpora.values()].filter((corpus) => wanted.has(corpus.id));
}

/**
 * Threshold-and-margin scope gate: a query is in scope when its best match in the
 * global index reaches `scopeThreshold`; the candidate CDPs are every corpus whose
 * best match is within `tieMargin` of the top one.
 */
export class DomainClassifier {
  private readonly options: ClassifierOptions;

  constructor(options: ClassifierOptions) {
    this.options = options;
  }

  get maxQueryTokens(): number {
    return this.options.maxQueryTokens;
  }

  prepare(rawText: string, snapshot: IndexSnapshot | null): Query {
    if (!snapshot) {
      throw new IndexNotBuiltError();
    }
    return prepareQuery(rawText, snapshot, this.options.maxQueryTokens);
  }

  classify(query: Query, snapshot: IndexSnapshot | null, options: ClassifyOptions = {}): Classification {
    if (!snapshot) {
      throw new IndexNotBuiltError();
    }

    const restricted = Boolean(options.cdps?.length);
    const corpora = selectCorpora(snapshot, options.cdps);
    const scores: Record<string, number> = {};
    for (const corpus of corpora) {
      scores[corpus.id] = corpus.bestScore(query.vector);
    }

    const bestScore = restricted
      ? Math.max(0, ...Object.values(scores))
      : snapshot.global.bestScore(query.vector);
    if (bestScore < this.options.scopeThreshold || bestScore <= 0) {
      return { kind: 'no_match', bestScore };
    }

    const top = Math.max(...Object.values(scores));
    const cdpIds = Object.keys(scores)
      .filter((id) => scores[id] > 0 && scores[id] >= top - this.options.tieMargin)
      .sort((a, b) => scores[b] - scores[a] || (a < b ? -1 : a > b ? 1 : 0));

    return { kind: 'scoped', cdpIds, confidence: top, scores };
  }
}
