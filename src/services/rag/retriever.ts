import { IndexNotBuiltError } from './errors';
import { selectCorpora } from './domainClassifier';
import type { IndexSnapshot } from './indexer';
import { cosineSimilarity } from './vectorizer';
import type { Query, ScoredPassage } from './types';

export interface RetrieverOptions {
  minRetrievalScore: number;
  k: number;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareScoredPassages(a: ScoredPassage, b: ScoredPassage): number {
  return (
    b.score - a.score ||
    a.passage.chunkIndex - b.passage.chunkIndex ||
    compareStrings(a.passage.documentRef.url, b.passage.documentRef.url) ||
    compareStrings(a.passage.id, b.passage.id)
  );
}

export class Retriever {
  private readonly options: RetrieverOptions;

  constructor(options: RetrieverOptions) {
    this.options = options;
  }

  get defaultK(): number {
    return this.options.k;
  }

  retrieve(
    query: Query,
    cdpIds: readonly string[],
    snapshot: IndexSnapshot | null,
    k = this.options.k
  ): ScoredPassage[] {
    if (!snapshot) {
      throw new IndexNotBuiltError();
    }
    if (k <= 0 || cdpIds.length === 0) {
      return [];
    }

    const candidates: ScoredPassage[] = [];
    for (const corpus of selectCorpora(snapshot, cdpIds)) {
      for (const passage of corpus.values()) {
        const score = cosineSimilarity(query.vector, passage.vector);
        if (score > 0 && score >= this.options.minRetrievalScore) {
          candidates.push({ passage, score });
        }
      }
    }

    return candidates.sort(compareScoredPassages).slice(0, k);
  }
}
