import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { Chunker } from './chunker';
import type { PageStore } from './pageStore';
import { analyze, cosineSimilarity, Vocabulary, ZERO_VECTOR } from './vectorizer';
import { VectorizationError } from './errors';
import type { ChunkedPassage, Passage, SparseVector } from './types';

export const GLOBAL_INDEX_ID = '*';

export function documentKey(cdpId: string, url: string): string {
  return JSON.stringify([cdpId, url]);
}

export function passageId(cdpId: string, url: string, chunkIndex: number): string {
  return JSON.stringify([cdpId, url, chunkIndex]);
}

/**
 * Passage vectors of one corpus, with reverse lookup to the owning passage. A CDP
 * index only accepts passages tagged with its own `cdpId`; the global index takes all.
 */
export class CorpusIndex {
  readonly id: string;
  private readonly passages = new Map<string, Passage>();

  constructor(id: string) {
    this.id = id;
  }

  get isGlobal(): boolean {
    return this.id === GLOBAL_INDEX_ID;
  }

  get size(): number {
    return this.passages.size;
  }

  add(passage: Passage): void {
    if (!this.isGlobal && passage.cdpId !== this.id) {
      throw new Error(`Passage ${passage.id} belongs to ${passage.cdpId}, not ${this.id}`);
    }
    if (this.passages.has(passage.id)) {
      throw new Error(`Duplicate passage ${passage.id} in index ${this.id}`);
    }
    this.passages.set(passage.id, passage);
  }

  passage(id: string): Passage | undefined {
    return this.passages.get(id);
  }

  vector(id: string): SparseVector | undefined {
    return this.passages.get(id)?.vector;
  }

  values(): IterableIterator<Passage> {
    return this.passages.values();
  }

  bestScore(vector: SparseVector): number {
    let best = 0;
    for (const passage of this.passages.values()) {
      const score = cosineSimilarity(vector, passage.vector);
      if (score > best) {
        best = score;
      }
    }
    return best;
  }
}

export interface IndexSnapshot {
  readonly version: number;
  readonly builtAt: Date;
  readonly vocabulary: Vocabulary;
  readonly corpora: ReadonlyMap<string, CorpusIndex>;
  readonly global: CorpusIndex;
  readonly documentCount: number;
  readonly passageCount: number;
  /** Every document URL present in the PageStore when the build started. */
  readonly sourceUrls: ReadonlySet<string>;
}

export interface IndexerOptions {
  chunker: Chunker;
  maxFeatures: number;
  yieldEvery?: number;
}

type CachedChunks = { contentHash: string; signature: string; passages: ChunkedPassage[] };

type DraftPassage = ChunkedPassage & { terms: string[] | null };

function indexText(chunk: ChunkedPassage): string {
  return `${chunk.documentRef.title} ${chunk.text}`;
}

/**
 * Builds a fresh {@link IndexSnapshot} from a PageStore. The vocabulary is fitted in
 * a sequential first pass; vectors are computed in a second pass against that frozen
 * table. Chunked passages are cached per document and reused while its content hash
 * stays the same.
 */
export class Indexer {
  private readonly chunker: Chunker;
  private readonly maxFeatures: number;
  private readonly yieldEvery: number;
  private readonly chunkCache = new Map<string, CachedChunks>();
  private version = 0;

  constructor(options: IndexerOptions) {
    this.chunker = options.chunker;
    this.maxFeatures = options.maxFeatures;
    this.yieldEvery = Math.max(1, options.yieldEvery ?? 25);
  }

  async build(store: PageStore): Promise<IndexSnapshot> {
    const documents = [...store.all()];
    const drafts: DraftPassage[] = [];
    const sourceUrls = new Set<string>();
    const liveKeys = new Set<string>();
    let reused = 0;

    for (let i = 0; i < documents.length; i += 1) {
      if (i % this.yieldEvery === 0) {
        await yieldToEventLoop();
      }
      const document = documents[i];
      const key = documentKey(document.cdpId, document.url);
      liveKeys.add(key);
      sourceUrls.add(document.url);

      let cached = this.chunkCache.get(key);
      if (cached && cached.contentHash === document.contentHash && cached.signature === this.chunker.signature) {
        reused += 1;
      } else {
        cached = {
          contentHash: document.contentHash,
          signature: this.chunker.signature,
          passages: this.chunker.chunk(document),
        };
        this.chunkCache.set(key, cached);
      }

      for (const chunk of cached.passages) {
        drafts.push({ ...chunk, terms: this.safeAnalyze(chunk) });
      }
    }

    for (const key of [...this.chunkCache.keys()]) {
      if (!liveKeys.has(key)) {
        this.chunkCache.delete(key);
      }
    }

    const vocabulary = Vocabulary.fit(
      drafts.map((draft) => draft.terms ?? []),
      this.maxFeatures
    );

    const corpora = new Map<string, CorpusIndex>();
    const global = new CorpusIndex(GLOBAL_INDEX_ID);
    for (let i = 0; i < drafts.length; i += 1) {
      if (i % (this.yieldEvery * 8) === 0) {
        await yieldToEventLoop();
      }
      const { terms, ...chunk } = drafts[i];
      const passage: Passage = {
        ...chunk,
        id: passageId(chunk.cdpId, chunk.documentRef.url, chunk.chunkIndex),
        vector: terms ? vocabulary.vectorizeTerms(terms) : ZERO_VECTOR,
      };

      let corpus = corpora.get(passage.cdpId);
      if (!corpus) {
        corpus = new CorpusIndex(passage.cdpId);
        corpora.set(passage.cdpId, corpus);
      }
      corpus.add(passage);
      global.add(passage);
    }

    this.version += 1;
    console.log(
      `[rag:index] build #${this.version}: documents=${documents.length}, passages=${drafts.length}, vocabulary=${vocabulary.size}, reusedChunks=${reused}`
    );

    return {
      version: this.version,
      builtAt: new Date(),
      vocabulary,
      corpora,
      global,
      documentCount: documents.length,
      passageCount: drafts.length,
      sourceUrls,
    };
  }

  private safeAnalyze(chunk: ChunkedPassage): string[] | null {
    try {
      return analyze(indexText(chunk));
    } catch (error) {
      if (error instanceof VectorizationError) {
        console.warn(`[rag:index] ${chunk.documentRef.url}#${chunk.chunkIndex}: ${error.message}; using zero vector`);
        return null;
      }
      throw error;
    }
  }
}
