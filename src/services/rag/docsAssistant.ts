import type { RetrievalSettings } from '../../config/env';
import {
  AnswerSynthesizer,
  UNAVAILABLE_ANSWER,
  type ComparisonResult,
} from './answerSynthesizer';
import { Chunker } from './chunker';
import { DomainClassifier, selectCorpora } from './domainClassifier';
import { IndexNotBuiltError } from './errors';
import { Indexer, type IndexSnapshot } from './indexer';
import { ingestFromSource, type IngestSummary } from './ingestDocuments';
import { normalizeCdpId, PageStore } from './pageStore';
import { Retriever } from './retriever';
import type { AnswerResult, Classification, DocumentSource, ScoredPassage } from './types';

export type TurnStage = 'received' | 'classified' | 'retrieved' | 'answered';

const TURN_TRANSITIONS: Record<TurnStage, readonly TurnStage[]> = {
  received: ['classified', 'answered'],
  classified: ['retrieved', 'answered'],
  retrieved: ['answered'],
  answered: [],
};

const COMPARE_PASSAGES_PER_CDP = 2;

/** One chat turn; stages only move forward and `answered` is terminal. */
class ChatTurn {
  private current: TurnStage = 'received';
  readonly stages: TurnStage[] = ['received'];

  advance(next: TurnStage): void {
    if (!TURN_TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid turn transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.stages.push(next);
  }
}

export interface AskOptions {
  cdps?: readonly string[];
  k?: number;
}

export interface RetrievedPassageView {
  id: string;
  cdpId: string;
  url: string;
  title: string;
  chunkIndex: number;
  score: number;
  excerpt: string;
}

export interface AnswerTrace {
  answer: AnswerResult;
  stages: TurnStage[];
  classification: Classification | null;
  query: { normalizedText: string; tokens: number; truncated: boolean } | null;
  passages: RetrievedPassageView[];
  steps: string[];
  indexVersion: number | null;
}

export interface IndexStatus {
  ready: boolean;
  building: boolean;
  version: number | null;
  builtAt: string | null;
  documents: number;
  passages: number;
  corpora: Record<string, number>;
}

function toView(item: ScoredPassage): RetrievedPassageView {
  return {
    id: item.passage.id,
    cdpId: item.passage.cdpId,
    url: item.passage.documentRef.url,
    title: item.passage.documentRef.title,
    chunkIndex: item.passage.chunkIndex,
    score: Number(item.score.toFixed(6)),
    excerpt: item.passage.text.slice(0, 240),
  };
}

/**
 * The retrieval engine behind the Chat Surface. Queries are answered synchronously
 * from the published snapshot; rebuilds run one at a time into a fresh snapshot that
 * replaces the published one only once complete.
 */
export class DocsAssistant {
  readonly store: PageStore;
  private readonly indexer: Indexer;
  private readonly classifier: DomainClassifier;
  private readonly retriever: Retriever;
  private readonly synthesizer: AnswerSynthesizer;
  private published: IndexSnapshot | null = null;
  private buildQueue: Promise<unknown> = Promise.resolve();
  private pendingBuilds = 0;

  constructor(settings: RetrievalSettings, store = new PageStore()) {
    this.store = store;
    this.indexer = new Indexer({
      chunker: new Chunker(settings),
      maxFeatures: settings.maxFeatures,
    });
    this.classifier = new DomainClassifier(settings);
    this.retriever = new Retriever(settings);
    this.synthesizer = new AnswerSynthesizer(settings);
  }

  snapshot(): IndexSnapshot | null {
    return this.published;
  }

  rebuild(): Promise<IndexSnapshot> {
    const run = async (): Promise<IndexSnapshot> => {
      const snapshot = await this.indexer.build(this.store);
      this.published = snapshot;
      return snapshot;
    };

    this.pendingBuilds += 1;
    const next = this.buildQueue.then(run, run).finally(() => {
      this.pendingBuilds -= 1;
    });
    // Keep the queue usable after a failed build; the caller still gets the rejection.
    this.buildQueue = next.catch(() => undefined);
    return next;
  }

  async refresh(source: DocumentSource): Promise<{ ingest: IngestSummary; status: IndexStatus }> {
    const ingest = await ingestFromSource(this.store, source);
    await this.rebuild();
    return { ingest, status: this.status() };
  }

  status(): IndexStatus {
    const snapshot = this.published;
    const corpora: Record<string, number> = {};
    for (const [cdpId, corpus] of snapshot?.corpora ?? []) {
      corpora[cdpId] = corpus.size;
    }
    return {
      ready: snapshot !== null,
      building: this.pendingBuilds > 0,
      version: snapshot?.version ?? null,
      builtAt: snapshot?.builtAt.toISOString() ?? null,
      documents: snapshot?.documentCount ?? 0,
      passages: snapshot?.passageCount ?? 0,
      corpora,
    };
  }

  answerQuery(rawText: string, options: AskOptions = {}): AnswerResult {
    return this.answerQueryDetailed(rawText, options).answer;
  }

  answerQueryDetailed(rawText: string, options: AskOptions = {}): AnswerTrace {
    const turn = new ChatTurn();
    const snapshot = this.published;

    try {
      const query = this.classifier.prepare(rawText, snapshot);
      const classification = this.classifier.classify(query, snapshot, { cdps: options.cdps });
      turn.advance('classified');

      let passages: ScoredPassage[] = [];
      if (classification.kind === 'scoped') {
        passages = this.retriever.retrieve(query, classification.cdpIds, snapshot, options.k);
        turn.advance('retrieved');
      }

      const answer = this.synthesizer.synthesize(classification, passages);
      turn.advance('answered');
      return {
        answer,
        stages: turn.stages,
        classification,
        query: { normalizedText: query.normalizedText, tokens: query.tokens.length, truncated: query.truncated },
        passages: passages.map(toView),
        steps: this.synthesizer.steps(passages),
        indexVersion: snapshot?.version ?? null,
      };
    } catch (error) {
      if (!(error instanceof IndexNotBuiltError)) {
        throw error;
      }
      turn.advance('answered');
      return {
        answer: { text: UNAVAILABLE_ANSWER, sources: [] },
        stages: turn.stages,
        classification: null,
        query: null,
        passages: [],
        steps: [],
        indexVersion: null,
      };
    }
  }

  compare(feature: string, options: { cdps?: readonly string[] } = {}): ComparisonResult {
    const snapshot = this.published;
    if (!snapshot) {
      return { text: UNAVAILABLE_ANSWER, sources: [], platforms: [] };
    }

    const query = this.classifier.prepare(feature, snapshot);
    const cdpIds = options.cdps?.length
      ? [...new Set(options.cdps.map(normalizeCdpId))]
      : selectCorpora(snapshot).map((corpus) => corpus.id);

    return this.synthesizer.compare(
      feature,
      cdpIds.map((cdpId) => ({
        cdpId,
        passages: this.retriever.retrieve(query, [cdpId], snapshot, COMPARE_PASSAGES_PER_CDP),
      }))
    );
  }
}
