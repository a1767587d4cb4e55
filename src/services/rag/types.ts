export interface SourceDocument {
  cdpId: string;
  url: string;
  title: string;
  rawText: string;
  fetchTime: Date;
}

export interface StoredDocument {
  readonly cdpId: string;
  readonly url: string;
  readonly title: string;
  readonly rawText: string;
  readonly fetchTime: Date;
  readonly contentHash: string;
}

export interface DocumentRef {
  readonly cdpId: string;
  readonly url: string;
  readonly title: string;
}

export interface ChunkedPassage {
  readonly documentRef: DocumentRef;
  readonly cdpId: string;
  readonly chunkIndex: number;
  readonly text: string;
}

/** Sorted term indices with L2-normalized weights. */
export interface SparseVector {
  readonly indices: readonly number[];
  readonly values: readonly number[];
}

export interface Passage extends ChunkedPassage {
  readonly id: string;
  readonly vector: SparseVector;
}

export interface ScoredPassage {
  passage: Passage;
  score: number;
}

export interface Query {
  rawText: string;
  normalizedText: string;
  tokens: string[];
  truncated: boolean;
  vector: SparseVector;
}

export type Classification =
  | { kind: 'no_match'; bestScore: number }
  | { kind: 'scoped'; cdpIds: string[]; confidence: number; scores: Record<string, number> };

export interface AnswerResult {
  text: string;
  sources: string[];
}

export interface DocumentSource {
  readonly name: string;
  fetchDocuments(): AsyncIterable<SourceDocument>;
}
