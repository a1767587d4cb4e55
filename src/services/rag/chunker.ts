import { splitAtWords, splitSentences } from './textUtils';
import type { ChunkedPassage, StoredDocument } from './types';

export interface ChunkerOptions {
  maxChunkChars: number;
  minChunkChars: number;
  overlapSentences: number;
}

function joinedLength(sentences: readonly string[]): number {
  if (sentences.length === 0) {
    return 0;
  }
  return sentences.reduce((sum, sentence) => sum + sentence.length, 0) + sentences.length - 1;
}

/**
 * Sentence-aligned greedy packer. Sentences longer than `max - min` are split at
 * word boundaries first, which guarantees every window emitted before the last
 * one holds at least `minChunkChars` characters.
 */
export class Chunker {
  readonly maxChunkChars: number;
  readonly minChunkChars: number;
  readonly overlapSentences: number;

  constructor(options: ChunkerOptions) {
    this.maxChunkChars = Math.max(1, Math.floor(options.maxChunkChars));
    this.overlapSentences = Math.max(0, Math.floor(options.overlapSentences));
    let minChunkChars = Math.max(0, Math.floor(options.minChunkChars));
    if (minChunkChars >= this.maxChunkChars) {
      const fallback = Math.floor(this.maxChunkChars / 4);
      console.warn(
        `[rag:chunk] minChunkChars (=${minChunkChars}) >= maxChunkChars (=${this.maxChunkChars}). Using fallback ${fallback}.`
      );
      minChunkChars = fallback;
    }
    this.minChunkChars = minChunkChars;
  }

  get signature(): string {
    return `${this.maxChunkChars}/${this.minChunkChars}/${this.overlapSentences}`;
  }

  chunk(document: StoredDocument): ChunkedPassage[] {
    const documentRef = { cdpId: document.cdpId, url: document.url, title: document.title };
    const sentences = splitSentences(document.rawText);
    const whole = sentences.join(' ');
    if (!whole) {
      return [];
    }
    if (whole.length < this.minChunkChars) {
      return [{ documentRef, cdpId: document.cdpId, chunkIndex: 0, text: whole }];
    }

    const pieceLimit = Math.max(1, this.maxChunkChars - this.minChunkChars);
    const pieces = sentences.flatMap((sentence) => splitAtWords(sentence, pieceLimit));

    const windows: string[][] = [];
    let window: string[] = [];
    let fresh = 0;

    for (const piece of pieces) {
      if (window.length > 0 && joinedLength([...window, piece]) > this.maxChunkChars) {
        windows.push(window);
        window = this.overlapSentences > 0 ? window.slice(-this.overlapSentences) : [];
        while (window.length > 0 && joinedLength([...window, piece]) > this.maxChunkChars) {
          window = window.slice(1);
        }
        fresh = 0;
      }
      window.push(piece);
      fresh += 1;
    }
    if (fresh > 0) {
      windows.push(window);
    }

    return windows.map((sentencesInWindow, chunkIndex) => ({
      documentRef,
      cdpId: document.cdpId,
      chunkIndex,
      text: sentencesInWindow.join(' '),
    }));
  }
}
