import { createHash } from 'node:crypto';
import stopWordList from './stopWords.json';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
// Sentence end followed by whitespace, except after a list marker: "2." at the start
// of the text or right after another sentence end or a colon.
const SENTENCE_BOUNDARY = /(?<=[.!?])(?<!(?:^|[.!?:]\s+)\d{1,2}\.)\s+(?=\S)/;

export function normalizeText(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

export function isStopWord(token: string): boolean {
  return STOP_WORDS.has(token);
}

/**
 * Lazily yields lower-cased content tokens (length >= 2, stop words removed) in
 * reading order, stopping after `limit` tokens. Text past the limit is never scanned.
 */
export function* iterateTokens(input: string, limit = Number.POSITIVE_INFINITY): Generator<string> {
  if (limit <= 0) {
    return;
  }
  let emitted = 0;
  for (const match of input.matchAll(/[\p{L}\p{N}]+/gu)) {
    const token = match[0].toLowerCase();
    if (token.length < 2 || STOP_WORDS.has(token)) {
      continue;
    }
    yield token;
    emitted += 1;
    if (emitted >= limit) {
      return;
    }
  }
}

export function tokenize(input: string, limit?: number): string[] {
  return [...iterateTokens(input, limit)];
}

export function toTerms(tokens: readonly string[]): string[] {
  const terms = [...tokens];
  for (let i = 0; i < tokens.length - 1; i += 1) {
    terms.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return terms;
}

export function splitSentences(text: string): string[] {
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }
  return normalized.split(SENTENCE_BOUNDARY).filter(Boolean);
}

export function splitAtWords(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) {
    return [text];
  }

  const pieces: string[] = [];
  let current = '';
  for (const word of text.split(' ')) {
    if (word.length > maxChars) {
      if (current) {
        pieces.push(current);
        current = '';
      }
      for (let start = 0; start < word.length; start += maxChars) {
        pieces.push(word.slice(start, start + maxChars));
      }
      continue;
    }
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) {
    pieces.push(current);
  }
  return pieces;
}

/** Longest prefix of `text` within `maxChars` that ends on a sentence, else a word, boundary. */
export function truncateAtBoundary(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  const head = text.slice(0, maxChars);
  if (/[.!?]$/.test(head) && text[maxChars] === ' ') {
    return head;
  }
  const sentenceEnd = Math.max(head.lastIndexOf('. '), head.lastIndexOf('! '), head.lastIndexOf('? '));
  if (sentenceEnd > 0) {
    return head.slice(0, sentenceEnd + 1);
  }
  const wordEnd = head.lastIndexOf(' ');
  return wordEnd > 0 ? head.slice(0, wordEnd) : head;
}

export function hashContent(...parts: string[]): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    hash.update('\u0000');
  }
  return hash.digest('hex');
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function extractNumberedSteps(text: string): string[] {
  const steps: string[] = [];
  const pattern = /(?:^|\s)\d{1,2}[.)]\s+([^.!?]+?[.!?])(?=\s|$)/g;
  for (const match of text.matchAll(pattern)) {
    const step = match[1].trim();
    if (step) {
      steps.push(step);
    }
  }
  return steps;
}
