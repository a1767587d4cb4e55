import { extractNumberedSteps, truncateAtBoundary } from './textUtils';
import type { AnswerResult, Classification, ScoredPassage } from './types';

export const OUT_OF_SCOPE_ANSWER =
  "Sorry, that question doesn't look related to any of the supported Customer Data Platforms. " +
  'Ask how to do something in one of them, for example how to add a source or build an audience.';

export const UNAVAILABLE_ANSWER =
  'The documentation index is not available yet. Please try again in a moment.';

export function notFoundAnswer(cdpIds: readonly string[]): string {
  const scope = cdpIds.length ? cdpIds.join(', ') : 'the supported platforms';
  return `I couldn't find documentation matching your question for ${scope}.`;
}

const EXCERPT_CHARS = 240;
const SEPARATOR = '\n\n';

export interface SynthesizerOptions {
  maxAnswerChars: number;
}

export interface PlatformComparison {
  cdpId: string;
  passages: ScoredPassage[];
}

export interface ComparisonResult extends AnswerResult {
  platforms: Array<{ cdpId: string; found: boolean; sources: string[] }>;
}

function distinctUrls(passages: readonly ScoredPassage[]): string[] {
  return [...new Set(passages.map((item) => item.passage.documentRef.url))];
}

function isNeighbor(a: ScoredPassage, b: ScoredPassage): boolean {
  return (
    a.passage.documentRef.url === b.passage.documentRef.url &&
    a.passage.cdpId === b.passage.cdpId &&
    Math.abs(a.passage.chunkIndex - b.passage.chunkIndex) <= 1
  );
}

export class AnswerSynthesizer {
  private readonly maxAnswerChars: number;

  constructor(options: SynthesizerOptions) {
    this.maxAnswerChars = Math.max(1, options.maxAnswerChars);
  }

  /**
   * The passages an answer is stitched from: score order, skipping chunk neighbours of
   * an already used passage, stopping at the first one that would overflow the budget.
   */
  selectPassages(passages: readonly ScoredPassage[]): Array<{ scored: ScoredPassage; text: string }> {
    const used: Array<{ scored: ScoredPassage; text: string }> = [];
    let total = 0;

    for (const scored of passages) {
      if (used.some((item) => isNeighbor(item.scored, scored))) {
        continue;
      }
      const separator = used.length ? SEPARATOR.length : 0;
      const length = scored.passage.text.length;
      if (total + separator + length <= this.maxAnswerChars) {
        used.push({ scored, text: scored.passage.text });
        total += separator + length;
        continue;
      }
      if (used.length === 0) {
        used.push({ scored, text: truncateAtBoundary(scored.passage.text, this.maxAnswerChars) });
      }
      break;
    }

    return used;
  }

  synthesize(classification: Classification, passages: readonly ScoredPassage[]): AnswerResult {
    if (classification.kind === 'no_match') {
      return { text: OUT_OF_SCOPE_ANSWER, sources: [] };
    }
    if (passages.length === 0) {
      return { text: notFoundAnswer(classification.cdpIds), sources: [] };
    }

    const used = this.selectPassages(passages);
    return {
      text: used.map((item) => item.text).join(SEPARATOR),
      sources: distinctUrls(used.map((item) => item.scored)),
    };
  }

  steps(passages: readonly ScoredPassage[]): string[] {
    const seen = new Set<string>();
    const steps: string[] = [];
    for (const item of passages) {
      for (const step of extractNumberedSteps(item.passage.text)) {
        if (!seen.has(step)) {
          seen.add(step);
          steps.push(step);
        }
      }
    }
    return steps;
  }

  compare(feature: string, platforms: readonly PlatformComparison[]): ComparisonResult {
    const found = platforms.filter((platform) => platform.passages.length > 0);
    if (found.length === 0) {
      return {
        text: "I couldn't find enough information to compare this feature across platforms.",
        sources: [],
        platforms: platforms.map((platform) => ({ cdpId: platform.cdpId, found: false, sources: [] })),
      };
    }

    const lines = [`Here's how the platforms handle "${feature.trim()}":`];
    for (const platform of platforms) {
      lines.push('', `${platform.cdpId.toUpperCase()}:`);
      if (platform.passages.length === 0) {
        lines.push('- No matching documentation found.');
        continue;
      }
      for (const item of platform.passages) {
        const excerpt = truncateAtBoundary(item.passage.text, EXCERPT_CHARS);
        lines.push(`- ${item.passage.documentRef.title}: ${excerpt}`);
      }
    }

    return {
      text: lines.join('\n'),
      sources: distinctUrls(found.flatMap((platform) => platform.passages)),
      platforms: platforms.map((platform) => ({
        cdpId: platform.cdpId,
        found: platform.passages.length > 0,
        sources: distinctUrls(platform.passages),
      })),
    };
  }
}
