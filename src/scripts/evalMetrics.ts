import type { AnswerTrace } from '../services/rag/docsAssistant';

export interface EvalCase {
  id: string;
  question: string;
  expectNoMatch: boolean;
  expectedCdps: string[];
  expectedSourceHints: string[];
}

export interface CaseResult {
  id: string;
  scopeCorrect: boolean;
  cdpHit: boolean;
  sourceHintHit: boolean;
  sourceCount: number;
  predictedCdps: string[];
  confidence: number;
  answerPreview: string;
}

function normalizeForMatch(input: string): string {
  return input.toLowerCase().replace(/\s+/g, '');
}

export function evaluateCase(evalCase: EvalCase, trace: AnswerTrace): CaseResult {
  const classification = trace.classification;
  const noMatch = classification?.kind === 'no_match';
  const predictedCdps = classification?.kind === 'scoped' ? classification.cdpIds : [];
  const expected = evalCase.expectedCdps.map((cdp) => cdp.trim().toLowerCase());

  const cdpHit = evalCase.expectNoMatch
    ? noMatch
    : expected.length === 0 || expected.some((cdp) => predictedCdps.includes(cdp));
  const sourceHintHit =
    evalCase.expectedSourceHints.length === 0 ||
    evalCase.expectedSourceHints.some((hint) =>
      trace.answer.sources.some((url) => normalizeForMatch(url).includes(normalizeForMatch(hint)))
    );

  return {
    id: evalCase.id,
    scopeCorrect: noMatch === evalCase.expectNoMatch,
    cdpHit,
    sourceHintHit,
    sourceCount: trace.answer.sources.length,
    predictedCdps,
    confidence:
      classification?.kind === 'scoped'
        ? Number(classification.confidence.toFixed(4))
        : Number((classification?.bestScore ?? 0).toFixed(4)),
    answerPreview: trace.answer.text.slice(0, 160),
  };
}

export function summarizeEval(results: readonly CaseResult[]): {
  scopeAccuracy: number;
  cdpHitRate: number;
  sourceHintHitRate: number;
} {
  const total = Math.max(results.length, 1);
  const rate = (predicate: (item: CaseResult) => boolean): number =>
    Number((results.filter(predicate).length / total).toFixed(4));

  return {
    scopeAccuracy: rate((item) => item.scopeCorrect),
    cdpHitRate: rate((item) => item.cdpHit),
    sourceHintHitRate: rate((item) => item.sourceHintHit),
  };
}
