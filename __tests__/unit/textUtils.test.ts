import {
  extractNumberedSteps,
  hashContent,
  normalizeText,
  splitAtWords,
  splitSentences,
  tokenize,
  toTerms,
  truncateAtBoundary,
} from '../../src/services/rag/textUtils';
import { SEGMENT_SOURCE_CHUNKS } from '../helpers/corpus';

describe('tokenize', () => {
  it('lower-cases words and drops stop words and single characters', () => {
    expect(tokenize('How do I set up a new source in Segment?')).toEqual(['set', 'new', 'source', 'segment']);
  });

  it('stops after the token limit', () => {
    expect(tokenize('alpha beta gamma delta', 2)).toEqual(['alpha', 'beta']);
  });

  it('keeps non-Latin letters and digits', () => {
    expect(tokenize('Café v2 über')).toEqual(['café', 'v2', 'über']);
  });
});

describe('toTerms', () => {
  it('appends bigrams of consecutive tokens after the unigrams', () => {
    expect(toTerms(['add', 'source', 'segment'])).toEqual([
      'add',
      'source',
      'segment',
      'add source',
      'source segment',
    ]);
  });
});

describe('normalizeText', () => {
  it('collapses whitespace runs', () => {
    expect(normalizeText('  open\n\tthe   catalog  ')).toBe('open the catalog');
  });
});

describe('splitSentences', () => {
  it('splits on terminal punctuation but keeps list markers with their step', () => {
    expect(splitSentences('First one.  Second!\nThird? 1. Open it. 2. Close it.')).toEqual([
      'First one.',
      'Second!',
      'Third?',
      '1. Open it.',
      '2. Close it.',
    ]);
  });

  it('still splits after a sentence that ends in a number', () => {
    expect(splitSentences('Set the batch size to 10. Then click Save. Done.')).toEqual([
      'Set the batch size to 10.',
      'Then click Save.',
      'Done.',
    ]);
  });

  it('keeps a list marker that follows a colon', () => {
    expect(splitSentences('Steps: 1. Open it.')).toEqual(['Steps: 1. Open it.']);
  });

  it('does not split inside version numbers', () => {
    expect(splitSentences('Version 2.0 is out. Upgrade soon.')).toEqual(['Version 2.0 is out.', 'Upgrade soon.']);
  });

  it('returns nothing for blank text', () => {
    expect(splitSentences(' \n ')).toEqual([]);
  });
});

describe('splitAtWords', () => {
  it('packs words into pieces within the limit', () => {
    expect(splitAtWords('alpha beta gamma delta', 11)).toEqual(['alpha beta', 'gamma delta']);
  });

  it('hard-splits words longer than the limit', () => {
    expect(splitAtWords('abcdefghij xy', 4)).toEqual(['abcd', 'efgh', 'ij', 'xy']);
  });
});

describe('truncateAtBoundary', () => {
  it('prefers the last sentence end inside the budget', () => {
    expect(truncateAtBoundary('One two. Three four five.', 12)).toBe('One two.');
  });

  it('keeps a sentence that ends exactly at the budget', () => {
    expect(truncateAtBoundary('One two. Three', 8)).toBe('One two.');
  });

  it('falls back to a word boundary', () => {
    expect(truncateAtBoundary('alpha beta gamma', 12)).toBe('alpha beta');
  });

  it('returns short text untouched', () => {
    expect(truncateAtBoundary('short', 12)).toBe('short');
  });
});

describe('hashContent', () => {
  it('separates parts so shifted boundaries hash differently', () => {
    expect(hashContent('ab', 'c')).not.toBe(hashContent('a', 'bc'));
    expect(hashContent('ab', 'c')).toBe(hashContent('ab', 'c'));
    expect(hashContent('ab', 'c')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('extractNumberedSteps', () => {
  it('pulls numbered steps in order', () => {
    expect(extractNumberedSteps(SEGMENT_SOURCE_CHUNKS[0])).toEqual([
      'Open Connections in your workspace.',
      'Click Add Source.',
      'Choose the source type from the catalog and give it a name.',
      'Copy the write key into your application.',
    ]);
  });

  it('accepts a parenthesis marker and a step at the start of the text', () => {
    expect(extractNumberedSteps('1) Pick a plan. 2) Confirm.')).toEqual(['Pick a plan.', 'Confirm.']);
  });

  it('ignores text without numbered steps', () => {
    expect(extractNumberedSteps('Version 2.0 adds audiences.')).toEqual([]);
  });
});
