import { OUT_OF_SCOPE_ANSWER, UNAVAILABLE_ANSWER } from '../../src/services/rag/answerSynthesizer';
import { DocsAssistant } from '../../src/services/rag/docsAssistant';
import { PageStore } from '../../src/services/rag/pageStore';
import {
  arraySource,
  FETCH_TIME,
  fixtureDocuments,
  fixtureStore,
  LYTICS_SEGMENTS_URL,
  MPARTICLE_AUDIENCE_URL,
  SEGMENT_DESTINATION_URL,
  SEGMENT_SOURCE_CHUNKS,
  SEGMENT_SOURCE_URL,
  silenceConsole,
  testSettings,
} from '../helpers/corpus';

describe('DocsAssistant', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function readyAssistant(): Promise<DocsAssistant> {
    const assistant = new DocsAssistant(testSettings, fixtureStore());
    await assistant.rebuild();
    return assistant;
  }

  it('answers a Segment how-to question from the Segment docs', async () => {
    const assistant = await readyAssistant();
    const trace = assistant.answerQueryDetailed('How do I set up a new source in Segment?');

    expect(trace.answer).toEqual({ text: SEGMENT_SOURCE_CHUNKS[0], sources: [SEGMENT_SOURCE_URL] });
    expect(trace.stages).toEqual(['received', 'classified', 'retrieved', 'answered']);
    expect(trace.classification?.kind === 'scoped' && trace.classification.cdpIds).toEqual(['segment']);
    expect(trace.passages.map((passage) => passage.chunkIndex)).toEqual([0, 1]);
    expect(trace.steps).toEqual([
      'Open Connections in your workspace.',
      'Click Add Source.',
      'Choose the source type from the catalog and give it a name.',
      'Copy the write key into your application.',
    ]);
    expect(trace.query).toEqual({ normalizedText: 'How do I set up a new source in Segment?', tokens: 4, truncated: false });
    expect(trace.indexVersion).toBe(1);
  });

  it('answers off-topic questions with the fixed out-of-scope reply', async () => {
    const assistant = await readyAssistant();
    const trace = assistant.answerQueryDetailed('Which movie is releasing this week?');

    expect(trace.answer).toEqual({ text: OUT_OF_SCOPE_ANSWER, sources: [] });
    expect(trace.stages).toEqual(['received', 'classified', 'answered']);
    expect(trace.passages).toEqual([]);
  });

  it('draws on every CDP within the tie margin', async () => {
    const assistant = await readyAssistant();
    const answer = assistant.answerQuery('how do I create a segment');

    expect(answer.sources).toEqual([MPARTICLE_AUDIENCE_URL, LYTICS_SEGMENTS_URL]);
    expect(answer.text.startsWith('Audiences let you create a segment of users')).toBe(true);
    expect(answer.text).toContain('\n\nA segment in Lytics is a group of user profiles defined by rules.');
  });

  it('stitches passages from several pages within the answer budget', async () => {
    const assistant = await readyAssistant();
    const answer = assistant.answerQuery('How do I add a destination?');

    expect(answer.sources).toEqual([SEGMENT_DESTINATION_URL, SEGMENT_SOURCE_URL]);
    expect(answer.text.length).toBeLessThanOrEqual(testSettings.maxAnswerChars);
  });

  it('restricts answers to the requested CDPs', async () => {
    const assistant = await readyAssistant();
    const answer = assistant.answerQuery('how do I create a segment', { cdps: ['lytics'] });

    expect(answer.sources).toEqual([LYTICS_SEGMENTS_URL]);
  });

  it('only cites URLs that were in the store when the index was built', async () => {
    const assistant = await readyAssistant();
    const snapshot = assistant.snapshot();
    const questions = [
      'How do I set up a new source in Segment?',
      'how do I create a segment',
      'identity rules email',
      'catalogue attribute consent',
      'Initialize the web SDK',
    ];

    for (const question of questions) {
      for (const url of assistant.answerQuery(question).sources) {
        expect(snapshot?.sourceUrls.has(url)).toBe(true);
      }
    }
  });

  it('gives the same answer for the same question', async () => {
    const assistant = await readyAssistant();
    expect(assistant.answerQuery('identity rules email')).toEqual(assistant.answerQuery('identity rules email'));
  });

  it('reports the index as unavailable before the first build', () => {
    const assistant = new DocsAssistant(testSettings, fixtureStore());
    const trace = assistant.answerQueryDetailed('How do I add a destination?');

    expect(trace.answer).toEqual({ text: UNAVAILABLE_ANSWER, sources: [] });
    expect(trace.stages).toEqual(['received', 'answered']);
    expect(assistant.status()).toEqual({
      ready: false,
      building: false,
      version: null,
      builtAt: null,
      documents: 0,
      passages: 0,
      corpora: {},
    });
    expect(assistant.compare('add a source')).toEqual({ text: UNAVAILABLE_ANSWER, sources: [], platforms: [] });
  });

  it('keeps serving the previous snapshot while a rebuild runs', async () => {
    const assistant = await readyAssistant();
    const before = assistant.snapshot();
    const consentUrl = 'https://zeotap.example.com/articles/consent-manager';
    assistant.store.put({
      cdpId: 'zeotap',
      url: consentUrl,
      title: 'Consent Manager',
      rawText: 'The consent manager records opt-in choices and blocks activation for users without consent.',
      fetchTime: FETCH_TIME,
    });

    const pending = assistant.rebuild();
    expect(assistant.status().building).toBe(true);
    expect(assistant.snapshot()).toBe(before);
    expect(assistant.answerQuery('consent manager opt-in').sources).not.toContain(consentUrl);

    const after = await pending;
    expect(assistant.snapshot()).toBe(after);
    expect(after.version).toBe(2);
    expect(assistant.status().building).toBe(false);
    expect(assistant.answerQuery('consent manager opt-in').sources[0]).toBe(consentUrl);
  });

  it('runs queued rebuilds one after another', async () => {
    const assistant = new DocsAssistant(testSettings, fixtureStore());
    const [first, second] = await Promise.all([assistant.rebuild(), assistant.rebuild()]);

    expect(first.version).toBe(1);
    expect(second.version).toBe(2);
    expect(assistant.snapshot()).toBe(second);
  });

  it('ingests a document source and publishes a fresh index', async () => {
    const assistant = new DocsAssistant(testSettings, new PageStore());
    const documents = [
      ...fixtureDocuments(),
      { cdpId: 'zeotap', url: 'https://zeotap.example.com/articles/empty', title: 'Empty', rawText: ' ', fetchTime: FETCH_TIME },
    ];
    const result = await assistant.refresh(arraySource('fixture', documents));

    expect(result.ingest).toEqual({
      source: 'fixture',
      inserted: 7,
      updated: 0,
      unchanged: 0,
      skipped: 1,
      byCdp: { segment: 2, mparticle: 2, lytics: 2, zeotap: 1 },
    });
    expect(result.status).toMatchObject({
      ready: true,
      building: false,
      version: 1,
      documents: 7,
      passages: 9,
      corpora: { segment: 3, mparticle: 3, lytics: 2, zeotap: 1 },
    });
  });

  it('compares a feature across every indexed CDP', async () => {
    const assistant = await readyAssistant();
    const result = assistant.compare('add a source');

    expect(result.sources).toEqual([SEGMENT_SOURCE_URL]);
    expect(result.platforms).toEqual([
      { cdpId: 'segment', found: true, sources: [SEGMENT_SOURCE_URL] },
      { cdpId: 'mparticle', found: false, sources: [] },
      { cdpId: 'lytics', found: false, sources: [] },
      { cdpId: 'zeotap', found: false, sources: [] },
    ]);
    expect(result.text.startsWith('Here\'s how the platforms handle "add a source":\n\nSEGMENT:\n- Add a Source: ')).toBe(
      true
    );
  });
});
