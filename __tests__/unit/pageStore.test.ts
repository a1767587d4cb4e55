import { EmptyDocumentError } from '../../src/services/rag/errors';
import { normalizeUrl, PageStore } from '../../src/services/rag/pageStore';
import type { SourceDocument } from '../../src/services/rag/types';
import { FETCH_TIME } from '../helpers/corpus';

function page(overrides: Partial<SourceDocument> = {}): SourceDocument {
  return {
    cdpId: 'segment',
    url: 'https://segment.example.com/docs/tracking-plans',
    title: 'Tracking Plans',
    rawText: 'Tracking plans describe the events you expect to receive.',
    fetchTime: FETCH_TIME,
    ...overrides,
  };
}

describe('PageStore', () => {
  let store: PageStore;

  beforeEach(() => {
    store = new PageStore();
  });

  it('reports inserted, unchanged and updated puts for the same page', () => {
    expect(store.put(page())).toBe('inserted');
    expect(store.put(page())).toBe('unchanged');
    expect(store.put(page({ rawText: 'Tracking plans list expected events.' }))).toBe('updated');
    expect(store.size).toBe(1);
    expect(store.get('segment', page().url)?.rawText).toBe('Tracking plans list expected events.');
  });

  it('treats a title change as new content', () => {
    store.put(page());
    const before = store.contentHash('segment', page().url);
    expect(store.put(page({ title: 'Tracking Plan Basics' }))).toBe('updated');
    expect(store.contentHash('segment', page().url)).not.toBe(before);
  });

  it('keys pages by normalized CDP id and URL', () => {
    store.put(page({ cdpId: ' Segment ', url: 'https://segment.example.com/docs/tracking-plans/#overview' }));

    const stored = store.get('SEGMENT', 'https://segment.example.com/docs/tracking-plans');
    expect(stored?.cdpId).toBe('segment');
    expect(stored?.url).toBe('https://segment.example.com/docs/tracking-plans');
  });

  it('keeps the same URL under different CDPs apart', () => {
    store.put(page());
    store.put(page({ cdpId: 'lytics' }));
    expect(store.size).toBe(2);
    expect(store.cdpIds()).toEqual(['segment', 'lytics']);
  });

  it('rejects pages without text', () => {
    expect(() => store.put(page({ rawText: '  \n\t ' }))).toThrow(EmptyDocumentError);
    expect(store.size).toBe(0);
  });

  it('derives a title from the URL when the page has none', () => {
    store.put(page({ title: '   ', url: 'https://segment.example.com/docs/add-source?ref=nav' }));
    expect(store.get('segment', 'https://segment.example.com/docs/add-source?ref=nav')?.title).toBe('add-source');
  });

  it('stores frozen copies', () => {
    const input = page({ fetchTime: new Date('2024-05-01T00:00:00.000Z') });
    store.put(input);
    input.fetchTime.setTime(0);

    const stored = store.get('segment', input.url);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(stored?.fetchTime.toISOString()).toBe('2024-05-01T00:00:00.000Z');
  });

  it('iterates in first-insertion order, restartably, with an optional CDP filter', () => {
    const first = page({ url: 'https://segment.example.com/docs/a' });
    const second = page({ cdpId: 'lytics', url: 'https://lytics.example.com/docs/b' });
    const third = page({ url: 'https://segment.example.com/docs/c' });
    store.put(first);
    store.put(second);
    store.put(third);
    store.put({ ...first, rawText: 'Rewritten text for the first page.' });

    const view = store.all();
    const urls = [...view].map((doc) => doc.url);
    expect(urls).toEqual([first.url, second.url, third.url]);
    expect([...view].map((doc) => doc.url)).toEqual(urls);
    expect([...store.all('segment')].map((doc) => doc.url)).toEqual([first.url, third.url]);
  });
});

describe('normalizeUrl', () => {
  it('drops fragments and trailing slashes but keeps the root path', () => {
    expect(normalizeUrl(' https://lytics.example.com/docs/segments/#rules ')).toBe(
      'https://lytics.example.com/docs/segments'
    );
    expect(normalizeUrl('https://lytics.example.com/')).toBe('https://lytics.example.com/');
  });

  it('strips fragments from values that are not absolute URLs', () => {
    expect(normalizeUrl('docs/segments#rules')).toBe('docs/segments');
  });
});
