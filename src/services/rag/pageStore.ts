import { EmptyDocumentError } from './errors';
import { hashContent, normalizeText } from './textUtils';
import type { SourceDocument, StoredDocument } from './types';

export type PutResult = 'inserted' | 'updated' | 'unchanged';

export function normalizeCdpId(cdpId: string): string {
  return cdpId.trim().toLowerCase();
}

export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    parsed.hash = '';
    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
      parsed.pathname = parsed.pathname.replace(/\/+$/, '');
    }
    return parsed.toString();
  } catch {
    return trimmed.replace(/#.*$/, '');
  }
}

function fallbackTitle(url: string): string {
  const segments = url.split(/[?#]/)[0].split('/').filter(Boolean);
  return segments[segments.length - 1] ?? url;
}

function storeKey(cdpId: string, url: string): string {
  return `${cdpId}\u0000${url}`;
}

/**
 * Canonical crawl cache. Records are frozen and keyed by `(cdpId, url)`; a re-fetch
 * replaces the record in place, so iteration order stays the first-insertion order.
 */
export class PageStore {
  private readonly records = new Map<string, StoredDocument>();

  get size(): number {
    return this.records.size;
  }

  put(document: SourceDocument): PutResult {
    const cdpId = normalizeCdpId(document.cdpId);
    const url = normalizeUrl(document.url);
    if (!normalizeText(document.rawText)) {
      throw new EmptyDocumentError(cdpId, url);
    }

    const title = normalizeText(document.title) || fallbackTitle(url);
    const contentHash = hashContent(title, document.rawText);
    const key = storeKey(cdpId, url);
    const existing = this.records.get(key);
    if (existing?.contentHash === contentHash) {
      return 'unchanged';
    }

    this.records.set(
      key,
      Object.freeze({
        cdpId,
        url,
        title,
        rawText: document.rawText,
        fetchTime: new Date(document.fetchTime.getTime()),
        contentHash,
      })
    );
    return existing ? 'updated' : 'inserted';
  }

  get(cdpId: string, url: string): StoredDocument | undefined {
    return this.records.get(storeKey(normalizeCdpId(cdpId), normalizeUrl(url)));
  }

  contentHash(cdpId: string, url: string): string | undefined {
    return this.get(cdpId, url)?.contentHash;
  }

  all(cdpId?: string): Iterable<StoredDocument> {
    const records = this.records;
    const wanted = cdpId === undefined ? undefined : normalizeCdpId(cdpId);
    return {
      *[Symbol.iterator]() {
        for (const record of records.values()) {
          if (wanted === undefined || record.cdpId === wanted) {
            yield record;
          }
        }
      },
    };
  }

  cdpIds(): string[] {
    const ids = new Set<string>();
    for (const record of this.records.values()) {
      ids.add(record.cdpId);
    }
    return [...ids];
  }
}
