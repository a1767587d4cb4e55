import { EmptyDocumentError } from './errors';
import { normalizeCdpId, type PageStore, type PutResult } from './pageStore';
import type { DocumentSource } from './types';

export interface IngestSummary {
  source: string;
  inserted: number;
  updated: number;
  unchanged: number;
  skipped: number;
  byCdp: Record<string, number>;
}

/**
 * Drains a Document Source into the PageStore. Empty pages are logged and skipped;
 * any other failure aborts the ingest.
 */
export async function ingestFromSource(store: PageStore, source: DocumentSource): Promise<IngestSummary> {
  const counts: Record<PutResult, number> = { inserted: 0, updated: 0, unchanged: 0 };
  const byCdp: Record<string, number> = {};
  let skipped = 0;

  for await (const document of source.fetchDocuments()) {
    try {
      const result = store.put(document);
      counts[result] += 1;
      const cdpId = normalizeCdpId(document.cdpId);
      byCdp[cdpId] = (byCdp[cdpId] ?? 0) + 1;
    } catch (error) {
      if (error instanceof EmptyDocumentError) {
        skipped += 1;
        console.warn(`[rag:ingest] skipped ${error.url} (${error.cdpId}): no extractable text`);
        continue;
      }
      throw error;
    }
  }

  console.log(
    `[rag:ingest] ${source.name}: inserted=${counts.inserted}, updated=${counts.updated}, unchanged=${counts.unchanged}, skipped=${skipped}`
  );
  return { source: source.name, ...counts, skipped, byCdp };
}
