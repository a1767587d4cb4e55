import { CrawledPage, type CrawledPageDocument } from '../../models/CrawledPage';
import { normalizeCdpId, normalizeUrl } from '../rag/pageStore';
import { normalizeText } from '../rag/textUtils';
import type { DocumentSource, SourceDocument } from '../rag/types';

const UPSERT_BATCH_SIZE = 200;

type CrawledPageRecord = Pick<CrawledPageDocument, 'cdpId' | 'url' | 'title' | 'rawText' | 'fetchTime'>;

export interface UpsertSummary {
  received: number;
  upserted: number;
  modified: number;
  skipped: number;
}

export class MongoPageSource implements DocumentSource {
  readonly name = 'mongodb:crawledpages';
  private readonly cdpIds: readonly string[];

  constructor(cdpIds: readonly string[] = []) {
    this.cdpIds = cdpIds.map(normalizeCdpId);
  }

  async *fetchDocuments(): AsyncGenerator<SourceDocument> {
    const filter = this.cdpIds.length ? { cdpId: { $in: [...this.cdpIds] } } : {};
    const cursor = CrawledPage.find(filter, { cdpId: 1, url: 1, title: 1, rawText: 1, fetchTime: 1 })
      .sort({ cdpId: 1, createdAt: 1 })
      .lean<CrawledPageRecord[]>()
      .cursor();

    for await (const record of cursor) {
      yield {
        cdpId: record.cdpId,
        url: record.url,
        title: record.title,
        rawText: record.rawText,
        fetchTime: record.fetchTime,
      };
    }
  }
}

export async function upsertCrawledPages(documents: readonly SourceDocument[]): Promise<UpsertSummary> {
  const summary: UpsertSummary = { received: documents.length, upserted: 0, modified: 0, skipped: 0 };
  const valid = documents.filter((document) => {
    if (normalizeText(document.rawText)) {
      return true;
    }
    summary.skipped += 1;
    console.warn(`[rag:ingest] skipped ${document.url} (${document.cdpId}): no extractable text`);
    return false;
  });

  for (let i = 0; i < valid.length; i += UPSERT_BATCH_SIZE) {
    const batch = valid.slice(i, i + UPSERT_BATCH_SIZE);
    const bulkOps = batch.map((document) => {
      const title = normalizeText(document.title);
      return {
        updateOne: {
          filter: { cdpId: normalizeCdpId(document.cdpId), url: normalizeUrl(document.url) },
          update: {
            $set: {
              title,
              rawText: document.rawText,
              fetchTime: document.fetchTime,
            },
          },
          upsert: true,
        },
      };
    });

    const result = await CrawledPage.bulkWrite(bulkOps, { ordered: false });
    summary.upserted += result.upsertedCount;
    summary.modified += result.modifiedCount;
  }

  return summary;
}
