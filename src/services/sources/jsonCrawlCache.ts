import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { DocumentSource, SourceDocument } from '../rag/types';

const crawlRecordSchema = z.object({
  url: z.string().trim().min(1),
  title: z.string().nullish(),
  platform: z.string().trim().min(1).optional(),
  content: z.string(),
  fetchedAt: z.coerce.date().optional(),
});

export type CrawlRecord = z.infer<typeof crawlRecordSchema>;

export function crawlCacheFile(dir: string, cdpId: string): string {
  return path.join(dir, `${cdpId}_docs.json`);
}

export function toSourceDocument(cdpId: string, record: CrawlRecord, fallbackTime: Date): SourceDocument {
  return {
    cdpId: record.platform ?? cdpId,
    url: record.url,
    title: record.title ?? '',
    rawText: record.content,
    fetchTime: record.fetchedAt ?? fallbackTime,
  };
}

/**
 * Reads the crawler's JSON dumps, one file per CDP. A missing file or an invalid
 * record is reported and skipped; the remaining platforms still load.
 */
export class JsonCrawlCacheSource implements DocumentSource {
  readonly name: string;
  private readonly dir: string;
  private readonly cdpIds: readonly string[];

  constructor(dir: string, cdpIds: readonly string[]) {
    this.dir = path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
    this.cdpIds = cdpIds;
    this.name = `json:${this.dir}`;
  }

  async *fetchDocuments(): AsyncGenerator<SourceDocument> {
    for (const cdpId of this.cdpIds) {
      const filePath = crawlCacheFile(this.dir, cdpId);
      let raw: string;
      let fetchTime: Date;
      try {
        raw = await fs.readFile(filePath, 'utf8');
        fetchTime = (await fs.stat(filePath)).mtime;
      } catch (error) {
        console.warn(`[rag:source] documentation for ${cdpId} not found at ${filePath}:`, error);
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        console.warn(`[rag:source] ${filePath} is not valid JSON, skipping:`, error);
        continue;
      }
      if (!Array.isArray(parsed)) {
        console.warn(`[rag:source] ${filePath} is not a JSON array, skipping`);
        continue;
      }

      let invalid = 0;
      for (const item of parsed) {
        const record = crawlRecordSchema.safeParse(item);
        if (!record.success) {
          invalid += 1;
          continue;
        }
        yield toSourceDocument(cdpId, record.data, fetchTime);
      }
      if (invalid > 0) {
        console.warn(`[rag:source] ${filePath}: skipped ${invalid} invalid records`);
      }
    }
  }
}
