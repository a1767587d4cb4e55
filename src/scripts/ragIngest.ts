import 'dotenv/config';
import path from 'node:path';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import { configuredPlatforms, env } from '../config/env';
import type { SourceDocument } from '../services/rag/types';
import { JsonCrawlCacheSource } from '../services/sources/jsonCrawlCache';
import { upsertCrawledPages } from '../services/sources/mongoPageSource';

function parseDirFromArgv(): string | undefined {
  const dirFlagIndex = process.argv.findIndex((arg) => arg === '--dir');
  if (dirFlagIndex >= 0 && process.argv[dirFlagIndex + 1]) {
    return process.argv[dirFlagIndex + 1];
  }
  return undefined;
}

async function main(): Promise<void> {
  const dir = parseDirFromArgv() ?? env.CDP_DOCS_DIR;
  const absDir = path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
  console.log(`[rag:ingest] crawl cache: ${absDir}`);

  const source = new JsonCrawlCacheSource(absDir, configuredPlatforms());
  const documents: SourceDocument[] = [];
  for await (const document of source.fetchDocuments()) {
    documents.push(document);
  }

  await connectToDatabase();
  const summary = await upsertCrawledPages(documents);

  console.log(
    `[rag:ingest] completed: received=${summary.received}, upserted=${summary.upserted}, modified=${summary.modified}, skipped=${summary.skipped}`
  );
}

main()
  .catch((error) => {
    console.error('[rag:ingest] failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await disconnectFromDatabase();
  });
