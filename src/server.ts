import 'dotenv/config';
import { createApp } from './app';
import { connectToDatabase } from './config/db';
import { configuredPlatforms, env, retrievalSettingsFromEnv } from './config/env';
import { DocsAssistant } from './services/rag/docsAssistant';
import type { DocumentSource } from './services/rag/types';
import { JsonCrawlCacheSource } from './services/sources/jsonCrawlCache';
import { MongoPageSource } from './services/sources/mongoPageSource';

async function createDocumentSource(): Promise<DocumentSource> {
  if (env.MONGODB_URI) {
    await connectToDatabase();
    return new MongoPageSource(configuredPlatforms());
  }
  return new JsonCrawlCacheSource(env.CDP_DOCS_DIR, configuredPlatforms());
}

async function bootstrap(): Promise<void> {
  const source = await createDocumentSource();
  const assistant = new DocsAssistant(retrievalSettingsFromEnv());
  const app = createApp(assistant, { source });

  app.listen(env.PORT, env.HOST, () => {
    console.log(`[server] Running at http://${env.HOST}:${env.PORT}`);
  });

  // Queries get the "unavailable" answer until the first build is published.
  const { ingest, status } = await assistant.refresh(source);
  console.log(
    `[server] Index ready: documents=${status.documents}, passages=${status.passages}, skipped=${ingest.skipped}`
  );
}

bootstrap().catch((error) => {
  console.error('[server] Startup failed:', error);
  process.exit(1);
});
