import 'dotenv/config';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import { configuredPlatforms, env, retrievalSettingsFromEnv } from '../config/env';
import { DocsAssistant } from '../services/rag/docsAssistant';
import type { DocumentSource } from '../services/rag/types';
import { JsonCrawlCacheSource } from '../services/sources/jsonCrawlCache';
import { MongoPageSource } from '../services/sources/mongoPageSource';
import { evaluateCase, summarizeEval, type EvalCase } from './evalMetrics';

const evalCaseSchema = z.object({
  id: z.string().min(1),
  question: z.string().min(1),
  expectNoMatch: z.boolean().default(false),
  expectedCdps: z.array(z.string()).default([]),
  expectedSourceHints: z.array(z.string()).default([]),
});

function parseLimitArg(): number | undefined {
  const limitFlagIndex = process.argv.findIndex((arg) => arg === '--limit');
  if (limitFlagIndex >= 0 && process.argv[limitFlagIndex + 1]) {
    const parsed = Number(process.argv[limitFlagIndex + 1]);
    if (Number.isFinite(parsed) && parsed > 0) {
      return Math.floor(parsed);
    }
  }
  return undefined;
}

function resolveFromCwd(target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(process.cwd(), target);
}

async function readEvalSet(filePath: string): Promise<EvalCase[]> {
  const content = await fs.readFile(filePath, 'utf8');
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line, index) => {
      const parsed = evalCaseSchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`Invalid eval case on line ${index + 1}: ${parsed.error.message}`);
      }
      return parsed.data;
    });
}

async function createSource(): Promise<DocumentSource> {
  if (env.MONGODB_URI) {
    await connectToDatabase();
    return new MongoPageSource(configuredPlatforms());
  }
  return new JsonCrawlCacheSource(env.CDP_DOCS_DIR, configuredPlatforms());
}

async function main(): Promise<void> {
  const setPath = resolveFromCwd(env.RAG_EVAL_SET_PATH);
  const reportDir = resolveFromCwd(env.RAG_EVAL_REPORT_DIR);
  await fs.mkdir(reportDir, { recursive: true });

  const allCases = await readEvalSet(setPath);
  const limit = parseLimitArg();
  const cases = typeof limit === 'number' ? allCases.slice(0, limit) : allCases;
  console.log(`[rag:eval] loaded ${cases.length} cases`);

  const assistant = new DocsAssistant(retrievalSettingsFromEnv());
  await assistant.refresh(await createSource());

  const caseResults = cases.map((evalCase) => {
    const result = evaluateCase(evalCase, assistant.answerQueryDetailed(evalCase.question));
    console.log(
      `[rag:eval] ${evalCase.id} scope=${result.scopeCorrect} cdpHit=${result.cdpHit} sourceHit=${result.sourceHintHit}`
    );
    return result;
  });

  const report = {
    generatedAt: new Date().toISOString(),
    evalSetPath: setPath,
    totalCases: caseResults.length,
    settings: retrievalSettingsFromEnv(),
    summary: summarizeEval(caseResults),
    cases: caseResults,
  };

  const outputPath = path.join(reportDir, `rag-eval-report-${Date.now()}.json`);
  await fs.writeFile(outputPath, JSON.stringify(report, null, 2), 'utf8');
  console.log(`[rag:eval] report -> ${outputPath}`);
}

main()
  .catch((error) => {
    console.error('[rag:eval] failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await disconnectFromDatabase();
  });
