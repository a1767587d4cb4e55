import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(2818),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI must not be empty').optional(),
  CDP_DOCS_DIR: z.string().default('data/cdp_docs'),
  CDP_PLATFORMS: z.string().default('segment,mparticle,lytics,zeotap'),
  RAG_MAX_CHUNK_CHARS: z.coerce.number().int().positive().max(8000).default(800),
  RAG_MIN_CHUNK_CHARS: z.coerce.number().int().nonnegative().default(200),
  RAG_OVERLAP_SENTENCES: z.coerce.number().int().nonnegative().max(10).default(2),
  RAG_MAX_FEATURES: z.coerce.number().int().positive().default(10000),
  RAG_SCOPE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.1),
  RAG_TIE_MARGIN: z.coerce.number().min(0).max(1).default(0.05),
  RAG_MIN_RETRIEVAL_SCORE: z.coerce.number().min(0).max(1).default(0.05),
  RAG_TOP_K: z.coerce.number().int().positive().max(20).default(5),
  RAG_MAX_QUERY_TOKENS: z.coerce.number().int().positive().max(2048).default(64),
  RAG_MAX_ANSWER_CHARS: z.coerce.number().int().positive().default(1200),
  RAG_EVAL_SET_PATH: z.string().default('data/eval/cdp_eval.jsonl'),
  RAG_EVAL_REPORT_DIR: z.string().default('reports'),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('Invalid environment variables:');
  console.error(parsedEnv.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsedEnv.data;

export type Env = z.infer<typeof envSchema>;

/**
 * Tunables accepted by the retrieval core. Components receive these explicitly
 * so tests and scripts can run with their own values.
 */
export interface RetrievalSettings {
  maxChunkChars: number;
  minChunkChars: number;
  overlapSentences: number;
  maxFeatures: number;
  scopeThreshold: number;
  tieMargin: number;
  minRetrievalScore: number;
  k: number;
  maxQueryTokens: number;
  maxAnswerChars: number;
}

export function retrievalSettingsFromEnv(source: Env = env): RetrievalSettings {
  return {
    maxChunkChars: source.RAG_MAX_CHUNK_CHARS,
    minChunkChars: source.RAG_MIN_CHUNK_CHARS,
    overlapSentences: source.RAG_OVERLAP_SENTENCES,
    maxFeatures: source.RAG_MAX_FEATURES,
    scopeThreshold: source.RAG_SCOPE_THRESHOLD,
    tieMargin: source.RAG_TIE_MARGIN,
    minRetrievalScore: source.RAG_MIN_RETRIEVAL_SCORE,
    k: source.RAG_TOP_K,
    maxQueryTokens: source.RAG_MAX_QUERY_TOKENS,
    maxAnswerChars: source.RAG_MAX_ANSWER_CHARS,
  };
}

export function configuredPlatforms(source: Env = env): string[] {
  return source.CDP_PLATFORMS.split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

function requireConfig(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`${name} is required for this operation`);
  }
  return value;
}

export function requireMongoUri(): string {
  return requireConfig('MONGODB_URI', env.MONGODB_URI);
}
