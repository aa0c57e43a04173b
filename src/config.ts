import { z } from 'zod';
import { DEFAULT_DB_PATH } from './db/client.js';
import { ConfigError } from './errors.js';
import { type EnrichmentMode, type Stage, STAGE_FOR_MODE } from './types.js';

export type TokenizerKind = 'bpe' | 'whitespace';

export interface PipelineConfig {
  sourceBucket: string;
  destBucket: string;
  datePrefix: string;
  windowSize: number;
  overlap: number;
  stageName: Stage;
}

export interface EnvSettings {
  region: string;
  sourceBucket: string;
  destBucket: string;
  windowSize: number;
  overlap: number;
  tokenizer: TokenizerKind;
  summarizerEndpoint: string | null;
  gnewsSecretId: string;
  gnewsSecretField: string;
  gnewsMaxArticles: number;
  dbPath: string;
}

const DATE_PREFIX = /^\d{4}-\d{2}-\d{2}$/;

const intFromEnv = (fallback: number) => z.coerce.number().int().default(fallback);

const envSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-east-1'),
  SOURCE_BUCKET: z.string().min(1).default('news-staging-area'),
  DEST_BUCKET: z.string().min(1).default('news-data-enriched'),
  CHUNK_WINDOW: intFromEnv(1024),
  CHUNK_OVERLAP: intFromEnv(100),
  TOKENIZER: z.enum(['bpe', 'whitespace']).default('bpe'),
  SUMMARIZER_ENDPOINT: z.string().optional(),
  GNEWS_SECRET_ID: z.string().min(1).default('Gnews-api-key'),
  GNEWS_SECRET_FIELD: z.string().min(1).default('GNEWS_API_KEY'),
  GNEWS_MAX_ARTICLES: intFromEnv(10).pipe(z.number().min(1).max(100)),
  ENRICH_DB_PATH: z.string().optional()
});

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(env)) {
    out[k] = v?.trim() ? v.trim() : undefined;
  }
  return out;
}

export function loadEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  return {
    region: e.AWS_REGION,
    sourceBucket: e.SOURCE_BUCKET,
    destBucket: e.DEST_BUCKET,
    windowSize: e.CHUNK_WINDOW,
    overlap: e.CHUNK_OVERLAP,
    tokenizer: e.TOKENIZER,
    summarizerEndpoint: e.SUMMARIZER_ENDPOINT ?? null,
    gnewsSecretId: e.GNEWS_SECRET_ID,
    gnewsSecretField: e.GNEWS_SECRET_FIELD,
    gnewsMaxArticles: e.GNEWS_MAX_ARTICLES,
    dbPath: e.ENRICH_DB_PATH ?? DEFAULT_DB_PATH
  };
}

export function assertDatePrefix(value: string): string {
  if (!DATE_PREFIX.test(value)) {
    throw new ConfigError(`Date must be formatted YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

export function assertChunkWindow(windowSize: number, overlap: number): void {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ConfigError(`Chunk window must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
    throw new ConfigError(`Chunk overlap must satisfy 0 <= overlap < ${windowSize}, got ${overlap}`);
  }
}

export function buildPipelineConfig(
  settings: EnvSettings,
  mode: EnrichmentMode,
  datePrefix: string,
  overrides: { windowSize?: number; overlap?: number } = {}
): PipelineConfig {
  const windowSize = overrides.windowSize ?? settings.windowSize;
  const overlap = overrides.overlap ?? settings.overlap;
  assertChunkWindow(windowSize, overlap);
  return {
    sourceBucket: settings.sourceBucket,
    destBucket: settings.destBucket,
    datePrefix: assertDatePrefix(datePrefix),
    windowSize,
    overlap,
    stageName: STAGE_FOR_MODE[mode]
  };
}
