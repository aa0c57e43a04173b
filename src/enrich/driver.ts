import { z } from 'zod';
import { assertChunkWindow, type PipelineConfig } from '../config.js';
import type { DBContext } from '../db/client.js';
import { ConfigError, errorMessage, MalformedKeyError, ModelUnavailableError } from '../errors.js';
import { completeJob, failJob, logIngestEvent, recordJobMetric, startJob } from '../observability.js';
import { type BlobStore, JSON_CONTENT_TYPE, TEXT_CONTENT_TYPE } from '../storage/blob-store.js';
import { isEligible } from '../storage/classifier.js';
import { deriveKeys, splitSourceKey } from '../storage/keys.js';
import { walkObjects } from '../storage/walker.js';
import {
  type ArticleMetadata,
  type ArticleRecord,
  type ChunkFailure,
  type EnrichmentMode,
  MODE_FOR_STAGE,
  type ObjectErrorKind,
  type ObjectOutcome,
  type RunSummary,
  type WriteFailure
} from '../types.js';
import { chunkByTokens } from '../utils/chunking.js';
import type { Tokenizer } from '../utils/tokenizer.js';
import type { Summarizer } from './summarizer.js';

export interface EnrichmentDeps {
  ctx: DBContext;
  store: BlobStore;
  tokenizer: Tokenizer;
  summarizer?: Summarizer;
}

const articleSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  publishedAt: z.string().nullish(),
  topic: z.string().nullish(),
  content: z.string().nullish()
});

interface RunState {
  jobId: number;
  mode: EnrichmentMode;
  config: PipelineConfig;
  deps: EnrichmentDeps;
}

type ParseResult = { ok: true; record: ArticleRecord } | { ok: false; message: string };

export function parseArticle(body: Uint8Array): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(body));
  } catch (error) {
    return { ok: false, message: `invalid JSON: ${errorMessage(error)}` };
  }
  const parsed = articleSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return { ok: false, message: `unexpected article shape: ${issues}` };
  }
  return { ok: true, record: parsed.data };
}

export function toMetadata(record: ArticleRecord): ArticleMetadata {
  return { publishedAt: record.publishedAt ?? null, topic: record.topic ?? null };
}

function objectError(run: RunState, key: string, kind: ObjectErrorKind, error: unknown): ObjectOutcome {
  const message = errorMessage(error);
  logIngestEvent(run.deps.ctx, {
    jobId: run.jobId,
    objectKey: key,
    level: kind === 'malformed_key' ? 'warn' : 'error',
    eventType: `object_${kind}`,
    event: { message }
  });
  return { key, status: 'error', kind, message };
}

async function writeArtifact(
  run: RunState,
  sourceKey: string,
  key: string,
  body: string,
  contentType: string,
  artifacts: string[],
  writeFailures: WriteFailure[]
): Promise<void> {
  try {
    await run.deps.store.put(run.config.destBucket, key, body, contentType);
    artifacts.push(key);
  } catch (error) {
    const message = errorMessage(error);
    writeFailures.push({ key, message });
    logIngestEvent(run.deps.ctx, {
      jobId: run.jobId,
      objectKey: sourceKey,
      level: 'warn',
      eventType: 'write_failed',
      event: { destKey: key, message }
    });
  }
}

async function produceChunkText(run: RunState, chunk: string): Promise<string> {
  if (run.mode === 'extract') return chunk;
  if (!run.deps.summarizer) {
    throw new ConfigError('Summarize mode requires a summarizer');
  }
  return run.deps.summarizer.summarize(chunk);
}

async function processObject(run: RunState, key: string): Promise<ObjectOutcome> {
  const { ctx, store, tokenizer } = run.deps;
  const { config } = run;

  try {
    splitSourceKey(key);
  } catch (error) {
    if (error instanceof MalformedKeyError) return objectError(run, key, 'malformed_key', error);
    throw error;
  }

  let body: Uint8Array;
  try {
    body = await store.get(config.sourceBucket, key);
  } catch (error) {
    return objectError(run, key, 'fetch', error);
  }

  const parsed = parseArticle(body);
  if (!parsed.ok) return objectError(run, key, 'decode', parsed.message);

  const content = parsed.record.content;
  if (!content || !content.trim()) {
    logIngestEvent(ctx, { jobId: run.jobId, objectKey: key, eventType: 'object_skipped', event: { reason: 'empty_content' } });
    return { key, status: 'skipped', reason: 'empty_content' };
  }

  let chunks: string[];
  try {
    chunks = run.mode === 'summarize' ? chunkByTokens(content, tokenizer, config.windowSize, config.overlap) : [content];
  } catch (error) {
    return objectError(run, key, 'chunk', error);
  }
  if (chunks.length > 1) {
    logIngestEvent(ctx, {
      jobId: run.jobId,
      objectKey: key,
      eventType: 'object_chunked',
      event: { chunks: chunks.length, windowSize: config.windowSize, overlap: config.overlap }
    });
  }

  const metadataBody = JSON.stringify(toMetadata(parsed.record), null, 2);
  const artifacts: string[] = [];
  const chunkFailures: ChunkFailure[] = [];
  const writeFailures: WriteFailure[] = [];

  for (let i = 0; i < chunks.length; i++) {
    const chunkIndex = i + 1;
    let text: string;
    try {
      text = await produceChunkText(run, chunks[i]);
    } catch (error) {
      if (error instanceof ModelUnavailableError || error instanceof ConfigError) throw error;
      const message = errorMessage(error);
      chunkFailures.push({ chunkIndex, message });
      logIngestEvent(ctx, {
        jobId: run.jobId,
        objectKey: key,
        level: 'warn',
        eventType: 'chunk_failed',
        event: { chunkIndex, chunks: chunks.length, message }
      });
      continue;
    }

    const { contentKey, metadataKey } = deriveKeys(key, config.stageName, chunkIndex, chunks.length);
    await writeArtifact(run, key, contentKey, text, TEXT_CONTENT_TYPE, artifacts, writeFailures);
    await writeArtifact(run, key, metadataKey, metadataBody, JSON_CONTENT_TYPE, artifacts, writeFailures);
  }

  recordJobMetric(ctx, {
    jobId: run.jobId,
    metricName: 'chunks_created',
    metricValue: chunks.length,
    labels: { objectKey: key }
  });
  logIngestEvent(ctx, {
    jobId: run.jobId,
    objectKey: key,
    eventType: 'object_processed',
    event: { chunks: chunks.length, artifacts, failedChunks: chunkFailures.length, failedWrites: writeFailures.length }
  });

  return { key, status: 'processed', chunks: chunks.length, artifacts, chunkFailures, writeFailures };
}

function emptySummary(jobId: number, mode: EnrichmentMode, config: PipelineConfig, prefix: string): RunSummary {
  return {
    jobId,
    mode,
    stage: config.stageName,
    prefix,
    listed: 0,
    ineligible: 0,
    processed: 0,
    skipped: 0,
    errored: 0,
    chunksProduced: 0,
    artifactsWritten: 0,
    chunkFailures: 0,
    writeFailures: 0,
    outcomes: []
  };
}

function tally(summary: RunSummary, outcome: ObjectOutcome): void {
  summary.outcomes.push(outcome);
  if (outcome.status === 'processed') {
    summary.processed++;
    summary.chunksProduced += outcome.chunks;
    summary.artifactsWritten += outcome.artifacts.length;
    summary.chunkFailures += outcome.chunkFailures.length;
    summary.writeFailures += outcome.writeFailures.length;
  } else if (outcome.status === 'skipped') {
    summary.skipped++;
  } else {
    summary.errored++;
  }
}

/**
 * Enrich every raw article under `{datePrefix}/` in the source bucket, one
 * object at a time in listing order. The stage picks the mode: `original`
 * copies the content verbatim, `summarized` chunks it and summarizes each
 * chunk.
 *
 * Object and chunk failures are recorded in the returned summary and the run
 * ledger. Listing failures, an unavailable model endpoint and bad
 * configuration abort the run; the job is marked failed and the error is
 * rethrown.
 */
export async function runEnrichment(config: PipelineConfig, deps: EnrichmentDeps): Promise<RunSummary> {
  const mode = MODE_FOR_STAGE[config.stageName];
  assertChunkWindow(config.windowSize, config.overlap);
  if (mode === 'summarize' && !deps.summarizer) {
    throw new ConfigError('Summarize mode requires a summarizer');
  }

  const { ctx } = deps;
  const prefix = `${config.datePrefix}/`;
  const jobId = startJob(ctx, `enrich_${mode}`, { ...config, tokenizer: deps.tokenizer.name });
  const run: RunState = { jobId, mode, config, deps };
  const summary = emptySummary(jobId, mode, config, prefix);
  const started = Date.now();

  try {
    logIngestEvent(ctx, { jobId, eventType: 'job_started', event: { mode, prefix, sourceBucket: config.sourceBucket } });

    for await (const obj of walkObjects(deps.store, config.sourceBucket, prefix)) {
      summary.listed++;
      if (!isEligible(obj.key, config.stageName)) {
        summary.ineligible++;
        logIngestEvent(ctx, { jobId, objectKey: obj.key, eventType: 'object_ineligible' });
        continue;
      }
      tally(summary, await processObject(run, obj.key));
    }

    recordJobMetric(ctx, { jobId, metricName: 'objects_listed', metricValue: summary.listed });
    recordJobMetric(ctx, { jobId, metricName: 'objects_processed', metricValue: summary.processed });
    recordJobMetric(ctx, { jobId, metricName: 'objects_errored', metricValue: summary.errored });
    recordJobMetric(ctx, { jobId, metricName: 'job_duration_ms', metricValue: Date.now() - started });

    const { outcomes: _outcomes, ...counts } = summary;
    completeJob(ctx, jobId, counts);
    logIngestEvent(ctx, { jobId, eventType: 'job_completed', event: counts });
    return summary;
  } catch (error) {
    const message = errorMessage(error);
    failJob(ctx, jobId, message);
    logIngestEvent(ctx, { jobId, level: 'error', eventType: 'job_failed', event: { message, listed: summary.listed } });
    throw error;
  }
}
