#!/usr/bin/env node
import 'dotenv/config';
import { buildPipelineConfig, type EnvSettings, loadEnvSettings } from './config.js';
import { initDB } from './db/client.js';
import { runEnrichment } from './enrich/driver.js';
import { EndpointSummarizer, sageMakerInvoker } from './enrich/summarizer.js';
import { ConfigError } from './errors.js';
import { DEFAULT_TOPICS, TOPIC_QUERIES } from './ingest/news-search.js';
import { stageArticles } from './ingest/staging.js';
import { healthStatus, jobFailures } from './observability.js';
import { getSecretValue, secretsManagerLoader } from './secrets.js';
import { S3BlobStore } from './storage/s3-store.js';
import type { EnrichmentMode, RunSummary } from './types.js';
import { createTokenizer } from './utils/tokenizer.js';

const USAGE = [
  'Usage:',
  '  news-enrich stage <YYYY-MM-DD> [--topics <topic,topic>]',
  '  news-enrich extract <YYYY-MM-DD>',
  '  news-enrich summarize <YYYY-MM-DD> [--window <tokens>] [--overlap <tokens>]',
  '  news-enrich status'
].join('\n');

function parseFlags(args: string[]): { positional: string[]; flags: Record<string, string> } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  let i = 0;
  while (i < args.length) {
    if (args[i].startsWith('--') && i + 1 < args.length && !args[i + 1].startsWith('--')) {
      flags[args[i].slice(2)] = args[i + 1];
      i += 2;
    } else {
      positional.push(args[i]);
      i++;
    }
  }
  return { positional, flags };
}

function intFlag(flags: Record<string, string>, name: string): number | undefined {
  const raw = flags[name];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function parseTopics(raw: string | undefined): string[] {
  if (!raw) return DEFAULT_TOPICS;
  const topics = raw.split(',').map((t) => t.trim()).filter(Boolean);
  const unknown = topics.filter((t) => !(t in TOPIC_QUERIES));
  if (unknown.length) {
    throw new ConfigError(`Unknown topics: ${unknown.join(', ')}. Known topics: ${DEFAULT_TOPICS.join(', ')}`);
  }
  return topics;
}

function printRunSummary(summary: RunSummary): void {
  const { outcomes, ...counts } = summary;
  console.log(JSON.stringify(counts, null, 2));
  for (const o of outcomes) {
    if (o.status === 'error') {
      console.error(`  ✗ ${o.key} [${o.kind}] ${o.message}`);
    } else if (o.status === 'processed') {
      for (const f of o.chunkFailures) console.error(`  ✗ ${o.key} chunk ${f.chunkIndex}: ${f.message}`);
      for (const f of o.writeFailures) console.error(`  ✗ ${f.key}: ${f.message}`);
    }
  }
}

async function enrich(settings: EnvSettings, mode: EnrichmentMode, rest: string[]): Promise<void> {
  const { positional, flags } = parseFlags(rest);
  const date = positional[0];
  if (!date) {
    console.error(`Error: date required.\n${USAGE}`);
    process.exit(1);
  }

  const config = buildPipelineConfig(settings, mode, date, {
    windowSize: intFlag(flags, 'window'),
    overlap: intFlag(flags, 'overlap')
  });

  let summarizer: EndpointSummarizer | undefined;
  if (mode === 'summarize') {
    if (!settings.summarizerEndpoint) {
      throw new ConfigError('SUMMARIZER_ENDPOINT must be set to summarize');
    }
    summarizer = new EndpointSummarizer(settings.summarizerEndpoint, sageMakerInvoker(settings.region));
  }

  const ctx = initDB(settings.dbPath);
  const summary = await runEnrichment(config, {
    ctx,
    store: new S3BlobStore(settings.region),
    tokenizer: createTokenizer(settings.tokenizer),
    summarizer
  });
  printRunSummary(summary);
}

async function main() {
  const settings = loadEnvSettings();
  const rawArgs = process.argv.slice(2);
  const cmd = rawArgs[0];
  const rest = rawArgs.slice(1);

  if (cmd === 'stage') {
    const { positional, flags } = parseFlags(rest);
    const date = positional[0];
    if (!date) {
      console.error(`Error: date required.\n${USAGE}`);
      process.exit(1);
    }
    const ctx = initDB(settings.dbPath);
    const summary = await stageArticles(date, parseTopics(flags.topics), {
      ctx,
      store: new S3BlobStore(settings.region),
      bucket: settings.sourceBucket,
      maxArticles: settings.gnewsMaxArticles,
      resolveApiKey: () =>
        getSecretValue(settings.gnewsSecretId, settings.gnewsSecretField, secretsManagerLoader(settings.region))
    });
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  if (cmd === 'extract' || cmd === 'summarize') {
    await enrich(settings, cmd, rest);
    return;
  }

  if (cmd === 'status') {
    const ctx = initDB(settings.dbPath);
    const health = healthStatus(ctx);
    const lastFailures = health.lastJob ? jobFailures(ctx, health.lastJob.id) : [];
    console.log(JSON.stringify({ health, lastFailures }, null, 2));
    return;
  }

  console.log(USAGE);
}

main().catch((err) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
