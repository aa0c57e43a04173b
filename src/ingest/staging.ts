import { assertDatePrefix } from '../config.js';
import type { DBContext } from '../db/client.js';
import { errorMessage } from '../errors.js';
import { completeJob, failJob, logIngestEvent, recordJobMetric, startJob } from '../observability.js';
import { type BlobStore, JSON_CONTENT_TYPE } from '../storage/blob-store.js';
import { stagingKey } from '../storage/keys.js';
import type { ArticleRecord, WriteFailure } from '../types.js';
import { type SearchArticle, searchTopic } from './news-search.js';

export interface StagingDeps {
  ctx: DBContext;
  store: BlobStore;
  bucket: string;
  resolveApiKey: () => Promise<string>;
  search?: typeof searchTopic;
  maxArticles?: number;
}

export type TopicOutcome =
  | { topic: string; status: 'ok'; found: number; stored: string[]; failures: WriteFailure[] }
  | { topic: string; status: 'error'; message: string };

export interface StagingSummary {
  jobId: number;
  date: string;
  stored: number;
  failedUploads: number;
  failedTopics: number;
  topics: TopicOutcome[];
}

export function toArticleRecord(article: SearchArticle, topic: string): ArticleRecord {
  return {
    title: article.title,
    description: article.description,
    publishedAt: article.publishedAt,
    topic,
    content: article.content
  };
}

async function stageTopic(deps: StagingDeps, jobId: number, apiKey: string, date: string, topic: string): Promise<TopicOutcome> {
  const { ctx, store, bucket } = deps;
  const search = deps.search ?? searchTopic;

  let articles: SearchArticle[];
  try {
    articles = await search(apiKey, date, topic, { maxArticles: deps.maxArticles });
  } catch (error) {
    const message = errorMessage(error);
    logIngestEvent(ctx, { jobId, level: 'error', eventType: 'topic_failed', event: { topic, message } });
    return { topic, status: 'error', message };
  }

  const stored: string[] = [];
  const failures: WriteFailure[] = [];
  for (const article of articles) {
    if (!article.title.trim()) {
      failures.push({ key: `${date}/${topic}/`, message: 'article has no title' });
      logIngestEvent(ctx, { jobId, level: 'warn', eventType: 'article_untitled', event: { topic, publishedAt: article.publishedAt } });
      continue;
    }

    const key = stagingKey(date, topic, article.title);
    try {
      await store.put(bucket, key, JSON.stringify(toArticleRecord(article, topic), null, 4), JSON_CONTENT_TYPE);
      stored.push(key);
      logIngestEvent(ctx, { jobId, objectKey: key, eventType: 'article_staged', event: { topic } });
    } catch (error) {
      const message = errorMessage(error);
      failures.push({ key, message });
      logIngestEvent(ctx, { jobId, objectKey: key, level: 'warn', eventType: 'write_failed', event: { topic, message } });
    }
  }

  recordJobMetric(ctx, { jobId, metricName: 'articles_found', metricValue: articles.length, labels: { topic } });
  return { topic, status: 'ok', found: articles.length, stored, failures };
}

/**
 * Search each topic for articles published on `date` and store them as
 * `{date}/{topic}/{title}.json`. A failing topic does not stop the others;
 * failing to obtain the API key aborts the run.
 */
export async function stageArticles(date: string, topics: string[], deps: StagingDeps): Promise<StagingSummary> {
  assertDatePrefix(date);
  const { ctx } = deps;
  const jobId = startJob(ctx, 'stage', { date, topics, bucket: deps.bucket });

  try {
    const apiKey = await deps.resolveApiKey();
    const outcomes: TopicOutcome[] = [];
    for (const topic of topics) {
      logIngestEvent(ctx, { jobId, eventType: 'topic_started', event: { topic, date } });
      outcomes.push(await stageTopic(deps, jobId, apiKey, date, topic));
    }

    const summary: StagingSummary = {
      jobId,
      date,
      stored: outcomes.reduce((n, o) => n + (o.status === 'ok' ? o.stored.length : 0), 0),
      failedUploads: outcomes.reduce((n, o) => n + (o.status === 'ok' ? o.failures.length : 0), 0),
      failedTopics: outcomes.filter((o) => o.status === 'error').length,
      topics: outcomes
    };
    completeJob(ctx, jobId, { stored: summary.stored, failedUploads: summary.failedUploads, failedTopics: summary.failedTopics });
    return summary;
  } catch (error) {
    const message = errorMessage(error);
    failJob(ctx, jobId, message);
    logIngestEvent(ctx, { jobId, level: 'error', eventType: 'job_failed', event: { message } });
    throw error;
  }
}
