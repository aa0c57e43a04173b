import { z } from 'zod';
import { assertDatePrefix } from '../config.js';
import { errorMessage, NewsSearchError } from '../errors.js';

export const GNEWS_SEARCH_URL = 'https://gnews.io/api/v4/search';

export const TOPIC_QUERIES: Record<string, string> = {
  economy_general: '(Tax) OR (Tariff)',
  economy_long_term: '((American OR US) AND Economy) OR (National output) OR (National income)',
  labor_market: '(Labor market) OR (jobless) OR (unemployment)',
  inflation: '(Inflation)',
  consumer_behavior: '(Retail sales) OR (consumer spending) OR (disposable income) OR (household spending)',
  government_and_policy: '(Federal Reserve) OR (Fed policy) OR (Interest rate) OR (rate cuts) OR (Treasury)',
  corporate: '(merger) OR (acquisition) OR (corporate earning)'
};

export const DEFAULT_TOPICS = Object.keys(TOPIC_QUERIES);

export interface SearchArticle {
  title: string;
  description: string | null;
  publishedAt: string;
  content: string | null;
}

const searchResponseSchema = z.object({
  articles: z
    .array(
      z.object({
        title: z.string(),
        description: z.string().nullish(),
        publishedAt: z.string(),
        content: z.string().nullish()
      })
    )
    .default([])
});

/** `2025-09-01` → `2025-09-01T00:00:00.000Z` .. `2025-09-02T00:00:00.000Z` */
export function dayRange(date: string): { from: string; to: string } {
  const start = new Date(`${assertDatePrefix(date)}T00:00:00.000Z`);
  if (Number.isNaN(start.getTime())) {
    throw new NewsSearchError(`Invalid date: ${date}`);
  }
  const end = new Date(start.getTime() + 24 * 60 * 60 * 1000);
  return { from: start.toISOString(), to: end.toISOString() };
}

export function buildSearchUrl(apiKey: string, date: string, topic: string, maxArticles = 10): URL {
  const query = TOPIC_QUERIES[topic];
  if (!query) {
    throw new NewsSearchError(`Unknown topic "${topic}". Known topics: ${DEFAULT_TOPICS.join(', ')}`);
  }
  const { from, to } = dayRange(date);

  const url = new URL(GNEWS_SEARCH_URL);
  const params: Record<string, string> = {
    q: query,
    lang: 'en',
    country: 'us',
    // Matching on content hurts relevance, so only title and description are searched.
    in: 'title,description',
    nullable: 'image',
    max: String(maxArticles),
    from,
    to,
    sortby: 'relevance',
    expand: 'content',
    apikey: apiKey
  };
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
  return url;
}

export async function searchTopic(
  apiKey: string,
  date: string,
  topic: string,
  options: { maxArticles?: number; fetchImpl?: typeof fetch } = {}
): Promise<SearchArticle[]> {
  const url = buildSearchUrl(apiKey, date, topic, options.maxArticles);
  const fetchImpl = options.fetchImpl ?? fetch;

  let res: Response;
  try {
    res = await fetchImpl(url);
  } catch (error) {
    throw new NewsSearchError(`Search for "${topic}" failed: ${errorMessage(error)}`, null, error);
  }

  if (!res.ok) {
    throw new NewsSearchError(`Search for "${topic}" returned HTTP ${res.status}`, res.status);
  }

  let payload: unknown;
  try {
    payload = await res.json();
  } catch (error) {
    throw new NewsSearchError(`Search for "${topic}" returned invalid JSON`, res.status, error);
  }

  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new NewsSearchError(`Search for "${topic}" returned an unexpected payload`, res.status);
  }

  return parsed.data.articles.map((a) => ({
    title: a.title,
    description: a.description ?? null,
    publishedAt: a.publishedAt,
    content: a.content ?? null
  }));
}
