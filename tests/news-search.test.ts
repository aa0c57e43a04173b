import { describe, it, expect, vi } from 'vitest';
import { NewsSearchError } from '../src/errors.js';
import { buildSearchUrl, dayRange, searchTopic } from '../src/ingest/news-search.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('dayRange', () => {
  it('spans one UTC day', () => {
    expect(dayRange('2025-09-01')).toEqual({ from: '2025-09-01T00:00:00.000Z', to: '2025-09-02T00:00:00.000Z' });
    expect(dayRange('2024-12-31').to).toBe('2025-01-01T00:00:00.000Z');
  });
});

describe('buildSearchUrl', () => {
  it('queries the topic keywords for one day', () => {
    const url = buildSearchUrl('test-key', '2025-09-01', 'inflation');
    expect(url.origin + url.pathname).toBe('https://gnews.io/api/v4/search');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      q: '(Inflation)',
      lang: 'en',
      country: 'us',
      in: 'title,description',
      nullable: 'image',
      max: '10',
      from: '2025-09-01T00:00:00.000Z',
      to: '2025-09-02T00:00:00.000Z',
      sortby: 'relevance',
      expand: 'content',
      apikey: 'test-key'
    });
  });

  it('rejects unknown topics', () => {
    expect(() => buildSearchUrl('k', '2025-09-01', 'sports')).toThrow(NewsSearchError);
  });
});

describe('searchTopic', () => {
  it('returns the articles of a successful response', async () => {
    const fetchImpl = vi.fn(async () =>
      jsonResponse({
        totalArticles: 1,
        articles: [
          {
            title: 'Fed holds rates',
            description: null,
            content: 'The Federal Reserve held rates steady.',
            publishedAt: '2025-09-01T14:00:00Z',
            url: 'https://example.com/fed'
          }
        ]
      })
    );

    const articles = await searchTopic('k', '2025-09-01', 'inflation', { fetchImpl, maxArticles: 3 });

    expect(articles).toEqual([
      {
        title: 'Fed holds rates',
        description: null,
        publishedAt: '2025-09-01T14:00:00Z',
        content: 'The Federal Reserve held rates steady.'
      }
    ]);
  });

  it('surfaces non-success statuses as NewsSearchError', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ errors: ['quota'] }, 403));
    const failure = searchTopic('k', '2025-09-01', 'inflation', { fetchImpl });
    await expect(failure).rejects.toBeInstanceOf(NewsSearchError);
    await expect(searchTopic('k', '2025-09-01', 'inflation', { fetchImpl })).rejects.toMatchObject({ status: 403 });
  });

  it('surfaces network failures as NewsSearchError', async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    await expect(searchTopic('k', '2025-09-01', 'corporate', { fetchImpl })).rejects.toThrow(
      'Search for "corporate" failed: fetch failed'
    );
  });
});
