import { describe, it, expect } from 'vitest';
import { buildPipelineConfig, loadEnvSettings } from '../src/config.js';
import { DEFAULT_DB_PATH } from '../src/db/client.js';
import { ConfigError } from '../src/errors.js';
import { MODE_FOR_STAGE, STAGE_FOR_MODE } from '../src/types.js';

describe('loadEnvSettings', () => {
  it('applies defaults for an empty environment', () => {
    const settings = loadEnvSettings({});
    expect(settings).toMatchObject({
      region: 'us-east-1',
      sourceBucket: 'news-staging-area',
      destBucket: 'news-data-enriched',
      windowSize: 1024,
      overlap: 100,
      tokenizer: 'bpe',
      summarizerEndpoint: null,
      gnewsSecretId: 'Gnews-api-key',
      gnewsSecretField: 'GNEWS_API_KEY',
      gnewsMaxArticles: 10
    });
  });

  it('falls back to the database path initDB uses', () => {
    expect(loadEnvSettings({}).dbPath).toBe(DEFAULT_DB_PATH);
    expect(loadEnvSettings({ ENRICH_DB_PATH: '/tmp/runs.sqlite' }).dbPath).toBe('/tmp/runs.sqlite');
  });

  it('reads overrides and treats blank values as unset', () => {
    const settings = loadEnvSettings({ CHUNK_WINDOW: '512', CHUNK_OVERLAP: '64', TOKENIZER: 'whitespace', DEST_BUCKET: '  ' });
    expect(settings).toMatchObject({ windowSize: 512, overlap: 64, tokenizer: 'whitespace', destBucket: 'news-data-enriched' });
  });

  it('rejects invalid values', () => {
    expect(() => loadEnvSettings({ CHUNK_WINDOW: 'lots' })).toThrow(ConfigError);
    expect(() => loadEnvSettings({ TOKENIZER: 'sentencepiece' })).toThrow(/TOKENIZER/);
  });
});

describe('buildPipelineConfig', () => {
  const settings = loadEnvSettings({ SOURCE_BUCKET: 'raw', DEST_BUCKET: 'out' });

  it('maps the mode to its output stage', () => {
    expect(buildPipelineConfig(settings, 'summarize', '2025-09-01', { windowSize: 256 })).toEqual({
      sourceBucket: 'raw',
      destBucket: 'out',
      datePrefix: '2025-09-01',
      windowSize: 256,
      overlap: 100,
      stageName: 'summarized'
    });
    expect(buildPipelineConfig(settings, 'extract', '2025-09-01').stageName).toBe('original');
  });

  it('validates the date and chunk window', () => {
    expect(() => buildPipelineConfig(settings, 'extract', '09/01/2025')).toThrow(ConfigError);
    expect(() => buildPipelineConfig(settings, 'summarize', '2025-09-01', { windowSize: 100, overlap: 100 })).toThrow(
      ConfigError
    );
  });
});

describe('stage tables', () => {
  it('map modes and stages both ways', () => {
    for (const [mode, stage] of Object.entries(STAGE_FOR_MODE)) {
      expect(MODE_FOR_STAGE[stage]).toBe(mode);
    }
    expect(Object.keys(MODE_FOR_STAGE)).toHaveLength(Object.keys(STAGE_FOR_MODE).length);
  });
});
