import { describe, it, expect } from 'vitest';
import { MalformedKeyError } from '../src/errors.js';
import { isEligible } from '../src/storage/classifier.js';
import { deriveKeys, splitSourceKey, stagingKey } from '../src/storage/keys.js';

const SOURCE = '2025-09-01/inflation/fed_hike.json';

describe('deriveKeys', () => {
  it('maps a single-chunk record without an index suffix', () => {
    expect(deriveKeys(SOURCE, 'summarized', 1, 1)).toEqual({
      contentKey: '2025-09-01/summarized/inflation/fed_hike.txt',
      metadataKey: '2025-09-01/summarized/inflation/fed_hike_metadata.json'
    });
    expect(deriveKeys(SOURCE, 'summarized')).toEqual(deriveKeys(SOURCE, 'summarized', 1, 1));
  });

  it('suffixes every chunk when there are several', () => {
    const keys = [1, 2, 3].map((i) => deriveKeys(SOURCE, 'summarized', i, 3));
    expect(keys.map((k) => k.contentKey)).toEqual([
      '2025-09-01/summarized/inflation/fed_hike_1.txt',
      '2025-09-01/summarized/inflation/fed_hike_2.txt',
      '2025-09-01/summarized/inflation/fed_hike_3.txt'
    ]);
    expect(keys.map((k) => k.metadataKey)).toEqual([
      '2025-09-01/summarized/inflation/fed_hike_1_metadata.json',
      '2025-09-01/summarized/inflation/fed_hike_2_metadata.json',
      '2025-09-01/summarized/inflation/fed_hike_3_metadata.json'
    ]);
  });

  it('places extracted text under the original stage', () => {
    expect(deriveKeys('2025-10-11/economy_general/filename.json', 'original')).toEqual({
      contentKey: '2025-10-11/original/economy_general/filename.txt',
      metadataKey: '2025-10-11/original/economy_general/filename_metadata.json'
    });
  });

  it('only replaces the final suffix', () => {
    expect(deriveKeys('2025-09-01/corporate/a.json.backup.json', 'original').contentKey).toBe(
      '2025-09-01/original/corporate/a.json.backup.txt'
    );
  });

  it('is deterministic', () => {
    expect(deriveKeys(SOURCE, 'summarized', 2, 3)).toEqual(deriveKeys(SOURCE, 'summarized', 2, 3));
  });

  it('rejects keys without a date segment', () => {
    expect(() => deriveKeys('fed_hike.json', 'original')).toThrow(MalformedKeyError);
    expect(() => splitSourceKey('/fed_hike.json')).toThrow(MalformedKeyError);
    expect(() => splitSourceKey('2025-09-01/')).toThrow(MalformedKeyError);
  });
});

describe('stagingKey', () => {
  it('replaces spaces and slashes in the title', () => {
    expect(stagingKey('2025-09-01', 'inflation', 'Fed hikes rates 24/7 ')).toBe(
      '2025-09-01/inflation/Fed_hikes_rates_24_7.json'
    );
  });
});

describe('isEligible', () => {
  it('accepts raw article keys', () => {
    expect(isEligible(SOURCE, 'summarized')).toBe(true);
    expect(isEligible(SOURCE, 'original')).toBe(true);
  });

  it('rejects non-json keys', () => {
    expect(isEligible('2025-09-01/inflation/fed_hike.txt', 'summarized')).toBe(false);
    expect(isEligible('2025-09-01/inflation/', 'summarized')).toBe(false);
  });

  it('rejects keys under an output stage even when they end in .json', () => {
    expect(isEligible('2025-09-01/summarized/inflation/fed_hike_metadata.json', 'summarized')).toBe(false);
    expect(isEligible('2025-09-01/original/inflation/fed_hike_metadata.json', 'summarized')).toBe(false);
    expect(isEligible('2025-09-01/original/inflation/fed_hike_metadata.json', 'original')).toBe(false);
  });

  it('does not confuse a file name with a stage directory', () => {
    expect(isEligible('2025-09-01/corporate/summarized.json', 'summarized')).toBe(true);
  });
});
