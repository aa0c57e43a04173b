import { MalformedKeyError } from '../errors.js';
import type { DerivedKeySet, Stage } from '../types.js';

export const CONTENT_SUFFIX = '.txt';
export const METADATA_SUFFIX = '_metadata.json';

export interface SourceKeyParts {
  dateSegment: string;
  remainder: string;
}

export function splitSourceKey(sourceKey: string): SourceKeyParts {
  const slash = sourceKey.indexOf('/');
  if (slash <= 0 || slash === sourceKey.length - 1) {
    throw new MalformedKeyError(sourceKey);
  }
  return { dateSegment: sourceKey.slice(0, slash), remainder: sourceKey.slice(slash + 1) };
}

function stripExtension(path: string): string {
  const lastSlash = path.lastIndexOf('/');
  const lastDot = path.lastIndexOf('.');
  return lastDot > lastSlash + 1 ? path.slice(0, lastDot) : path;
}

/**
 * `2025-09-01/inflation/fed_hike.json` + `summarized` →
 * `2025-09-01/summarized/inflation/fed_hike.txt` and
 * `2025-09-01/summarized/inflation/fed_hike_metadata.json`.
 *
 * The `_{chunkIndex}` suffix is only added when the record produced more than
 * one chunk.
 */
export function deriveKeys(sourceKey: string, stage: Stage, chunkIndex?: number, chunkCount = 1): DerivedKeySet {
  const { dateSegment, remainder } = splitSourceKey(sourceKey);
  let base = `${dateSegment}/${stage}/${stripExtension(remainder)}`;
  if (chunkIndex !== undefined && chunkCount > 1) {
    base = `${base}_${chunkIndex}`;
  }
  return {
    contentKey: `${base}${CONTENT_SUFFIX}`,
    metadataKey: `${base}${METADATA_SUFFIX}`
  };
}

/** Raw article location written by the staging step. */
export function stagingKey(date: string, topic: string, title: string): string {
  const fileName = title.trim().replace(/[\s/]/g, '_');
  return `${date}/${topic}/${fileName}.json`;
}
