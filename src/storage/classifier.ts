import { OUTPUT_STAGES, type Stage } from '../types.js';

export const SOURCE_SUFFIX = '.json';

/**
 * Whether a listed key is a raw article to enrich. Keys under any output
 * stage directory are derived artifacts, which matters when the destination
 * bucket overlaps the source prefix.
 */
export function isEligible(key: string, stage: Stage): boolean {
  if (!key.endsWith(SOURCE_SUFFIX)) return false;

  const directories = key.split('/').slice(0, -1);
  const excluded = new Set<string>([...OUTPUT_STAGES, stage]);
  return !directories.some((segment) => excluded.has(segment));
}
