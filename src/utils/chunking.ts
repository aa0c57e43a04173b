import type { Tokenizer } from './tokenizer.js';

export interface TokenWindow {
  start: number;
  end: number;
}

/**
 * Token ranges `[start, end)` of each window over `totalTokens` tokens.
 * Consecutive windows share `overlap` tokens; the last window ends at the
 * final token, so there are `ceil((T - overlap) / (windowSize - overlap))`
 * windows when `T > windowSize`.
 */
export function planWindows(totalTokens: number, windowSize: number, overlap: number): TokenWindow[] {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
    throw new RangeError(`overlap must satisfy 0 <= overlap < windowSize, got ${overlap}`);
  }
  if (totalTokens <= windowSize) return [{ start: 0, end: totalTokens }];

  const windows: TokenWindow[] = [];
  const stride = windowSize - overlap;
  let start = 0;
  while (start < totalTokens) {
    const end = Math.min(start + windowSize, totalTokens);
    windows.push({ start, end });
    if (end >= totalTokens) break;
    start += stride;
  }
  return windows;
}

/**
 * Split `text` into overlapping windows of at most `windowSize` tokens.
 * Text that already fits comes back as a single, untouched chunk; longer
 * text is decoded window by window, which may normalize whitespace.
 */
export function chunkByTokens(text: string, tokenizer: Tokenizer, windowSize: number, overlap: number): string[] {
  const tokens = tokenizer.encode(text);
  const windows = planWindows(tokens.length, windowSize, overlap);
  if (windows.length === 1) return [text];
  return windows.map(({ start, end }) => tokenizer.decode(tokens.slice(start, end)));
}
