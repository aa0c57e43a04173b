import { decode, encode } from 'gpt-tokenizer';
import type { TokenizerKind } from '../config.js';

export interface Tokenizer {
  readonly name: string;
  encode(text: string): number[];
  decode(tokens: readonly number[]): string;
}

// Special-token literals in article text (`<|endoftext|>`) are encoded as plain text.
const PLAIN_TEXT = { disallowedSpecial: new Set<string>() };

export const bpeTokenizer: Tokenizer = {
  name: 'bpe',
  encode: (text) => encode(text, PLAIN_TEXT),
  decode: (tokens) => decode(tokens)
};

/**
 * Word-level tokenizer. Token ids are indexes into a vocabulary built up as
 * text is encoded, so decoding only knows words this instance has seen.
 * The vocabulary lives as long as the instance; create one per run.
 */
export function createWhitespaceTokenizer(): Tokenizer {
  const ids = new Map<string, number>();
  const words: string[] = [];

  return {
    name: 'whitespace',
    encode(text) {
      return text
        .trim()
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => {
          let id = ids.get(word);
          if (id === undefined) {
            id = words.length;
            ids.set(word, id);
            words.push(word);
          }
          return id;
        });
    },
    decode(tokens) {
      return tokens.map((id) => words[id] ?? '').join(' ');
    }
  };
}

export function createTokenizer(kind: TokenizerKind): Tokenizer {
  return kind === 'whitespace' ? createWhitespaceTokenizer() : bpeTokenizer;
}
