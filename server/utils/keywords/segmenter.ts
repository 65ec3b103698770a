/**
 * Segmenter
 *
 * Splits raw text into sentences, sentences into word tokens, and token runs
 * into candidate phrases using the stopword set as delimiters.
 */

import type { StopwordSet } from './stopwords';
import type { CandidatePhrase, Token, Windowing } from './types';

export interface ChunkOptions {
  /** Largest number of words a returned keyword may have */
  maxKeywordSize: number;
  /** Default: 'chunk' */
  windowing?: Windowing;
}

/**
 * Capability contract every segmenter provides. `tokenizeWords` is the word
 * splitting step `chunkPhrases` relies on; the corpus comparator reuses it so
 * both sides of a containment check see the same words.
 */
export interface Segmenter {
  splitSentences(text: string): string[];
  tokenizeWords(sentence: string): Token[];
  /** May be a one-shot iterable; callers read it once */
  chunkPhrases(sentences: readonly string[], options: ChunkOptions): Iterable<CandidatePhrase>;
}

// Sentence ends: terminal punctuation before whitespace or a capital, or a line break
const SENTENCE_BOUNDARY = /(?<=[.!?])(?:\s+|(?=\p{Lu}))|\r?\n+/u;

// Words with inner apostrophes, hyphens and degree signs, or currency amounts
const WORD_PATTERN = /[$€£]\d+(?:[.,]\d+)*|[\p{L}\p{N}_'°-]+/gu;

const HAS_WORD_CHAR = /[\p{L}\p{N}]/u;

export class RegexpSegmenter implements Segmenter {
  constructor(private readonly stopwords: StopwordSet) {}

  splitSentences(text: string): string[] {
    if (!text || text.trim().length === 0) {
      return [];
    }

    return text
      .split(SENTENCE_BOUNDARY)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  tokenizeWords(sentence: string): Token[] {
    const tokens: Token[] = [];
    const normalizedQuotes = sentence.replace(/[’‘]/g, "'");

    for (const match of Array.from(normalizedQuotes.matchAll(WORD_PATTERN))) {
      // Strip quote marks and dashes hugging the word: 'quoted' -> quoted
      const surface = match[0].replace(/^['-]+|['-]+$/g, '');
      if (!HAS_WORD_CHAR.test(surface)) continue;
      tokens.push({ normalized: surface.toLowerCase(), surface });
    }

    return tokens;
  }

  chunkPhrases(sentences: readonly string[], options: ChunkOptions): Iterable<CandidatePhrase> {
    const { maxKeywordSize, windowing = 'chunk' } = options;

    // Each iteration replays the input, so the sequence can be walked again
    return {
      [Symbol.iterator]: () => this.generatePhrases(sentences, maxKeywordSize, windowing),
    };
  }

  private *generatePhrases(
    sentences: readonly string[],
    maxKeywordSize: number,
    windowing: Windowing
  ): Generator<CandidatePhrase> {
    let position = 0;

    for (const sentence of sentences) {
      for (const chunk of this.splitAtStopwords(this.tokenizeWords(sentence))) {
        for (const window of applyWindowing(chunk, maxKeywordSize, windowing)) {
          yield toPhrase(window, position++);
        }
      }
    }
  }

  private *splitAtStopwords(tokens: Token[]): Generator<Token[]> {
    let current: Token[] = [];

    for (const token of tokens) {
      if (this.stopwords.has(token.normalized)) {
        if (current.length > 0) yield current;
        current = [];
      } else {
        current.push(token);
      }
    }

    if (current.length > 0) yield current;
  }
}

/**
 * Turn one stopword-free chunk into the token runs emitted as candidates
 */
export function applyWindowing(chunk: Token[], maxKeywordSize: number, windowing: Windowing): Token[][] {
  if (windowing === 'chunk') {
    return [chunk];
  }

  const largest = Math.min(maxKeywordSize, chunk.length);
  const smallest = windowing === 'flexible' ? 1 : largest;
  const windows: Token[][] = [];

  for (let n = smallest; n <= largest; n++) {
    for (let i = 0; i + n <= chunk.length; i++) {
      windows.push(chunk.slice(i, i + n));
    }
  }

  return windows;
}

function toPhrase(tokens: Token[], position: number): CandidatePhrase {
  const words = Object.freeze(tokens.map((t) => t.normalized));
  return Object.freeze({
    words,
    key: words.join(' '),
    surface: tokens.map((t) => t.surface).join(' '),
    position,
  });
}
