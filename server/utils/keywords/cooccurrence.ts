/**
 * Co-occurrence Graph
 *
 * Words are vertices; two words co-occur when they belong to the same
 * candidate phrase. For every phrase of length L each of its word
 * occurrences adds 1 to the word's frequency and L to its degree, so a
 * word's degree is its frequency plus the sum of its co-occurrence counts.
 */

import type { CandidatePhrase, WordStats } from './types';

export class CooccurrenceGraph {
  private constructor(
    private readonly stats: ReadonlyMap<string, Readonly<WordStats>>,
    private readonly matrix: ReadonlyMap<string, ReadonlyMap<string, number>>
  ) {}

  /**
   * Build the graph from the full candidate sequence of one document
   */
  static fromPhrases(phrases: Iterable<CandidatePhrase>): CooccurrenceGraph {
    const stats = new Map<string, WordStats>();
    const matrix = new Map<string, Map<string, number>>();

    for (const phrase of phrases) {
      const length = phrase.words.length;

      phrase.words.forEach((word, i) => {
        const entry = stats.get(word) ?? { frequency: 0, degree: 0 };
        entry.frequency += 1;
        entry.degree += length;
        stats.set(word, entry);

        const row = matrix.get(word) ?? new Map<string, number>();
        matrix.set(word, row);
        phrase.words.forEach((other, j) => {
          if (i !== j) row.set(other, (row.get(other) ?? 0) + 1);
        });
      });
    }

    return new CooccurrenceGraph(stats, matrix);
  }

  /** Number of distinct words in the graph */
  get size(): number {
    return this.stats.size;
  }

  has(word: string): boolean {
    return this.stats.has(word);
  }

  frequency(word: string): number {
    return this.stats.get(word)?.frequency ?? 0;
  }

  degree(word: string): number {
    return this.stats.get(word)?.degree ?? 0;
  }

  /**
   * deg(w) / freq(w); 0 for words outside the graph
   */
  wordScore(word: string): number {
    const entry = this.stats.get(word);
    if (!entry || entry.frequency === 0) return 0;
    return entry.degree / entry.frequency;
  }

  /**
   * Companion words of `word` with the number of phrase occurrences they share.
   * A repeated word inside one phrase counts as its own companion.
   */
  cooccurrences(word: string): ReadonlyMap<string, number> {
    return this.matrix.get(word) ?? new Map();
  }

  words(): string[] {
    return Array.from(this.stats.keys());
  }

  toJSON(): Record<string, WordStats> {
    const out: Record<string, WordStats> = {};
    for (const [word, entry] of Array.from(this.stats.entries())) {
      out[word] = { frequency: entry.frequency, degree: entry.degree };
    }
    return out;
  }
}
