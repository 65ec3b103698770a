/**
 * Candidate Scorer
 *
 * RAKE scoring (Rose et al., 2010): a phrase scores the sum of deg(w)/freq(w)
 * over its words. Pruning keeps the best third of the graph's distinct words
 * (Mihalcea and Tarau, 2004).
 */

import type { CooccurrenceGraph } from './cooccurrence';
import type { CandidatePhrase, ScoredCandidate } from './types';

export interface ScoreOptions {
  maxKeywordSize: number;
}

/**
 * Score every unique candidate no longer than `maxKeywordSize` words.
 * Duplicates keep their first occurrence. Sorted by score, then position.
 */
export function scoreCandidates(
  graph: CooccurrenceGraph,
  phrases: Iterable<CandidatePhrase>,
  options: ScoreOptions
): ScoredCandidate[] {
  const unique = new Map<string, CandidatePhrase>();

  for (const phrase of phrases) {
    if (phrase.words.length > options.maxKeywordSize) continue;
    if (!unique.has(phrase.key)) unique.set(phrase.key, phrase);
  }

  const scored = Array.from(unique.values()).map((phrase) => ({
    phrase,
    score: phrase.words.reduce((sum, word) => sum + graph.wordScore(word), 0),
  }));

  return sortByScore(scored);
}

export function sortByScore<T extends ScoredCandidate>(candidates: T[]): T[] {
  return [...candidates].sort(
    (a, b) => b.score - a.score || a.phrase.position - b.phrase.position
  );
}

/**
 * Keep the floor(distinctWords / 3) best candidates. With fewer than three
 * distinct words every candidate is kept.
 */
export function pruneCandidates(scored: ScoredCandidate[], distinctWords: number): ScoredCandidate[] {
  const n = Math.floor(distinctWords / 3);
  if (n === 0) {
    return [...scored];
  }
  return sortByScore(scored).slice(0, n);
}
