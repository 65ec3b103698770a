/**
 * Corpus Comparator
 *
 * Re-weights candidates with a TF-IDF factor computed against a corpus:
 *   weight = tf(phrase, target) * ln(N / max(1, df(phrase)))
 *
 * A phrase occurs in a document where its words appear contiguously inside
 * one sentence of that document, whether or not it was a candidate there.
 * With an empty corpus the IDF factor is 1.
 */

import type { Segmenter } from './segmenter';
import type { ScoredCandidate, WeightedCandidate } from './types';

export interface CorpusPolicy {
  /** Count the target itself as a corpus document */
  includeTarget: boolean;
}

/** Sentences of normalized words, stopwords included */
export type TokenizedDocument = string[][];

export function tokenizeDocument(text: string, segmenter: Segmenter): TokenizedDocument {
  return segmenter
    .splitSentences(text)
    .map((sentence) => segmenter.tokenizeWords(sentence).map((t) => t.normalized));
}

/**
 * Number of places where `words` appears contiguously in the document
 */
export function countOccurrences(doc: TokenizedDocument, words: readonly string[]): number {
  if (words.length === 0) return 0;

  let count = 0;
  for (const sentence of doc) {
    for (let i = 0; i + words.length <= sentence.length; i++) {
      let matches = true;
      for (let j = 0; j < words.length; j++) {
        if (sentence[i + j] !== words[j]) {
          matches = false;
          break;
        }
      }
      if (matches) count++;
    }
  }
  return count;
}

export function containsPhrase(doc: TokenizedDocument, words: readonly string[]): boolean {
  return countOccurrences(doc, words) > 0;
}

export class CorpusComparator {
  constructor(
    private readonly segmenter: Segmenter,
    private readonly policy: CorpusPolicy
  ) {}

  weigh(candidates: ScoredCandidate[], target: string, corpus: readonly string[]): WeightedCandidate[] {
    const targetDoc = tokenizeDocument(target, this.segmenter);
    const corpusDocs = corpus.map((text) => tokenizeDocument(text, this.segmenter));
    if (this.policy.includeTarget) {
      corpusDocs.push(targetDoc);
    }

    const totalDocuments = corpusDocs.length;
    // Without caller documents there is nothing to discriminate against
    const neutral = corpus.length === 0;

    return candidates.map((candidate) => {
      const { words } = candidate.phrase;
      const termFrequency = Math.max(1, countOccurrences(targetDoc, words));
      // Summed per document, so document order does not matter
      const documentFrequency = Math.max(
        1,
        corpusDocs.reduce((df, doc) => df + (containsPhrase(doc, words) ? 1 : 0), 0)
      );
      const idf = neutral ? 1 : Math.log(totalDocuments / documentFrequency);

      return {
        ...candidate,
        termFrequency,
        documentFrequency,
        weight: termFrequency * idf,
      };
    });
  }
}
