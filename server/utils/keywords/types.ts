/**
 * Keyword Pipeline Types
 *
 * Shared shapes for the segmentation, scoring and ranking stages.
 */

/** A word as found in the text, with its case-folded form */
export interface Token {
  readonly normalized: string;
  readonly surface: string;
}

/**
 * Contiguous run of content words between stopwords or sentence ends.
 * `key` identifies the phrase; `surface` is what gets shown to users.
 */
export interface CandidatePhrase {
  readonly words: readonly string[];
  readonly key: string;
  readonly surface: string;
  /** Order of emission within the document, starting at 0 */
  readonly position: number;
}

export interface WordStats {
  frequency: number;
  degree: number;
}

export interface ScoredCandidate {
  phrase: CandidatePhrase;
  score: number;
}

export interface WeightedCandidate extends ScoredCandidate {
  termFrequency: number;
  documentFrequency: number;
  weight: number;
}

export interface RankedKeyword {
  keyword: string;
  /** Final corpus weight; the list is ordered by this value */
  score: number;
  rakeScore: number;
  termFrequency: number;
  documentFrequency: number;
}

/**
 * How a stopword-delimited chunk becomes candidates:
 * - chunk: the whole chunk is one candidate
 * - fixed: sliding windows of the largest size allowed
 * - flexible: every n-gram from 1 up to the largest size allowed
 */
export type Windowing = 'chunk' | 'fixed' | 'flexible';
