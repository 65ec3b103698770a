/**
 * Keywords Module
 *
 * RAKE candidate scoring with corpus TF-IDF re-ranking
 */

export {
  StopwordSet,
  loadStopwords,
  parseStopwordList,
  getDefaultStopwords,
} from './stopwords';

export {
  RegexpSegmenter,
  applyWindowing,
  type Segmenter,
  type ChunkOptions,
} from './segmenter';

export { CooccurrenceGraph } from './cooccurrence';

export {
  scoreCandidates,
  pruneCandidates,
  sortByScore,
  type ScoreOptions,
} from './scorer';

export {
  CorpusComparator,
  tokenizeDocument,
  countOccurrences,
  containsPhrase,
  type CorpusPolicy,
  type TokenizedDocument,
} from './comparator';

export {
  KeywordExtractor,
  extractKeywords,
  validateExtractionConfig,
  compareWeighted,
  type KeywordExtractorOptions,
} from './extractor';

export type {
  Token,
  CandidatePhrase,
  WordStats,
  ScoredCandidate,
  WeightedCandidate,
  RankedKeyword,
  Windowing,
} from './types';
