/**
 * Keyword Extractor
 *
 * Hybrid keyword extraction: RAKE scoring inside the target document, then
 * TF-IDF re-ranking against a corpus of related documents.
 */

import { performance } from 'perf_hooks';
import { withSource } from '../../logger';
import { metrics } from '../../metrics';
import { InvalidConfigurationError } from '../../types/errors';
import { CorpusComparator } from './comparator';
import { CooccurrenceGraph } from './cooccurrence';
import { pruneCandidates, scoreCandidates } from './scorer';
import { RegexpSegmenter, type Segmenter } from './segmenter';
import { getDefaultStopwords, type StopwordSet } from './stopwords';
import type { RankedKeyword, WeightedCandidate, Windowing } from './types';

const log = withSource('keywords');

export interface KeywordExtractorOptions {
  /** Default: the bundled English list */
  stopwords?: StopwordSet;
  /** Default: a RegexpSegmenter over `stopwords` */
  segmenter?: Segmenter;
  /** Default: 'chunk' */
  windowing?: Windowing;
  /** Count the target as a corpus document (default: false) */
  includeTarget?: boolean;
}

/**
 * Fail fast on a bad size or limit, before any text is touched
 */
export function validateExtractionConfig(maxKeywordSize: number, limit: number): void {
  if (!Number.isInteger(maxKeywordSize) || maxKeywordSize < 1) {
    throw new InvalidConfigurationError(
      `maxKeywordSize must be a positive integer, got ${maxKeywordSize}`,
      { maxKeywordSize }
    );
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidConfigurationError(
      `limit must be a positive integer, got ${limit}`,
      { limit }
    );
  }
}

export function compareWeighted(a: WeightedCandidate, b: WeightedCandidate): number {
  return (
    b.weight - a.weight ||
    b.score - a.score ||
    a.phrase.position - b.phrase.position
  );
}

export class KeywordExtractor {
  private readonly segmenter: Segmenter;
  private readonly comparator: CorpusComparator;
  private readonly windowing: Windowing;

  constructor(options: KeywordExtractorOptions = {}) {
    const stopwords = options.stopwords ?? getDefaultStopwords();
    this.segmenter = options.segmenter ?? new RegexpSegmenter(stopwords);
    this.windowing = options.windowing ?? 'chunk';
    this.comparator = new CorpusComparator(this.segmenter, {
      includeTarget: options.includeTarget ?? false,
    });
  }

  /**
   * Extract up to `limit` keywords of at most `maxKeywordSize` words from
   * `target`, ranked by their weight against `corpus`.
   */
  extract(
    target: string,
    corpus: readonly string[],
    maxKeywordSize: number,
    limit: number
  ): RankedKeyword[] {
    validateExtractionConfig(maxKeywordSize, limit);

    const start = performance.now();

    const sentences = this.segmenter.splitSentences(target);
    // Read once: both the graph and the scorer walk the phrases
    const phrases = Array.from(
      this.segmenter.chunkPhrases(sentences, {
        maxKeywordSize,
        windowing: this.windowing,
      })
    );

    const graph = CooccurrenceGraph.fromPhrases(phrases);
    const scored = scoreCandidates(graph, phrases, { maxKeywordSize });
    const pruned = pruneCandidates(scored, graph.size);

    const ranked = this.comparator
      .weigh(pruned, target, corpus)
      .sort(compareWeighted)
      .slice(0, limit)
      .map((c) => ({
        keyword: c.phrase.surface,
        score: c.weight,
        rakeScore: c.score,
        termFrequency: c.termFrequency,
        documentFrequency: c.documentFrequency,
      }));

    const durationMs = performance.now() - start;
    metrics.observeExtraction(this.windowing, durationMs, scored.length);
    log.debug(
      {
        sentences: sentences.length,
        distinctWords: graph.size,
        candidates: scored.length,
        pruned: pruned.length,
        corpusSize: corpus.length,
        returned: ranked.length,
        durationMs: Math.round(durationMs),
      },
      'extracted keywords'
    );

    return ranked;
  }
}

/**
 * One-shot extraction with a throwaway extractor
 */
export function extractKeywords(
  target: string,
  corpus: readonly string[],
  maxKeywordSize: number,
  limit: number,
  options: KeywordExtractorOptions = {}
): RankedKeyword[] {
  return new KeywordExtractor(options).extract(target, corpus, maxKeywordSize, limit);
}
