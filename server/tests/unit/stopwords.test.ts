/**
 * Stopword Set Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  StopwordSet,
  parseStopwordList,
  loadStopwords,
  getDefaultStopwords,
} from '../../utils/keywords/stopwords';
import { StopwordLoadError, ERROR_CODES } from '../../types/errors';

describe('StopwordSet', () => {
  it('should normalize case, whitespace and curly apostrophes', () => {
    const set = new StopwordSet([' The ', 'AND', '', 'don’t']);

    expect(set.size).toBe(3);
    expect(set.has('the')).toBe(true);
    expect(set.has('The')).toBe(true);
    expect(set.has("don't")).toBe(true);
    expect(set.has('keyword')).toBe(false);
  });

  it('should list words in sorted order', () => {
    const set = new StopwordSet(['the', "don't", 'and', 'the']);
    expect(set.toArray()).toEqual(['and', "don't", 'the']);
  });
});

describe('parseStopwordList', () => {
  it('should parse a JSON array', () => {
    expect(parseStopwordList('["a", "b"]')).toEqual(['a', 'b']);
  });

  it('should parse a newline-separated list with comments', () => {
    const raw = '# header\nfoo\n  bar  # trailing\n\nbaz';
    expect(parseStopwordList(raw)).toEqual(['foo', 'bar', 'baz']);
  });

  it('should reject malformed JSON', () => {
    expect(() => parseStopwordList('[oops', 'custom.json')).toThrow(StopwordLoadError);
  });

  it('should reject arrays that are not all strings', () => {
    expect(() => parseStopwordList('[1, 2]', 'numbers.json')).toThrow(
      'Stopword list numbers.json must be an array of strings'
    );
  });
});

describe('loadStopwords', () => {
  it('should raise StopwordLoadError for an unreadable file', () => {
    try {
      loadStopwords('/nonexistent/stopwords.txt');
      expect.unreachable('loadStopwords should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(StopwordLoadError);
      if (err instanceof StopwordLoadError) {
        expect(err.code).toBe(ERROR_CODES.STOPWORD_LOAD_ERROR);
        expect(err.context?.source).toBe('/nonexistent/stopwords.txt');
      }
    }
  });
});

describe('getDefaultStopwords', () => {
  it('should load the bundled English list', () => {
    const set = getDefaultStopwords();

    expect(set.size).toBe(179);
    expect(set.has('the')).toBe(true);
    expect(set.has("wouldn't")).toBe(true);
    expect(set.has('keyword')).toBe(false);
  });

  it('should load the list only once', () => {
    expect(getDefaultStopwords()).toBe(getDefaultStopwords());
  });
});
