/**
 * Stopword Sets
 *
 * Stopwords delimit candidate phrases and never appear inside one.
 * The default English list is read once from data/english-stopwords.json.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { StopwordLoadError } from '../../types/errors';

const StopwordListSchema = z.array(z.string());

export class StopwordSet {
  private readonly words: ReadonlySet<string>;

  constructor(words: Iterable<string>) {
    const normalized = new Set<string>();
    for (const word of words) {
      const w = normalizeWord(word);
      if (w.length > 0) normalized.add(w);
    }
    this.words = normalized;
  }

  has(word: string): boolean {
    return this.words.has(normalizeWord(word));
  }

  get size(): number {
    return this.words.size;
  }

  toArray(): string[] {
    return Array.from(this.words).sort();
  }
}

function normalizeWord(word: string): string {
  return word.trim().replace(/’/g, "'").toLowerCase();
}

/**
 * Parse a stopword file body: a JSON array of strings, or one word per line
 * with `#` comments.
 */
export function parseStopwordList(raw: string, source = 'inline'): string[] {
  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (err) {
      throw new StopwordLoadError(`Stopword list ${source} is not valid JSON`, {
        source,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    const parsed = StopwordListSchema.safeParse(json);
    if (!parsed.success) {
      throw new StopwordLoadError(`Stopword list ${source} must be an array of strings`, {
        source,
        issues: parsed.error.issues.map((i) => i.message),
      });
    }
    return parsed.data;
  }

  return trimmed
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, '').trim())
    .filter((line) => line.length > 0);
}

export function loadStopwords(filePath: string | URL): StopwordSet {
  const source = String(filePath);
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new StopwordLoadError(`Unable to read stopword list ${source}`, {
      source,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return new StopwordSet(parseStopwordList(raw, source));
}

const DEFAULT_STOPWORDS_URL = new URL('./data/english-stopwords.json', import.meta.url);

let defaultStopwords: StopwordSet | undefined;

/**
 * English stopword set, loaded on first use and shared afterwards
 */
export function getDefaultStopwords(): StopwordSet {
  if (!defaultStopwords) {
    defaultStopwords = loadStopwords(DEFAULT_STOPWORDS_URL);
  }
  return defaultStopwords;
}
