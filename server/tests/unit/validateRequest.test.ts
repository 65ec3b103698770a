import { describe, it, expect } from 'vitest';
import { KeywordsBodySchema } from '../../middleware/validateRequest';

describe('KeywordsBodySchema', () => {
  it('applies configured defaults', () => {
    const parsed = KeywordsBodySchema.safeParse({ document: 'Solar power is clean.' });

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data).toEqual({
        document: 'Solar power is clean.',
        corpus: [],
        maxKeywordSize: 3,
        limit: 10,
      });
    }
  });

  it('keeps explicit options', () => {
    const parsed = KeywordsBodySchema.safeParse({
      document: 'text',
      corpus: ['a', 'b'],
      maxKeywordSize: 2,
      limit: 5,
      includeTarget: true,
      windowing: 'flexible',
    });

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data.corpus).toEqual(['a', 'b']);
      expect(parsed.data.includeTarget).toBe(true);
      expect(parsed.data.windowing).toBe('flexible');
    }
  });

  it.each([
    ['missing document', { corpus: [] }],
    ['non-string corpus entry', { document: 'x', corpus: [1] }],
    ['zero limit', { document: 'x', limit: 0 }],
    ['fractional limit', { document: 'x', limit: 2.5 }],
    ['oversized limit', { document: 'x', limit: 101 }],
    ['zero maxKeywordSize', { document: 'x', maxKeywordSize: 0 }],
    ['oversized maxKeywordSize', { document: 'x', maxKeywordSize: 11 }],
    ['unknown windowing', { document: 'x', windowing: 'bogus' }],
  ])('rejects %s', (_label, body) => {
    expect(KeywordsBodySchema.safeParse(body).success).toBe(false);
  });
});
