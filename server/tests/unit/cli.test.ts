import { describe, it, expect } from 'vitest';
import { parseCliArgs, runCli, formatKeywords, type CliIO } from '../../cli';
import { ValidationError } from '../../types/errors';

const ENERGY_TEXT = 'Solar power is clean. Solar power and wind power. Coal is dirty.';

function fakeIO(files: Record<string, string>) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    readText: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
      return content;
    },
  };
  return { io, out, err };
}

const files = {
  'target.txt': ENERGY_TEXT,
  'growing.txt': 'Solar power is growing.',
  'gas.txt': 'Gas prices rose.',
};

describe('parseCliArgs', () => {
  it('parses positionals and options', () => {
    const options = parseCliArgs([
      'target.txt',
      'c1.txt',
      '--limit',
      '5',
      '--max-size',
      '2',
      '--include-target',
      '--windowing',
      'fixed',
      '--json',
    ]);

    expect(options).toEqual({
      target: 'target.txt',
      corpus: ['c1.txt'],
      maxKeywordSize: 2,
      limit: 5,
      includeTarget: true,
      windowing: 'fixed',
      stopwordsFile: undefined,
      json: true,
    });
  });

  it('falls back to configured defaults', () => {
    const options = parseCliArgs(['target.txt']);

    expect(options.corpus).toEqual([]);
    expect(options.maxKeywordSize).toBe(3);
    expect(options.limit).toBe(10);
    expect(options.includeTarget).toBe(false);
    expect(options.windowing).toBe('chunk');
    expect(options.json).toBe(false);
  });

  it('requires a target file', () => {
    expect(() => parseCliArgs([])).toThrow(ValidationError);
  });

  it('rejects unknown options and bad values', () => {
    expect(() => parseCliArgs(['target.txt', '--bogus'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['target.txt', '--windowing', 'sideways'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['target.txt', '--limit', 'ten'])).toThrow(ValidationError);
  });
});

describe('runCli', () => {
  it('prints tab-separated scores and keywords', async () => {
    const { io, out, err } = fakeIO(files);

    const code = await runCli(['target.txt', 'growing.txt', 'gas.txt'], io);

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual(['1.3863\tSolar power', '0.6931\twind power']);
  });

  it('prints JSON when asked', async () => {
    const { io, out } = fakeIO(files);

    const code = await runCli(['target.txt', 'growing.txt', 'gas.txt', '--json', '--limit', '1'], io);

    expect(code).toBe(0);
    expect(out).toHaveLength(1);
    const parsed: unknown = JSON.parse(out[0]);
    expect(parsed).toEqual([
      {
        keyword: 'Solar power',
        score: expect.closeTo(2 * Math.LN2, 10),
        rakeScore: 4,
        termFrequency: 2,
        documentFrequency: 1,
      },
    ]);
  });

  it('exits with 1 on an invalid limit', async () => {
    const { io, out, err } = fakeIO(files);

    const code = await runCli(['target.txt', '--limit', '0'], io);

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['INVALID_CONFIGURATION: limit must be a positive integer, got 0']);
  });

  it('prints usage after argument errors', async () => {
    const { io, err } = fakeIO(files);

    const code = await runCli([], io);

    expect(code).toBe(1);
    expect(err).toHaveLength(2);
    expect(err[0]).toMatch(/^VALIDATION_ERROR: Invalid arguments/);
    expect(err[1]).toMatch(/^Usage: keywords <target-file>/);
  });

  it('exits with 1 when a file cannot be read', async () => {
    const { io, err } = fakeIO(files);

    const code = await runCli(['missing.txt'], io);

    expect(code).toBe(1);
    expect(err).toEqual(["ENOENT: no such file, open 'missing.txt'"]);
  });
});

describe('formatKeywords', () => {
  it('formats scores with four decimals', () => {
    const lines = formatKeywords(
      [{ keyword: 'wind power', score: 0.5, rakeScore: 4, termFrequency: 1, documentFrequency: 1 }],
      false
    );
    expect(lines).toEqual(['0.5000\twind power']);
  });
});
