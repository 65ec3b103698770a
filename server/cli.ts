/**
 * Command-line runner: extract keywords from a target file against corpus files.
 *
 *   npm run keywords -- data/target.txt data/other-1.txt data/other-2.txt --limit 5
 */

import { readFile } from "fs/promises";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { z } from "zod";
import { config } from "./config";
import { withSource } from "./logger";
import { ValidationError, isKeywordExtractionError } from "./types/errors";
import {
  KeywordExtractor,
  getDefaultStopwords,
  loadStopwords,
  type RankedKeyword,
} from "./utils/keywords";

const log = withSource("cli");

const USAGE =
  "Usage: keywords <target-file> [corpus-file ...] [--max-size N] [--limit N] " +
  "[--include-target] [--windowing chunk|fixed|flexible] [--stopwords FILE] [--json]";

const CliOptionsSchema = z.object({
  target: z.string().min(1),
  corpus: z.array(z.string()),
  maxKeywordSize: z.coerce.number().int(),
  limit: z.coerce.number().int(),
  includeTarget: z.boolean(),
  windowing: z.enum(["chunk", "fixed", "flexible"]),
  stopwordsFile: z.string().optional(),
  json: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  readText: (path: string) => Promise<string>;
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  readText: (path) => readFile(path, "utf-8"),
};

export function parseCliArgs(argv: string[]): CliOptions {
  let parsedArgs: ReturnType<typeof parseCliTokens>;
  try {
    parsedArgs = parseCliTokens(argv);
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err));
  }

  const { values, positionals } = parsedArgs;
  const [target, ...corpus] = positionals;

  const parsed = CliOptionsSchema.safeParse({
    target,
    corpus,
    maxKeywordSize: values["max-size"] ?? config.keywords.maxKeywordSize,
    limit: values.limit ?? config.keywords.limit,
    includeTarget: values["include-target"] ?? config.keywords.includeTarget,
    windowing: values.windowing ?? config.keywords.windowing,
    stopwordsFile: values.stopwords ?? config.keywords.stopwordsFile,
    json: values.json ?? false,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`);
    throw new ValidationError(`Invalid arguments (${problems.join("; ")})`, { problems });
  }

  return parsed.data;
}

function parseCliTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "max-size": { type: "string" },
      limit: { type: "string" },
      "include-target": { type: "boolean" },
      windowing: { type: "string" },
      stopwords: { type: "string" },
      json: { type: "boolean" },
    },
  });
}

export function formatKeywords(keywords: RankedKeyword[], json: boolean): string[] {
  if (json) {
    return [JSON.stringify(keywords, null, 2)];
  }
  return keywords.map((k) => `${k.score.toFixed(4)}\t${k.keyword}`);
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    const [target, ...corpus] = await Promise.all(
      [options.target, ...options.corpus].map((path) => io.readText(path))
    );

    const extractor = new KeywordExtractor({
      stopwords: options.stopwordsFile ? loadStopwords(options.stopwordsFile) : getDefaultStopwords(),
      windowing: options.windowing,
      includeTarget: options.includeTarget,
    });

    const keywords = extractor.extract(target, corpus, options.maxKeywordSize, options.limit);
    for (const line of formatKeywords(keywords, options.json)) {
      io.stdout(line);
    }
    return 0;
  } catch (err) {
    if (isKeywordExtractionError(err)) {
      io.stderr(`${err.code}: ${err.message}`);
      if (err instanceof ValidationError) io.stderr(USAGE);
      return 1;
    }
    log.error({ err }, "keyword extraction failed");
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

const invokedDirectly =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error({ err }, "unexpected CLI failure");
      process.exitCode = 1;
    }
  );
}
