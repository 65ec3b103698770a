import 'express';

declare global {
  namespace Express {
    /** Normalized body of POST /api/keywords after validation middleware */
    interface ValidatedKeywordsBody {
      document: string;
      corpus: string[];
      maxKeywordSize: number;
      limit: number;
      includeTarget?: boolean;
      windowing?: 'chunk' | 'fixed' | 'flexible';
    }

    interface Request {
      /** Per-request ID, also sent back as X-Request-Id */
      id?: string;

      /** Set by validation middleware(s) after Zod-based normalization */
      validated?: {
        body?: ValidatedKeywordsBody;
      };
    }
  }
}

export {}; // ensure this file is treated as a module
