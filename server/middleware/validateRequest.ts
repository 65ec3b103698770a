import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { config, KEYWORD_BOUNDS } from '../config';
import { withSource } from '../logger';

const log = withSource('validateRequest');

export const KeywordsBodySchema = z.object({
  document: z.string(),
  corpus: z.array(z.string()).default([]),
  maxKeywordSize: z
    .number()
    .int()
    .min(KEYWORD_BOUNDS.MAX_SIZE_MIN)
    .max(KEYWORD_BOUNDS.MAX_SIZE_MAX)
    .default(config.keywords.maxKeywordSize),
  limit: z
    .number()
    .int()
    .min(KEYWORD_BOUNDS.LIMIT_MIN)
    .max(KEYWORD_BOUNDS.LIMIT_MAX)
    .default(config.keywords.limit),
  includeTarget: z.boolean().optional(),
  windowing: z.enum(['chunk', 'fixed', 'flexible']).optional(),
});

function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

function sendValidationError(res: Response, reqPath: string, issues: z.ZodIssue[]) {
  const requestId = requestIdOf(res);
  if (issues.length) {
    log.warn({ path: reqPath, issues, requestId }, 'request validation failed');
  }
  return res.status(400).json({
    error: 'Invalid payload',
    details: issues,
    ...(requestId ? { requestId } : {}),
  });
}

export function validateKeywordsBody(req: Request, res: Response, next: NextFunction) {
  const parsed = KeywordsBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return sendValidationError(res, req.path, parsed.error.issues);
  }
  req.validated = { ...(req.validated || {}), body: parsed.data };
  return next();
}
