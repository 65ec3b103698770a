import type { Express } from "express";
import { createServer, type Server } from "http";
import { config } from "./config";
import { withSource } from "./logger";
import { metrics } from "./metrics";
import { validateKeywordsBody } from "./middleware/validateRequest";
import { ValidationError } from "./types/errors";
import {
  KeywordExtractor,
  getDefaultStopwords,
  loadStopwords,
  type StopwordSet,
} from "./utils/keywords";

export interface RouteOptions {
  /** Overrides the configured stopword list */
  stopwords?: StopwordSet;
}

export function resolveStopwords(): StopwordSet {
  return config.keywords.stopwordsFile
    ? loadStopwords(config.keywords.stopwordsFile)
    : getDefaultStopwords();
}

export function registerRoutes(app: Express, options: RouteOptions = {}): Server {
  const stopwords = options.stopwords ?? resolveStopwords();
  const log = withSource("routes");
  log.info({ stopwords: stopwords.size }, "stopword set loaded");

  app.get("/metrics", async (_req, res, next) => {
    try {
      const content = await metrics.getMetricsContent();
      res.setHeader("Content-Type", metrics.register.contentType);
      res.send(content);
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/healthz", (_req, res) => {
    res.json({
      status: "ok",
      stopwords: stopwords.size,
      defaults: {
        maxKeywordSize: config.keywords.maxKeywordSize,
        limit: config.keywords.limit,
        windowing: config.keywords.windowing,
        includeTarget: config.keywords.includeTarget,
      },
    });
  });

  app.post("/api/keywords", validateKeywordsBody, (req, res, next) => {
    const body = req.validated?.body;
    if (!body) {
      return next(new ValidationError("Request body was not validated"));
    }

    try {
      const extractor = new KeywordExtractor({
        stopwords,
        windowing: body.windowing ?? config.keywords.windowing,
        includeTarget: body.includeTarget ?? config.keywords.includeTarget,
      });
      const keywords = extractor.extract(
        body.document,
        body.corpus,
        body.maxKeywordSize,
        body.limit
      );
      return res.json({ keywords, count: keywords.length });
    } catch (err) {
      return next(err);
    }
  });

  return createServer(app);
}
