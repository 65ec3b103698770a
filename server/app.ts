import express, { type Express, type Request, type Response, type NextFunction } from "express";
import type { Server } from "http";
import { randomUUID } from "crypto";
import { config } from "./config";
import { withSource } from "./logger";
import { metrics } from "./metrics";
import { registerRoutes, type RouteOptions } from "./routes";
import { createErrorResponse, isKeywordExtractionError, logError } from "./types/errors";

const log = withSource("http");

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export const UNMATCHED_ENDPOINT = "unmatched";

/**
 * Metrics label for a finished request: the route template it matched, so
 * arbitrary URLs never mint new series.
 */
export function endpointLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === "object" && route !== null && "path" in route && typeof route.path === "string") {
    return `${req.baseUrl}${route.path}`;
  }
  return UNMATCHED_ENDPOINT;
}

export function createApp(options: RouteOptions = {}): { app: Express; server: Server } {
  const app = express();
  app.use(express.json({ limit: config.maxBodySize }));

  // Attach a per-request ID early for structured logging and tracing
  app.use((req, res, next) => {
    const id = randomUUID();
    req.id = id;
    res.locals.requestId = id;
    res.setHeader("X-Request-Id", id);
    next();
  });

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        metrics.observeApiRequest(endpointLabel(req), req.method, res.statusCode, duration);
        log.info(
          { method: req.method, path, status: res.statusCode, durationMs: duration, requestId: req.id },
          `${req.method} ${path} ${res.statusCode} in ${duration}ms`
        );
      }
    });

    next();
  });

  const server = registerRoutes(app, options);

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = err instanceof Error ? err : new Error(String(err));
    const requestId = req.id;

    if (isKeywordExtractionError(error)) {
      logError(log, error, { operation: `${req.method} ${req.path}`, requestId });
      return res.status(error.statusCode).json(createErrorResponse(error, requestId));
    }

    // Body parser failures (malformed JSON, oversized payloads) carry their own status
    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      log.warn({ status, message: error.message, requestId }, "rejected request");
      return res.status(status).json({
        error: {
          code: "BAD_REQUEST",
          message: error.message,
          timestamp: new Date().toISOString(),
          requestId,
        },
      });
    }

    logError(log, error, { operation: `${req.method} ${req.path}`, requestId });
    return res.status(500).json(createErrorResponse(error, requestId));
  });

  return { app, server };
}
