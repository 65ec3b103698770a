import client, { Registry, Counter, Histogram } from 'prom-client';

// Dedicated registry to avoid default global pollution
const register = new Registry();
client.collectDefaultMetrics({ register, prefix: 'app_' });

const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000, 2000];
const COUNT_BUCKETS = [0, 1, 5, 10, 25, 50, 100, 250, 500, 1000];

const extractionDurationMs = new Histogram({
  name: 'keyword_extraction_duration_ms',
  help: 'Duration of keyword extraction runs in milliseconds',
  labelNames: ['windowing'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const extractionCandidates = new Histogram({
  name: 'keyword_extraction_candidates',
  help: 'Number of unique candidate phrases scored per extraction run',
  labelNames: ['windowing'],
  buckets: COUNT_BUCKETS,
  registers: [register],
});

const apiRequestLatencyMs = new Histogram({
  name: 'api_request_latency_ms',
  help: 'Latency of API requests in milliseconds',
  labelNames: ['endpoint', 'method', 'status'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const apiRequestsTotal = new Counter({
  name: 'api_requests_total',
  help: 'Total API requests by endpoint, method, and status',
  labelNames: ['endpoint', 'method', 'status'],
  registers: [register],
});

function observeExtraction(windowing: string, durationMs: number, candidates: number) {
  extractionDurationMs.labels(windowing).observe(durationMs);
  extractionCandidates.labels(windowing).observe(candidates);
}

function observeApiRequest(endpoint: string, method: string, status: number, durationMs: number) {
  const statusStr = String(status);
  apiRequestLatencyMs.labels(endpoint, method, statusStr).observe(durationMs);
  apiRequestsTotal.labels(endpoint, method, statusStr).inc();
}

async function getMetricsContent(): Promise<string> {
  return register.metrics();
}

export const metrics = {
  register,
  observeExtraction,
  observeApiRequest,
  getMetricsContent,
};
