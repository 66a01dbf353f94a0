/**
 * Prometheus Metrics
 *
 * Pipeline, validator, queue and HTTP metrics. Default process metrics are
 * opt-in through enableDefaultMetrics() so that importing the core from a
 * test or a library does not start collectors.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

export const register = new promClient.Registry();

let defaultMetricsEnabled = false;

/**
 * Collect CPU/memory metrics. Wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  try {
    promClient.collectDefaultMetrics({ register });
    defaultMetricsEnabled = true;
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'warrant_documents_processed_total',
  help: 'Total number of warrants processed, by routing outcome',
  labelNames: ['routing_status'],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'warrant_stage_duration_seconds',
  help: 'Duration of each orchestrator stage',
  labelNames: ['stage'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 30],
  registers: [register],
});

export const validatorRequestsCounter = new promClient.Counter({
  name: 'warrant_validator_requests_total',
  help: 'Semantic validator calls, by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const subsidyMatchesCounter = new promClient.Counter({
  name: 'warrant_subsidy_matches_total',
  help: 'Consolidated subsidy matches, by source',
  labelNames: ['source'],
  registers: [register],
});

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'warrant_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'warrant_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

export const jobDurationHistogram = new promClient.Histogram({
  name: 'warrant_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'warrant_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'warrant_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'warrant_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
