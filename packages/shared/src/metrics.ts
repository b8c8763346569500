/**
 * Prometheus Metrics
 *
 * Metrics for pipeline runs, extraction calls and worker job processing.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

let defaultMetricsEnabled = false;

/**
 * Collect default process metrics (CPU, memory, event loop). Off until a
 * worker calls this.
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
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'leasex_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.5, 1, 5, 10, 30, 60, 120, 300],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'leasex_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const pipelineRunsCounter = new promClient.Counter({
  name: 'leasex_pipeline_runs_total',
  help: 'Total number of pipeline runs by outcome',
  labelNames: ['outcome', 'size_tier'],
  registers: [register],
});

export const pipelineDurationHistogram = new promClient.Histogram({
  name: 'leasex_pipeline_duration_seconds',
  help: 'Wall-clock duration of pipeline runs',
  labelNames: ['size_tier'],
  buckets: [1, 5, 10, 30, 60, 120, 240, 480],
  registers: [register],
});

export const segmentsCounter = new promClient.Counter({
  name: 'leasex_segments_total',
  help: 'Segments produced, by classification and exclusion',
  labelNames: ['classification', 'excluded'],
  registers: [register],
});

export const completenessHistogram = new promClient.Histogram({
  name: 'leasex_completeness_score',
  help: 'Completeness score of aggregated extractions',
  labelNames: ['declared_category'],
  buckets: [0.1, 0.25, 0.5, 0.75, 0.9, 1],
  registers: [register],
});

// ============================================================================
// Extraction Call Metrics
// ============================================================================

export const extractionCallsCounter = new promClient.Counter({
  name: 'leasex_extraction_calls_total',
  help: 'Extraction calls by pass and result status',
  labelNames: ['pass', 'status'],
  registers: [register],
});

export const extractionCallDurationHistogram = new promClient.Histogram({
  name: 'leasex_extraction_call_duration_seconds',
  help: 'Duration of extraction calls',
  labelNames: ['pass'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const extractionRetriesCounter = new promClient.Counter({
  name: 'leasex_extraction_retries_total',
  help: 'Retries scheduled for extraction jobs',
  labelNames: ['pass', 'status'],
  registers: [register],
});

export const passesSkippedCounter = new promClient.Counter({
  name: 'leasex_passes_skipped_total',
  help: 'Passes skipped by reason',
  labelNames: ['pass', 'reason'],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'leasex_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'leasex_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

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
          logger.error('Failed to render metrics', err);
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
