/**
 * Prometheus Metrics — Internal Only
 *
 * Counters for submission decisions, one histogram for pipeline latency.
 * Served on a separate internal port (default 9090), NOT on the public API path.
 */

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { createServer, Server } from 'http';
import type { PipelineEvent } from '../submission/index.js';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry });

export const submissionsReceived = new Counter({
  name: 'submissions_received_total',
  help: 'Number of submissions received',
  registers: [metricsRegistry],
});

export const submissionsAccepted = new Counter({
  name: 'submissions_accepted_total',
  help: 'Number of submissions accepted and written to the ledger',
  registers: [metricsRegistry],
});

export const submissionsRejected = new Counter({
  name: 'submissions_rejected_total',
  help: 'Number of submissions rejected, by reason',
  labelNames: ['reason'] as const,
  registers: [metricsRegistry],
});

export const submissionDuration = new Histogram({
  name: 'submission_pipeline_duration_seconds',
  help: 'Time from receipt to decision',
  labelNames: ['status'] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [metricsRegistry],
});

/**
 * Feed pipeline events into the counters.
 * Subscribe with `pipeline.onEvent(trackPipelineEvent)`.
 */
export function trackPipelineEvent(event: PipelineEvent): void {
  switch (event.type) {
    case 'SUBMISSION_RECEIVED':
      submissionsReceived.inc();
      break;
    case 'SUBMISSION_ACCEPTED':
      submissionsAccepted.inc();
      submissionDuration.observe({ status: 'accepted' }, event.durationMs / 1000);
      break;
    case 'SUBMISSION_REJECTED':
      submissionsRejected.inc({ reason: event.reason });
      submissionDuration.observe({ status: 'rejected' }, event.durationMs / 1000);
      break;
  }
}

/**
 * Start the internal metrics HTTP server.
 * Serves /metrics in Prometheus exposition format.
 */
export function startMetricsServer(port: number, host = '0.0.0.0'): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.statusCode = 404;
      res.end('Not found');
      return;
    }

    metricsRegistry
      .metrics()
      .then((body) => {
        res.setHeader('Content-Type', metricsRegistry.contentType);
        res.end(body);
      })
      .catch((err: unknown) => {
        res.statusCode = 500;
        res.end(err instanceof Error ? err.message : String(err));
      });
  });

  server.listen(port, host);
  return server;
}
