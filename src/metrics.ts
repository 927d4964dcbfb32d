import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client, { Registry } from 'prom-client';

/**
 * Prometheus metrics for the API client and the example webhook server.
 *
 * Durations are recorded in true milliseconds to match the *_ms names;
 * prom-client's Histogram.startTimer() would record seconds.
 */

const register = new Registry();
const METRICS_PREFIX = 'callwire_';

let defaultMetricsEnabled = false;

const apiRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}api_request_duration_ms`,
  help: 'Round-trip duration of REST API requests in milliseconds',
  labelNames: ['endpoint', 'method', 'code'] as const,
  buckets: [25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [register],
});

const apiErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}api_errors_total`,
  help: 'REST API request failures by endpoint and error kind',
  labelNames: ['endpoint', 'kind'] as const,
  registers: [register],
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [register],
});

const mediaStreamMessagesTotal = new client.Counter({
  name: `${METRICS_PREFIX}media_stream_messages_total`,
  help: 'Media stream websocket messages received, by event',
  labelNames: ['event'] as const,
  registers: [register],
});

const mediaStreamConnections = new client.Gauge({
  name: `${METRICS_PREFIX}media_stream_connections`,
  help: 'Open media stream websocket connections',
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return `${req.baseUrl}${routePath}`;
  }

  const raw = req.path || req.url || 'unknown';
  return raw.replace(/\b(CA|CF|AC|AP|MZ|PA)[0-9a-f]{32}\b/gi, ':sid').replace(/\b\d{6,}\b/g, ':n');
}

export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) {
    return;
  }
  defaultMetricsEnabled = true;
  client.collectDefaultMetrics({ register, prefix: METRICS_PREFIX });
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts an API request timer; call the returned function with the response
 * status, or `'error'` when no response arrived.
 */
export function startApiTimer(endpoint: string, method: string): (code: number | 'error') => void {
  const start = nowNs();

  return (code) => {
    apiRequestDurationMs.observe({ endpoint, method, code: String(code) }, nsToMs(nowNs() - start));
  };
}

export function incApiError(endpoint: string, kind: string): void {
  apiErrorsTotal.inc({ endpoint, kind });
}

export function incMediaStreamMessage(event: string): void {
  mediaStreamMessagesTotal.inc({ event: event.trim() !== '' ? event : 'unknown' });
}

export function trackMediaStreamConnection(delta: 1 | -1): void {
  mediaStreamConnections.inc(delta);
}
