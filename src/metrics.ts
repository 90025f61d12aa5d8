import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; this module records
 * milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_answer_bridge_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// Pipeline stage duration in milliseconds (transcription/completion/synthesis)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Pipeline stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by pipeline stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const recordingsProcessedTotal = new client.Counter({
  name: `${METRICS_PREFIX}recordings_processed_total`,
  help: 'Recording callbacks handled, by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Static filenames must not become route labels.
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }

  const raw = req.path || req.url || 'unknown';
  if (raw.startsWith('/static/')) {
    return '/static/:file';
  }
  return raw.replace(/\b[0-9a-f]{16,}\b/gi, ':id');
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

/** Starts a stage timer and returns end(), which records elapsed milliseconds. */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();
  return () => {
    stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incRecordingsProcessed(outcome: string): void {
  recordingsProcessedTotal.inc({ outcome });
}
