/**
 * HTTP Metrics Middleware
 *
 * Tracks per-route request counts and latency:
 * - http_requests_total{method,path,status}
 * - http_request_duration_seconds{method,path} (summary with quantiles)
 */

import { Request, Response, NextFunction } from 'express';

// In-memory storage for metrics
const requestCounts = new Map<string, number>();
const requestDurations = new Map<string, number[]>();

const MAX_SAMPLES_PER_ROUTE = 1000;

// Infrastructure endpoints are not tracked
const UNTRACKED_PATHS = new Set(['/api/metrics', '/api/health']);

function getMetricKey(method: string, path: string, status: number): string {
  return `${method} ${path} ${status}`;
}

function getDurationKey(method: string, path: string): string {
  return `${method} ${path}`;
}

function quantile(sorted: number[], q: number): number {
  return sorted[Math.floor(sorted.length * q)] ?? sorted[sorted.length - 1] ?? 0;
}

/**
 * Middleware to track HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const path = req.path;

  if (UNTRACKED_PATHS.has(path)) {
    next();
    return;
  }

  const startTime = process.hrtime.bigint();

  res.on('finish', () => {
    const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
    const countKey = getMetricKey(req.method, path, res.statusCode);
    requestCounts.set(countKey, (requestCounts.get(countKey) ?? 0) + 1);

    const durationKey = getDurationKey(req.method, path);
    const durations = requestDurations.get(durationKey) ?? [];
    durations.push(duration);
    if (durations.length > MAX_SAMPLES_PER_ROUTE) {
      durations.shift();
    }
    requestDurations.set(durationKey, durations);
  });

  next();
}

/**
 * Get all HTTP request metrics in Prometheus format
 */
export function getHttpMetrics(): string[] {
  const metrics: string[] = [];

  metrics.push('# HELP http_requests_total Total HTTP requests');
  metrics.push('# TYPE http_requests_total counter');
  for (const [key, count] of requestCounts.entries()) {
    const [method, path, status] = key.split(' ');
    metrics.push(`http_requests_total{method="${method}",path="${path}",status="${status}"} ${count}`);
  }
  metrics.push('');

  metrics.push('# HELP http_request_duration_seconds HTTP request duration in seconds');
  metrics.push('# TYPE http_request_duration_seconds summary');
  for (const [key, durations] of requestDurations.entries()) {
    if (durations.length === 0) continue;

    const [method, path] = key.split(' ');
    const labels = `method="${method}",path="${path}"`;
    const sorted = [...durations].sort((a, b) => a - b);
    const sum = durations.reduce((a, b) => a + b, 0);

    metrics.push(`http_request_duration_seconds{${labels},quantile="0.5"} ${quantile(sorted, 0.5).toFixed(4)}`);
    metrics.push(`http_request_duration_seconds{${labels},quantile="0.95"} ${quantile(sorted, 0.95).toFixed(4)}`);
    metrics.push(`http_request_duration_seconds{${labels},quantile="0.99"} ${quantile(sorted, 0.99).toFixed(4)}`);
    metrics.push(`http_request_duration_seconds_sum{${labels}} ${sum.toFixed(4)}`);
    metrics.push(`http_request_duration_seconds_count{${labels}} ${durations.length}`);
  }
  metrics.push('');

  return metrics;
}

/**
 * Reset all HTTP metrics (used by tests)
 */
export function resetHttpMetrics(): void {
  requestCounts.clear();
  requestDurations.clear();
}
