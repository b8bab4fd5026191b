/**
 * Metrics Controller
 *
 * Exposes metrics in Prometheus text format:
 * - HTTP requests (from metricsMiddleware)
 * - Snapshot pipeline counters (quote fetches, cache hits, batch sources)
 * - Process uptime, memory and CPU
 */

import { Request, Response } from 'express';
import { getHttpMetrics } from '@/api/middlewares/metricsMiddleware';
import { metrics as pipelineMetrics } from '@/adapters/metrics/MetricsFactory';
import { PrometheusMetrics } from '@/adapters/metrics/PrometheusMetrics';
import { env } from '@/config/env';

function gauge(name: string, help: string, value: number, type = 'gauge'): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`, `${name} ${value}`, ''];
}

/**
 * GET /api/metrics
 */
export function getMetrics(_req: Request, res: Response): void {
  const lines: string[] = [];

  lines.push(...getHttpMetrics());

  // Pipeline metrics exist only when the Prometheus adapter is active
  if (pipelineMetrics instanceof PrometheusMetrics) {
    lines.push(...pipelineMetrics.collect());
  }

  const memUsage = process.memoryUsage();
  const cpuUsage = process.cpuUsage();

  lines.push(...gauge('process_uptime_seconds', 'Process uptime in seconds', process.uptime()));
  lines.push(...gauge('process_heap_used_bytes', 'Process heap memory used in bytes', memUsage.heapUsed));
  lines.push(...gauge('process_rss_bytes', 'Process resident set size in bytes', memUsage.rss));
  lines.push(
    ...gauge('process_cpu_user_seconds_total', 'Total user CPU time in seconds', cpuUsage.user / 1e6, 'counter')
  );
  lines.push(
    ...gauge('process_cpu_system_seconds_total', 'Total system CPU time in seconds', cpuUsage.system / 1e6, 'counter')
  );

  lines.push('# HELP app_info Application information');
  lines.push('# TYPE app_info gauge');
  lines.push(`app_info{version="1.0.0",node_version="${process.version}",env="${env.NODE_ENV}"} 1`);
  lines.push('');

  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(lines.join('\n'));
}
