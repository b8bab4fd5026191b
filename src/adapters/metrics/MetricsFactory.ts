/**
 * Metrics Factory
 *
 * Selection Logic:
 * - METRICS_TYPE=prometheus (default) → PrometheusMetrics, exposed at /api/metrics
 * - METRICS_TYPE=noop → NoOpMetrics
 */

import { IMetrics, IMetricsFactory } from '@/interfaces/IMetrics';
import { env } from '@/config/env';
import { NoOpMetrics } from './NoOpMetrics';
import { PrometheusMetrics } from './PrometheusMetrics';

export class MetricsFactory implements IMetricsFactory {
  constructor(private readonly metricsType: string = env.METRICS_TYPE) {}

  createMetrics(): IMetrics {
    switch (this.metricsType.toLowerCase()) {
      case 'noop':
        return new NoOpMetrics();

      case 'prometheus':
      default:
        return new PrometheusMetrics();
    }
  }
}

/**
 * Default metrics instance for application use
 */
export const metrics = new MetricsFactory().createMetrics();
