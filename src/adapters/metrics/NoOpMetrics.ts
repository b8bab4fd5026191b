/**
 * No-Op Metrics Adapter
 *
 * Drops every observation. Used when METRICS_TYPE=noop and in unit tests.
 */

import { IMetrics, MetricLabels } from '@/interfaces/IMetrics';

export class NoOpMetrics implements IMetrics {
  incrementCounter(_name: string, _value?: number, _labels?: MetricLabels): void {}

  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {}

  startTimer(_name: string, _labels?: MetricLabels): (extraLabels?: MetricLabels) => void {
    return () => {};
  }
}
