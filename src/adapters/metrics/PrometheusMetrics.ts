/**
 * In-memory Prometheus Metrics Adapter
 *
 * Keeps counters and histogram summaries in process memory and renders them
 * in Prometheus text format for GET /api/metrics.
 *
 * Series are keyed by name plus sorted labels, so label order at the call
 * site does not matter.
 */

import { IMetrics, MetricLabels } from '@/interfaces/IMetrics';

interface HistogramSeries {
  count: number;
  sum: number;
  max: number;
}

function formatLabels(labels?: MetricLabels): string {
  if (!labels) return '';
  const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) return '';
  return `{${entries.map(([key, value]) => `${key}="${String(value)}"`).join(',')}}`;
}

export class PrometheusMetrics implements IMetrics {
  private readonly counters = new Map<string, Map<string, number>>();
  private readonly histograms = new Map<string, Map<string, HistogramSeries>>();

  constructor(private readonly now: () => number = Date.now) {}

  incrementCounter(name: string, value = 1, labels?: MetricLabels): void {
    const series = this.counters.get(name) ?? new Map<string, number>();
    const key = formatLabels(labels);
    series.set(key, (series.get(key) ?? 0) + value);
    this.counters.set(name, series);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const series = this.histograms.get(name) ?? new Map<string, HistogramSeries>();
    const key = formatLabels(labels);
    const current = series.get(key) ?? { count: 0, sum: 0, max: 0 };
    series.set(key, {
      count: current.count + 1,
      sum: current.sum + value,
      max: Math.max(current.max, value),
    });
    this.histograms.set(name, series);
  }

  startTimer(name: string, labels?: MetricLabels): (extraLabels?: MetricLabels) => void {
    const startedAt = this.now();
    return (extraLabels?: MetricLabels) => {
      this.recordHistogram(name, this.now() - startedAt, { ...labels, ...extraLabels });
    };
  }

  /**
   * Render every series in Prometheus text format
   */
  collect(): string[] {
    const lines: string[] = [];

    for (const [name, series] of this.counters.entries()) {
      lines.push(`# TYPE ${name} counter`);
      for (const [labels, value] of series.entries()) {
        lines.push(`${name}${labels} ${value}`);
      }
      lines.push('');
    }

    for (const [name, series] of this.histograms.entries()) {
      lines.push(`# TYPE ${name} summary`);
      for (const [labels, { count, sum, max }] of series.entries()) {
        lines.push(`${name}_count${labels} ${count}`);
        lines.push(`${name}_sum${labels} ${sum}`);
        lines.push(`${name}_max${labels} ${max}`);
      }
      lines.push('');
    }

    return lines;
  }
}
