/**
 * Metrics Interface
 *
 * Abstraction for pipeline metrics. Services record through this interface;
 * the factory decides whether values are kept (Prometheus registry) or dropped.
 */

/**
 * Metric labels for filtering and grouping
 */
export type MetricLabels = Record<string, string | number | boolean>;

export interface IMetrics {
  /**
   * Increment a counter metric
   *
   * @example
   * metrics.incrementCounter('quote_fetch_total', 1, { outcome: 'success' });
   */
  incrementCounter(name: string, value?: number, labels?: MetricLabels): void;

  /**
   * Record one observation of a duration or size
   *
   * @example
   * metrics.recordHistogram('snapshot_fetch_duration_ms', 812, { source: 'live' });
   */
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;

  /**
   * Start a timer; the returned function records the elapsed milliseconds
   * into the named histogram, merging any labels passed at stop time.
   */
  startTimer(name: string, labels?: MetricLabels): (extraLabels?: MetricLabels) => void;
}

/**
 * Metrics Factory Interface
 */
export interface IMetricsFactory {
  createMetrics(): IMetrics;
}
