/**
 * Metric Types
 *
 * Prometheus-style instruments and the registry that exports them.
 *
 * @packageDocumentation
 */

// =============================================================================
// METRIC TYPES
// =============================================================================

export type Labels = Record<string, string>;

/**
 * Counter metric - monotonically increasing value
 */
export interface Counter {
  readonly name: string;
  readonly help: string;
  readonly labels: string[];
  inc(labels?: Labels, value?: number): void;
  get(labels?: Labels): number;
  reset(): void;
}

/**
 * Histogram metric - distribution of values
 */
export interface Histogram {
  readonly name: string;
  readonly help: string;
  readonly labels: string[];
  readonly buckets: number[];
  observe(labels: Labels, value: number): void;
  get(labels?: Labels): HistogramValue;
  reset(): void;
}

/**
 * Histogram value; bucket counts are cumulative (observations <= bound)
 */
export interface HistogramValue {
  sum: number;
  count: number;
  buckets: Map<number, number>;
}

/**
 * Gauge metric - value that can go up and down
 */
export interface Gauge {
  readonly name: string;
  readonly help: string;
  readonly labels: string[];
  set(labels: Labels, value: number): void;
  inc(labels?: Labels, value?: number): void;
  dec(labels?: Labels, value?: number): void;
  get(labels?: Labels): number;
  reset(): void;
}

/**
 * Metrics registry for managing and exporting metrics
 */
export interface MetricsRegistry {
  createCounter(name: string, help: string, labels?: string[]): Counter;
  createHistogram(name: string, help: string, labels?: string[], buckets?: number[]): Histogram;
  createGauge(name: string, help: string, labels?: string[]): Gauge;
  /** Prometheus text exposition of every registered metric */
  getMetrics(): string;
  reset(): void;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface MetricsConfig {
  enabled: boolean;
  prefix: string;
  /** Labels merged into every sample */
  defaultLabels: Labels;
  histogramBuckets: {
    latency: number[];
    size: number[];
  };
}

export const DEFAULT_METRICS_CONFIG: MetricsConfig = {
  enabled: true,
  prefix: 'sqlscope',
  defaultLabels: {},
  histogramBuckets: {
    latency: [0.0001, 0.0005, 0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
    size: [10, 100, 1000, 10000, 100000],
  },
};
