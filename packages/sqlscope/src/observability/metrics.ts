/**
 * Prometheus Metrics Implementation
 *
 * In-process counters, histograms and gauges with text exposition.
 *
 * @packageDocumentation
 */

import type {
  Counter,
  Histogram,
  HistogramValue,
  Gauge,
  Labels,
  MetricsRegistry,
  MetricsConfig,
} from './types.js';

// =============================================================================
// METRIC IMPLEMENTATIONS
// =============================================================================

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Create a label key from label values
 */
function labelsToKey(labels: Labels): string {
  const entries = Object.entries(labels).sort((a, b) => a[0].localeCompare(b[0]));
  return entries.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(',');
}

function sample(name: string, key: string, value: number): string {
  return key ? `${name}{${key}} ${value}` : `${name} ${value}`;
}

abstract class MetricBase {
  readonly name: string;
  readonly help: string;
  readonly labels: string[];
  private readonly defaultLabels: Labels;

  constructor(name: string, help: string, labels: string[], defaultLabels: Labels) {
    this.name = name;
    this.help = help;
    this.labels = labels;
    this.defaultLabels = defaultLabels;
  }

  protected key(labels: Labels): string {
    return labelsToKey({ ...this.defaultLabels, ...labels });
  }

  protected header(type: 'counter' | 'histogram' | 'gauge'): string[] {
    return [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${type}`];
  }
}

/**
 * Counter implementation
 */
class CounterImpl extends MetricBase implements Counter {
  private readonly values: Map<string, number> = new Map();

  inc(labels: Labels = {}, value = 1): void {
    if (value < 0) {
      throw new RangeError(`Counter ${this.name} cannot decrease`);
    }
    const key = this.key(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + value);
  }

  get(labels: Labels = {}): number {
    return this.values.get(this.key(labels)) ?? 0;
  }

  reset(): void {
    this.values.clear();
  }

  toPrometheus(): string {
    const lines = this.header('counter');

    if (this.values.size === 0) {
      lines.push(`${this.name} 0`);
    } else {
      for (const [key, value] of this.values) {
        lines.push(sample(this.name, key, value));
      }
    }

    return lines.join('\n');
  }
}

interface HistogramData {
  sum: number;
  count: number;
  buckets: Map<number, number>;
}

/**
 * Histogram implementation
 */
class HistogramImpl extends MetricBase implements Histogram {
  readonly buckets: number[];
  private readonly values: Map<string, HistogramData> = new Map();

  constructor(name: string, help: string, labels: string[], defaultLabels: Labels, buckets: number[]) {
    super(name, help, labels, defaultLabels);
    this.buckets = [...buckets].sort((a, b) => a - b);
  }

  private empty(): HistogramData {
    return { sum: 0, count: 0, buckets: new Map(this.buckets.map((b) => [b, 0])) };
  }

  observe(labels: Labels, value: number): void {
    const key = this.key(labels);
    let data = this.values.get(key);

    if (!data) {
      data = this.empty();
      this.values.set(key, data);
    }

    data.sum += value;
    data.count += 1;

    for (const bucket of this.buckets) {
      if (value <= bucket) {
        data.buckets.set(bucket, (data.buckets.get(bucket) ?? 0) + 1);
      }
    }
  }

  get(labels: Labels = {}): HistogramValue {
    const data = this.values.get(this.key(labels)) ?? this.empty();
    return { sum: data.sum, count: data.count, buckets: new Map(data.buckets) };
  }

  reset(): void {
    this.values.clear();
  }

  toPrometheus(): string {
    const lines = this.header('histogram');
    const entries: Array<[string, HistogramData]> = this.values.size > 0
      ? Array.from(this.values.entries())
      : [['', this.empty()]];

    for (const [key, data] of entries) {
      const prefix = key ? `${key},` : '';
      for (const bucket of this.buckets) {
        lines.push(`${this.name}_bucket{${prefix}le="${bucket}"} ${data.buckets.get(bucket) ?? 0}`);
      }
      lines.push(`${this.name}_bucket{${prefix}le="+Inf"} ${data.count}`);
      lines.push(sample(`${this.name}_sum`, key, data.sum));
      lines.push(sample(`${this.name}_count`, key, data.count));
    }

    return lines.join('\n');
  }
}

/**
 * Gauge implementation
 */
class GaugeImpl extends MetricBase implements Gauge {
  private readonly values: Map<string, number> = new Map();

  set(labels: Labels, value: number): void {
    this.values.set(this.key(labels), value);
  }

  inc(labels: Labels = {}, value = 1): void {
    const key = this.key(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + value);
  }

  dec(labels: Labels = {}, value = 1): void {
    this.inc(labels, -value);
  }

  get(labels: Labels = {}): number {
    return this.values.get(this.key(labels)) ?? 0;
  }

  reset(): void {
    this.values.clear();
  }

  toPrometheus(): string {
    const lines = this.header('gauge');

    if (this.values.size === 0) {
      lines.push(`${this.name} 0`);
    } else {
      for (const [key, value] of this.values) {
        lines.push(sample(this.name, key, value));
      }
    }

    return lines.join('\n');
  }
}

// =============================================================================
// METRICS REGISTRY
// =============================================================================

/**
 * Metrics registry implementation. Creating a metric that already exists
 * returns the existing instrument.
 */
export class MetricsRegistryImpl implements MetricsRegistry {
  private readonly config: MetricsConfig;
  private readonly counters: Map<string, CounterImpl> = new Map();
  private readonly histograms: Map<string, HistogramImpl> = new Map();
  private readonly gauges: Map<string, GaugeImpl> = new Map();

  constructor(config: MetricsConfig) {
    this.config = config;
  }

  private fullName(name: string): string {
    return this.config.prefix ? `${this.config.prefix}_${name}` : name;
  }

  createCounter(name: string, help: string, labels: string[] = []): Counter {
    const fullName = this.fullName(name);
    let counter = this.counters.get(fullName);

    if (!counter) {
      counter = new CounterImpl(fullName, help, labels, this.config.defaultLabels);
      this.counters.set(fullName, counter);
    }

    return counter;
  }

  createHistogram(
    name: string,
    help: string,
    labels: string[] = [],
    buckets: number[] = this.config.histogramBuckets.latency
  ): Histogram {
    const fullName = this.fullName(name);
    let histogram = this.histograms.get(fullName);

    if (!histogram) {
      histogram = new HistogramImpl(fullName, help, labels, this.config.defaultLabels, buckets);
      this.histograms.set(fullName, histogram);
    }

    return histogram;
  }

  createGauge(name: string, help: string, labels: string[] = []): Gauge {
    const fullName = this.fullName(name);
    let gauge = this.gauges.get(fullName);

    if (!gauge) {
      gauge = new GaugeImpl(fullName, help, labels, this.config.defaultLabels);
      this.gauges.set(fullName, gauge);
    }

    return gauge;
  }

  getMetrics(): string {
    const sections: string[] = [];

    for (const counter of this.counters.values()) {
      sections.push(counter.toPrometheus());
    }
    for (const histogram of this.histograms.values()) {
      sections.push(histogram.toPrometheus());
    }
    for (const gauge of this.gauges.values()) {
      sections.push(gauge.toPrometheus());
    }

    return sections.join('\n\n');
  }

  reset(): void {
    for (const counter of this.counters.values()) counter.reset();
    for (const histogram of this.histograms.values()) histogram.reset();
    for (const gauge of this.gauges.values()) gauge.reset();
  }
}

// =============================================================================
// NO-OP REGISTRY
// =============================================================================

class NoOpCounter implements Counter {
  readonly name = '';
  readonly help = '';
  readonly labels: string[] = [];
  inc(): void {}
  get(): number { return 0; }
  reset(): void {}
}

class NoOpHistogram implements Histogram {
  readonly name = '';
  readonly help = '';
  readonly labels: string[] = [];
  readonly buckets: number[] = [];
  observe(): void {}
  get(): HistogramValue { return { sum: 0, count: 0, buckets: new Map() }; }
  reset(): void {}
}

class NoOpGauge implements Gauge {
  readonly name = '';
  readonly help = '';
  readonly labels: string[] = [];
  set(): void {}
  inc(): void {}
  dec(): void {}
  get(): number { return 0; }
  reset(): void {}
}

/**
 * Registry used when metrics are disabled
 */
export class NoOpMetricsRegistry implements MetricsRegistry {
  private static readonly noOpCounter = new NoOpCounter();
  private static readonly noOpHistogram = new NoOpHistogram();
  private static readonly noOpGauge = new NoOpGauge();

  createCounter(): Counter { return NoOpMetricsRegistry.noOpCounter; }
  createHistogram(): Histogram { return NoOpMetricsRegistry.noOpHistogram; }
  createGauge(): Gauge { return NoOpMetricsRegistry.noOpGauge; }
  getMetrics(): string { return ''; }
  reset(): void {}
}

/**
 * Create a metrics registry based on configuration
 */
export function createMetricsRegistry(config: MetricsConfig): MetricsRegistry {
  if (!config.enabled) {
    return new NoOpMetricsRegistry();
  }
  return new MetricsRegistryImpl(config);
}
