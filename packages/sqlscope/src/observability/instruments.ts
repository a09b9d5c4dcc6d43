/**
 * Parser and analyzer instruments
 *
 * @packageDocumentation
 */

import { createMetricsRegistry } from './metrics.js';
import { DEFAULT_METRICS_CONFIG, type Counter, type Gauge, type Histogram, type MetricsRegistry } from './types.js';

export type CacheRequestResult = 'hit' | 'miss' | 'shared' | 'collision';

export interface ParseObservation {
  statements: number;
  errorCodes: readonly string[];
  durationMs: number;
  tokensProcessed: number;
  cancelled: boolean;
}

/**
 * The fixed set of series exported by parsers and analyzers:
 *
 * - `sqlscope_parse_total{outcome}`
 * - `sqlscope_parse_errors_total{code}`
 * - `sqlscope_parse_duration_seconds`
 * - `sqlscope_tokens_processed_total`
 * - `sqlscope_analysis_cache_requests_total{result}`
 * - `sqlscope_analysis_cache_size`
 */
export class SqlScopeMetrics {
  readonly registry: MetricsRegistry;
  private readonly parseTotal: Counter;
  private readonly parseErrors: Counter;
  private readonly parseDuration: Histogram;
  private readonly tokensProcessed: Counter;
  private readonly cacheRequests: Counter;
  private readonly cacheSize: Gauge;

  constructor(registry: MetricsRegistry = createMetricsRegistry(DEFAULT_METRICS_CONFIG)) {
    this.registry = registry;
    this.parseTotal = registry.createCounter('parse_total', 'SQL batches parsed', ['outcome']);
    this.parseErrors = registry.createCounter('parse_errors_total', 'Parse diagnostics recorded', ['code']);
    this.parseDuration = registry.createHistogram('parse_duration_seconds', 'Time spent parsing a batch');
    this.tokensProcessed = registry.createCounter('tokens_processed_total', 'Tokens consumed by the parser');
    this.cacheRequests = registry.createCounter(
      'analysis_cache_requests_total',
      'Analysis cache lookups',
      ['result']
    );
    this.cacheSize = registry.createGauge('analysis_cache_size', 'Entries held by the analysis cache');
  }

  recordParse(observation: ParseObservation): void {
    const outcome = observation.cancelled
      ? 'cancelled'
      : observation.errorCodes.length > 0 ? 'error' : 'success';

    this.parseTotal.inc({ outcome });
    for (const code of observation.errorCodes) {
      this.parseErrors.inc({ code });
    }
    this.parseDuration.observe({}, observation.durationMs / 1000);
    this.tokensProcessed.inc({}, observation.tokensProcessed);
  }

  recordCacheRequest(result: CacheRequestResult): void {
    this.cacheRequests.inc({ result });
  }

  setCacheSize(size: number): void {
    this.cacheSize.set({}, size);
  }
}
