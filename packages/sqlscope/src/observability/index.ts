/**
 * Observability Module
 *
 * @packageDocumentation
 */

export * from './types.js';
export { MetricsRegistryImpl, NoOpMetricsRegistry, createMetricsRegistry } from './metrics.js';
export { SqlScopeMetrics, type CacheRequestResult, type ParseObservation } from './instruments.js';
