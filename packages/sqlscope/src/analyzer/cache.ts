/**
 * Analysis Result Cache
 *
 * Bounded fingerprint-keyed cache for analysis results.
 *
 * Features:
 * - Swappable eviction policy (LRU or LFU)
 * - Optional TTL
 * - Collision guard: each entry keeps the canonical text it was computed
 *   from, and a lookup whose canonical text differs is a miss
 * - Single-flight `getOrCompute`: concurrent callers for one key share a
 *   single in-flight computation; failures are not cached. A computation
 *   that returns synchronously is stored before `getOrCompute` returns.
 * - Hit/miss/eviction/computation statistics
 *
 * @example
 * ```typescript
 * const cache = new ResultCache<AnalysisResult>({ maxSize: 500, evictionPolicy: 'lfu' });
 * const result = await cache.getOrCompute(fingerprint, canonical, () => analyzeStatement(stmt));
 * ```
 *
 * @packageDocumentation
 */

import type { EvictionPolicyName } from '../config.js';
import { AnalyzerError, AnalyzerErrorCode } from '../errors/index.js';
import { createSilentLogger, type StructuredLogger } from '../logging/index.js';
import type { SqlScopeMetrics } from '../observability/index.js';

// =============================================================================
// EVICTION POLICIES
// =============================================================================

/**
 * Strategy deciding which key leaves a full cache
 */
export interface EvictionPolicy {
  readonly name: string;
  onInsert(key: string): void;
  onAccess(key: string): void;
  onRemove(key: string): void;
  /** Key to evict next, or undefined when empty */
  selectVictim(): string | undefined;
  clear(): void;
}

/**
 * Doubly-linked list node for LRU ordering
 */
interface LRUNode {
  key: string;
  prev: LRUNode | null;
  next: LRUNode | null;
}

/**
 * Least recently used: the tail of the recency list is the victim
 */
export class LruPolicy implements EvictionPolicy {
  readonly name = 'lru';
  private readonly nodes: Map<string, LRUNode> = new Map();
  private head: LRUNode | null = null;
  private tail: LRUNode | null = null;

  onInsert(key: string): void {
    const existing = this.nodes.get(key);
    if (existing) {
      this.moveToHead(existing);
      return;
    }
    const node: LRUNode = { key, prev: null, next: null };
    this.nodes.set(key, node);
    this.addToHead(node);
  }

  onAccess(key: string): void {
    const node = this.nodes.get(key);
    if (node) {
      this.moveToHead(node);
    }
  }

  onRemove(key: string): void {
    const node = this.nodes.get(key);
    if (node) {
      this.removeNode(node);
      this.nodes.delete(key);
    }
  }

  selectVictim(): string | undefined {
    return this.tail?.key;
  }

  clear(): void {
    this.nodes.clear();
    this.head = null;
    this.tail = null;
  }

  private addToHead(node: LRUNode): void {
    node.prev = null;
    node.next = this.head;

    if (this.head) {
      this.head.prev = node;
    }

    this.head = node;

    if (!this.tail) {
      this.tail = node;
    }
  }

  private removeNode(node: LRUNode): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }
  }

  private moveToHead(node: LRUNode): void {
    if (node === this.head) {
      return;
    }

    this.removeNode(node);
    this.addToHead(node);
  }
}

/**
 * Least frequently used: fewest accesses is the victim, oldest insertion
 * breaks ties
 */
export class LfuPolicy implements EvictionPolicy {
  readonly name = 'lfu';
  private readonly counts: Map<string, number> = new Map();

  onInsert(key: string): void {
    if (!this.counts.has(key)) {
      this.counts.set(key, 0);
    }
  }

  onAccess(key: string): void {
    const count = this.counts.get(key);
    if (count !== undefined) {
      this.counts.set(key, count + 1);
    }
  }

  onRemove(key: string): void {
    this.counts.delete(key);
  }

  selectVictim(): string | undefined {
    let victim: string | undefined;
    let minHits = Infinity;

    // Map iteration is insertion order, so the first minimum is the oldest
    for (const [key, hits] of this.counts) {
      if (hits < minHits) {
        minHits = hits;
        victim = key;
      }
    }

    return victim;
  }

  clear(): void {
    this.counts.clear();
  }
}

export function createEvictionPolicy(name: EvictionPolicyName): EvictionPolicy {
  return name === 'lfu' ? new LfuPolicy() : new LruPolicy();
}

// =============================================================================
// CACHE
// =============================================================================

export interface ResultCacheOptions {
  /** Maximum number of entries (default: 1000) */
  maxSize?: number;
  /** Time-to-live in milliseconds (0 = no TTL, default: 0) */
  ttlMs?: number;
  /** Enable/disable caching (default: true) */
  enabled?: boolean;
  /** Policy name or a custom policy (default: 'lru') */
  evictionPolicy?: EvictionPolicyName | EvictionPolicy;
  logger?: StructuredLogger;
  metrics?: SqlScopeMetrics;
  now?: () => number;
}

export interface ResultCacheStats {
  hits: number;
  misses: number;
  /** Current number of cached entries */
  size: number;
  maxSize: number;
  /** Hit rate percentage (0-100) */
  hitRate: number;
  evictions: number;
  expirations: number;
  /** Lookups whose key matched but canonical text did not */
  collisions: number;
  /** Times a compute function actually ran */
  computations: number;
  /** Callers that joined an in-flight computation */
  sharedComputations: number;
  /** Computations currently running */
  inFlight: number;
  enabled: boolean;
  evictionPolicy: string;
}

interface CacheEntry<V> {
  readonly canonical: string;
  readonly value: V;
  readonly cachedAt: number;
}

interface InFlight<V> {
  readonly canonical: string;
  readonly promise: Promise<V>;
}

export class ResultCache<V> {
  private readonly entries: Map<string, CacheEntry<V>> = new Map();
  private readonly inFlight: Map<string, InFlight<V>> = new Map();
  private readonly policy: EvictionPolicy;
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly enabled: boolean;
  private readonly logger: StructuredLogger;
  private readonly metrics?: SqlScopeMetrics;
  private readonly now: () => number;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private collisions = 0;
  private computations = 0;
  private sharedComputations = 0;

  // Bumped by clear(); computations started earlier do not write back
  private generation = 0;

  constructor(options: ResultCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.ttlMs = options.ttlMs ?? 0;
    this.enabled = (options.enabled ?? true) && this.maxSize > 0;
    const policy = options.evictionPolicy ?? 'lru';
    this.policy = typeof policy === 'string' ? createEvictionPolicy(policy) : policy;
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
    this.now = options.now ?? Date.now;
  }

  /**
   * Look up a value; a canonical mismatch or an expired entry is a miss
   */
  get(key: string, canonical: string): V | undefined {
    if (!this.enabled) {
      return undefined;
    }

    const entry = this.entries.get(key);

    if (!entry) {
      this.recordMiss(key);
      return undefined;
    }

    if (this.ttlMs > 0 && this.now() - entry.cachedAt > this.ttlMs) {
      this.delete(key);
      this.expirations++;
      this.recordMiss(key);
      return undefined;
    }

    if (entry.canonical !== canonical) {
      this.collisions++;
      this.misses++;
      this.metrics?.recordCacheRequest('collision');
      this.logger.warn('Fingerprint collision on {key}', { key });
      return undefined;
    }

    this.hits++;
    this.policy.onAccess(key);
    this.metrics?.recordCacheRequest('hit');
    this.logger.debug('Analysis cache hit for {key}', { key });
    return entry.value;
  }

  /**
   * Store a value; replaces any entry under the same key
   */
  set(key: string, canonical: string, value: V): void {
    if (!this.enabled) {
      return;
    }

    if (this.entries.has(key)) {
      this.policy.onRemove(key);
    } else {
      // Make room first so the incoming key is never its own victim
      while (this.entries.size >= this.maxSize) {
        const victim = this.policy.selectVictim();
        if (victim === undefined) break;
        this.delete(victim);
        this.evictions++;
      }
    }

    this.entries.set(key, Object.freeze({ canonical, value, cachedAt: this.now() }));
    this.policy.onInsert(key);
    this.metrics?.setCacheSize(this.entries.size);
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    return !(this.ttlMs > 0 && this.now() - entry.cachedAt > this.ttlMs);
  }

  delete(key: string): boolean {
    if (!this.entries.delete(key)) {
      return false;
    }
    this.policy.onRemove(key);
    this.metrics?.setCacheSize(this.entries.size);
    return true;
  }

  /**
   * Synchronous get-or-compute for callers that cannot await
   *
   * @throws AnalyzerError when an asynchronous computation for the same key
   * and canonical text is still running
   */
  getOrComputeSync(key: string, canonical: string, compute: () => V): V {
    const cached = this.get(key, canonical);
    if (cached !== undefined) {
      return cached;
    }

    if (this.inFlight.get(key)?.canonical === canonical) {
      throw new AnalyzerError(
        AnalyzerErrorCode.COMPUTATION_IN_FLIGHT,
        `Computation for ${key} is still in flight`,
        { context: { fingerprint: key } }
      ).withRecoveryHint('Await the pending asynchronous request instead');
    }

    this.computations++;
    const value = compute();
    this.set(key, canonical, value);
    return value;
  }

  /**
   * Return the cached value or compute it once. Callers arriving while a
   * computation for the same key and canonical text is running receive the
   * same promise. A rejected computation is not cached and the next caller
   * starts afresh.
   */
  getOrCompute(key: string, canonical: string, compute: () => V | Promise<V>): Promise<V> {
    const cached = this.get(key, canonical);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending && pending.canonical === canonical) {
      this.sharedComputations++;
      this.metrics?.recordCacheRequest('shared');
      return pending.promise;
    }

    this.computations++;
    let result: V | Promise<V>;
    try {
      result = compute();
    } catch (error) {
      return Promise.reject(error);
    }

    if (!(result instanceof Promise)) {
      this.set(key, canonical, result);
      return Promise.resolve(result);
    }

    const computing: Promise<V> = result;
    const generation = this.generation;
    const promise: Promise<V> = computing.then(
      (value) => {
        this.clearInFlight(key, promise);
        if (generation === this.generation) {
          this.set(key, canonical, value);
        }
        return value;
      },
      (error: unknown) => {
        this.clearInFlight(key, promise);
        throw error;
      }
    );

    this.inFlight.set(key, { canonical, promise });
    return promise;
  }

  private clearInFlight(key: string, promise: Promise<V>): void {
    if (this.inFlight.get(key)?.promise === promise) {
      this.inFlight.delete(key);
    }
  }

  private recordMiss(key: string): void {
    this.misses++;
    this.metrics?.recordCacheRequest('miss');
    this.logger.debug('Analysis cache miss for {key}', { key });
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Drop every entry and reset statistics. Computations still running keep
   * their promise for the callers already waiting, but their results are not
   * stored.
   */
  clear(): void {
    this.generation++;
    this.inFlight.clear();
    this.entries.clear();
    this.policy.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
    this.collisions = 0;
    this.computations = 0;
    this.sharedComputations = 0;
    this.metrics?.setCacheSize(0);
  }

  getStats(): ResultCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxSize: this.maxSize,
      hitRate: total > 0 ? (this.hits / total) * 100 : 0,
      evictions: this.evictions,
      expirations: this.expirations,
      collisions: this.collisions,
      computations: this.computations,
      sharedComputations: this.sharedComputations,
      inFlight: this.inFlight.size,
      enabled: this.enabled,
      evictionPolicy: this.policy.name,
    };
  }
}
