/**
 * SQLScope Configuration
 *
 * Zod schemas for parser and analyzer options. Every public constructor runs
 * its options through these schemas; failures raise ConfigurationError with
 * one entry per offending field.
 *
 * @packageDocumentation
 */

import { z, type ZodError } from 'zod';
import { ConfigurationError } from './errors/index.js';

// =============================================================================
// Suggestion Rules
// =============================================================================

export const SuggestionKindSchema = z.enum([
  'COMPLEX_QUERY',
  'SELECT_STAR',
  'MISSING_WHERE',
  'CARTESIAN_PRODUCT',
  'LEADING_WILDCARD',
  'NON_SARGABLE_PREDICATE',
]);

export type SuggestionKind = z.infer<typeof SuggestionKindSchema>;

export const SUGGESTION_KINDS: readonly SuggestionKind[] = SuggestionKindSchema.options;

/**
 * Per-rule switches; every rule is on unless set to false
 */
export const RuleSwitchesSchema = z
  .object({
    COMPLEX_QUERY: z.boolean().default(true),
    SELECT_STAR: z.boolean().default(true),
    MISSING_WHERE: z.boolean().default(true),
    CARTESIAN_PRODUCT: z.boolean().default(true),
    LEADING_WILDCARD: z.boolean().default(true),
    NON_SARGABLE_PREDICATE: z.boolean().default(true),
  })
  .strict();

export type RuleSwitches = z.infer<typeof RuleSwitchesSchema>;

// =============================================================================
// Parser Configuration
// =============================================================================

export const ParserConfigSchema = z
  .object({
    /** Synchronize and continue after a failed statement */
    recover: z.boolean().default(true),
    /** Stop parsing a batch once this many diagnostics are recorded */
    maxErrors: z.number().int().positive().default(100),
    /** Draw hot node shapes from free lists */
    pooling: z.boolean().default(true),
  })
  .strict();

export type ParserConfig = z.infer<typeof ParserConfigSchema>;
export type ParserConfigInput = z.input<typeof ParserConfigSchema>;

// =============================================================================
// Analyzer Configuration
// =============================================================================

export const EvictionPolicyNameSchema = z.enum(['lru', 'lfu']);

export type EvictionPolicyName = z.infer<typeof EvictionPolicyNameSchema>;

export const CacheConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxSize: z.number().int().positive().default(1000),
    /** 0 disables expiry */
    ttlMs: z.number().int().nonnegative().default(0),
    evictionPolicy: EvictionPolicyNameSchema.default('lru'),
  })
  .strict();

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const AnalyzerConfigSchema = z
  .object({
    /** COMPLEX_QUERY fires when the join count exceeds this */
    complexJoinThreshold: z.number().int().nonnegative().default(3),
    rules: RuleSwitchesSchema.default({}),
    cache: CacheConfigSchema.default({}),
  })
  .strict();

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;

// =============================================================================
// Resolution
// =============================================================================

function formatIssues(error: ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((part) => part !== undefined).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function resolve<S extends z.ZodTypeAny>(schema: S, input: unknown, prefix?: string): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error, prefix), { cause: result.error });
  }
  return result.data;
}

/**
 * Validate parser options and fill defaults
 *
 * @throws ConfigurationError
 */
export function resolveParserConfig(input?: ParserConfigInput): ParserConfig {
  return resolve(ParserConfigSchema, input);
}

/**
 * Validate analyzer options and fill defaults
 *
 * @throws ConfigurationError
 */
export function resolveAnalyzerConfig(input?: AnalyzerConfigInput): AnalyzerConfig {
  return resolve(AnalyzerConfigSchema, input);
}

export const DEFAULT_PARSER_CONFIG: Readonly<ParserConfig> = Object.freeze(resolveParserConfig());
export const DEFAULT_ANALYZER_CONFIG: Readonly<AnalyzerConfig> = Object.freeze(resolveAnalyzerConfig());

// =============================================================================
// Environment
// =============================================================================

export interface SqlScopeConfig {
  parser: ParserConfig;
  analyzer: AnalyzerConfig;
}

/**
 * Environment variables read by loadConfigFromEnv
 */
export const ENV_VARS = {
  parserRecover: 'SQLSCOPE_PARSER_RECOVER',
  parserMaxErrors: 'SQLSCOPE_PARSER_MAX_ERRORS',
  parserPooling: 'SQLSCOPE_PARSER_POOLING',
  complexJoinThreshold: 'SQLSCOPE_COMPLEX_JOIN_THRESHOLD',
  disabledRules: 'SQLSCOPE_DISABLED_RULES',
  cacheEnabled: 'SQLSCOPE_CACHE_ENABLED',
  cacheMaxSize: 'SQLSCOPE_CACHE_MAX_SIZE',
  cacheTtlMs: 'SQLSCOPE_CACHE_TTL_MS',
  cacheEvictionPolicy: 'SQLSCOPE_CACHE_EVICTION_POLICY',
} as const;

type Env = Record<string, string | undefined>;

/**
 * Unrecognized spellings pass through as strings so the schema reports them
 */
function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return value;
}

function envInteger(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined;
  return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : value;
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value.trim();
}

function envRules(value: string | undefined): Record<string, boolean> | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const rules: Record<string, boolean> = {};
  for (const name of value.split(',')) {
    const trimmed = name.trim().toUpperCase();
    if (trimmed) rules[trimmed] = false;
  }
  return rules;
}

/**
 * Build a complete configuration from `SQLSCOPE_*` environment variables.
 * Unset variables take the defaults.
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv({ SQLSCOPE_CACHE_EVICTION_POLICY: 'lfu' });
 * config.analyzer.cache.evictionPolicy; // 'lfu'
 * ```
 *
 * @throws ConfigurationError
 */
export function loadConfigFromEnv(env: Env = process.env): SqlScopeConfig {
  const parser = {
    recover: envBoolean(env[ENV_VARS.parserRecover]),
    maxErrors: envInteger(env[ENV_VARS.parserMaxErrors]),
    pooling: envBoolean(env[ENV_VARS.parserPooling]),
  };

  const analyzer = {
    complexJoinThreshold: envInteger(env[ENV_VARS.complexJoinThreshold]),
    rules: envRules(env[ENV_VARS.disabledRules]),
    cache: {
      enabled: envBoolean(env[ENV_VARS.cacheEnabled]),
      maxSize: envInteger(env[ENV_VARS.cacheMaxSize]),
      ttlMs: envInteger(env[ENV_VARS.cacheTtlMs]),
      evictionPolicy: envString(env[ENV_VARS.cacheEvictionPolicy]),
    },
  };

  const issues: string[] = [];
  const parsedParser = ParserConfigSchema.safeParse(parser);
  const parsedAnalyzer = AnalyzerConfigSchema.safeParse(analyzer);

  if (!parsedParser.success) issues.push(...formatIssues(parsedParser.error, 'parser'));
  if (!parsedAnalyzer.success) issues.push(...formatIssues(parsedAnalyzer.error, 'analyzer'));

  if (!parsedParser.success || !parsedAnalyzer.success) {
    throw new ConfigurationError(issues);
  }

  return { parser: parsedParser.data, analyzer: parsedAnalyzer.data };
}
