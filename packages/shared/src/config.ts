/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * `config` carries process-level settings (Redis, queues, LLM); the pipeline
 * itself runs on an immutable EngineConfig built by loadEngineConfig().
 */

import { ConfigurationError } from './errors';
import type { PassName } from './types';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;
  metricsPort: number;

  // LLM
  llmModel: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),

  // LLM
  llmModel: process.env.LLM_MODEL || 'gpt-4o-mini',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',
};

// ============================================================================
// Engine Configuration
// ============================================================================

export interface SegmentationPolicy {
  readonly targetSegmentChars: number;
  readonly maxSegmentChars: number;
  readonly minSegmentChars: number;
  readonly overlapChars: number;
}

export interface SizeTierPolicy {
  /** Documents up to this length use layout-aware segmentation. */
  readonly smallDocumentMaxChars: number;
  /** Documents above this length also skip expensive passes. */
  readonly mediumDocumentMaxChars: number;
}

export interface ClassifierPolicy {
  readonly exclusionMaxChars: number;
  readonly minAttestationHits: number;
}

export interface CircuitBreakerPolicy {
  readonly failureThreshold: number;
  readonly recoveryTimeMs: number;
}

export interface OrchestrationPolicy {
  readonly concurrency: number;
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
  readonly retryMalformed: boolean;
  readonly largeDocumentSegmentThreshold: number;
  readonly runBudgetMs: number;
  readonly circuitBreaker: CircuitBreakerPolicy;
}

export interface AdapterPolicy {
  readonly maxCallChars: number;
  readonly passTimeoutsMs: Readonly<Record<PassName, number>>;
}

export interface ScoringPolicy {
  readonly segmentWeight: number;
  readonly fieldWeight: number;
}

export interface EngineConfig {
  readonly segmentation: SegmentationPolicy;
  readonly sizeTiers: SizeTierPolicy;
  readonly classifier: ClassifierPolicy;
  readonly orchestration: OrchestrationPolicy;
  readonly adapter: AdapterPolicy;
  readonly scoring: ScoringPolicy;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = deepFreeze({
  segmentation: {
    targetSegmentChars: 5000,
    maxSegmentChars: 10000,
    minSegmentChars: 500,
    overlapChars: 200,
  },
  sizeTiers: {
    smallDocumentMaxChars: 20000,
    mediumDocumentMaxChars: 150000,
  },
  classifier: {
    exclusionMaxChars: 1500,
    minAttestationHits: 2,
  },
  orchestration: {
    concurrency: 5,
    maxRetries: 2,
    backoffBaseMs: 500,
    backoffMaxMs: 8000,
    retryMalformed: true,
    largeDocumentSegmentThreshold: 20,
    runBudgetMs: 240000,
    circuitBreaker: {
      failureThreshold: 8,
      recoveryTimeMs: 30000,
    },
  },
  adapter: {
    maxCallChars: 8000,
    passTimeoutsMs: {
      direct_extraction: 15000,
      cross_reference: 25000,
      implicit_facts: 30000,
      calculation: 45000,
    },
  },
  scoring: {
    segmentWeight: 0.4,
    fieldWeight: 0.6,
  },
});

type Env = Readonly<Record<string, string | undefined>>;

function intFrom(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`, key);
  }
  return value;
}

function floatFrom(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseFloat(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, key);
  }
  return value;
}

/**
 * Build the engine configuration from environment variables, falling back
 * to DEFAULT_ENGINE_CONFIG. Throws ConfigurationError when the result is
 * inconsistent.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return resolveEngineConfig({
    segmentation: {
      targetSegmentChars: intFrom(env, 'SEGMENT_TARGET_CHARS', d.segmentation.targetSegmentChars),
      maxSegmentChars: intFrom(env, 'SEGMENT_MAX_CHARS', d.segmentation.maxSegmentChars),
      minSegmentChars: intFrom(env, 'SEGMENT_MIN_CHARS', d.segmentation.minSegmentChars),
      overlapChars: intFrom(env, 'SEGMENT_OVERLAP_CHARS', d.segmentation.overlapChars),
    },
    sizeTiers: {
      smallDocumentMaxChars: intFrom(env, 'SMALL_DOCUMENT_MAX_CHARS', d.sizeTiers.smallDocumentMaxChars),
      mediumDocumentMaxChars: intFrom(env, 'MEDIUM_DOCUMENT_MAX_CHARS', d.sizeTiers.mediumDocumentMaxChars),
    },
    classifier: {
      exclusionMaxChars: intFrom(env, 'EXCLUSION_MAX_CHARS', d.classifier.exclusionMaxChars),
      minAttestationHits: intFrom(env, 'MIN_ATTESTATION_HITS', d.classifier.minAttestationHits),
    },
    orchestration: {
      concurrency: intFrom(env, 'EXTRACTION_CONCURRENCY', d.orchestration.concurrency),
      maxRetries: intFrom(env, 'EXTRACTION_MAX_RETRIES', d.orchestration.maxRetries),
      backoffBaseMs: intFrom(env, 'EXTRACTION_BACKOFF_BASE_MS', d.orchestration.backoffBaseMs),
      backoffMaxMs: intFrom(env, 'EXTRACTION_BACKOFF_MAX_MS', d.orchestration.backoffMaxMs),
      retryMalformed: (env.EXTRACTION_RETRY_MALFORMED || 'true') === 'true',
      largeDocumentSegmentThreshold: intFrom(
        env,
        'LARGE_DOCUMENT_SEGMENT_THRESHOLD',
        d.orchestration.largeDocumentSegmentThreshold
      ),
      runBudgetMs: intFrom(env, 'RUN_BUDGET_MS', d.orchestration.runBudgetMs),
      circuitBreaker: {
        failureThreshold: intFrom(env, 'CIRCUIT_FAILURE_THRESHOLD', d.orchestration.circuitBreaker.failureThreshold),
        recoveryTimeMs: intFrom(env, 'CIRCUIT_RECOVERY_MS', d.orchestration.circuitBreaker.recoveryTimeMs),
      },
    },
    adapter: {
      maxCallChars: intFrom(env, 'MAX_CALL_CHARS', d.adapter.maxCallChars),
      passTimeoutsMs: {
        direct_extraction: intFrom(env, 'PASS_TIMEOUT_DIRECT_MS', d.adapter.passTimeoutsMs.direct_extraction),
        cross_reference: intFrom(env, 'PASS_TIMEOUT_CROSS_REFERENCE_MS', d.adapter.passTimeoutsMs.cross_reference),
        implicit_facts: intFrom(env, 'PASS_TIMEOUT_IMPLICIT_MS', d.adapter.passTimeoutsMs.implicit_facts),
        calculation: intFrom(env, 'PASS_TIMEOUT_CALCULATION_MS', d.adapter.passTimeoutsMs.calculation),
      },
    },
    scoring: {
      segmentWeight: floatFrom(env, 'SCORE_SEGMENT_WEIGHT', d.scoring.segmentWeight),
      fieldWeight: floatFrom(env, 'SCORE_FIELD_WEIGHT', d.scoring.fieldWeight),
    },
  });
}

export interface EngineConfigOverrides {
  segmentation?: Partial<SegmentationPolicy>;
  sizeTiers?: Partial<SizeTierPolicy>;
  classifier?: Partial<ClassifierPolicy>;
  orchestration?: Partial<Omit<OrchestrationPolicy, 'circuitBreaker'>> & {
    circuitBreaker?: Partial<CircuitBreakerPolicy>;
  };
  adapter?: Partial<Omit<AdapterPolicy, 'passTimeoutsMs'>> & {
    passTimeoutsMs?: Partial<Record<PassName, number>>;
  };
  scoring?: Partial<ScoringPolicy>;
}

/**
 * Merge overrides onto a base configuration, validate and freeze the result.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  const merged: EngineConfig = {
    segmentation: { ...base.segmentation, ...overrides.segmentation },
    sizeTiers: { ...base.sizeTiers, ...overrides.sizeTiers },
    classifier: { ...base.classifier, ...overrides.classifier },
    orchestration: {
      ...base.orchestration,
      ...overrides.orchestration,
      circuitBreaker: {
        ...base.orchestration.circuitBreaker,
        ...overrides.orchestration?.circuitBreaker,
      },
    },
    adapter: {
      ...base.adapter,
      ...overrides.adapter,
      passTimeoutsMs: {
        ...base.adapter.passTimeoutsMs,
        ...overrides.adapter?.passTimeoutsMs,
      },
    },
    scoring: { ...base.scoring, ...overrides.scoring },
  };
  validateEngineConfig(merged);
  return deepFreeze(merged);
}

function requirePositiveInt(value: number, setting: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${setting} must be a positive integer, got ${value}`, setting);
  }
}

function requireNonNegativeInt(value: number, setting: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${setting} must be a non-negative integer, got ${value}`, setting);
  }
}

export function validateEngineConfig(engine: EngineConfig): void {
  const { segmentation, sizeTiers, classifier, orchestration, adapter, scoring } = engine;

  requirePositiveInt(segmentation.targetSegmentChars, 'segmentation.targetSegmentChars');
  requirePositiveInt(segmentation.maxSegmentChars, 'segmentation.maxSegmentChars');
  requireNonNegativeInt(segmentation.minSegmentChars, 'segmentation.minSegmentChars');
  requireNonNegativeInt(segmentation.overlapChars, 'segmentation.overlapChars');
  if (segmentation.targetSegmentChars > segmentation.maxSegmentChars) {
    throw new ConfigurationError(
      `targetSegmentChars (${segmentation.targetSegmentChars}) exceeds maxSegmentChars (${segmentation.maxSegmentChars})`,
      'segmentation.targetSegmentChars'
    );
  }
  if (segmentation.minSegmentChars > segmentation.targetSegmentChars) {
    throw new ConfigurationError(
      `minSegmentChars (${segmentation.minSegmentChars}) exceeds targetSegmentChars (${segmentation.targetSegmentChars})`,
      'segmentation.minSegmentChars'
    );
  }

  requirePositiveInt(sizeTiers.smallDocumentMaxChars, 'sizeTiers.smallDocumentMaxChars');
  if (sizeTiers.mediumDocumentMaxChars < sizeTiers.smallDocumentMaxChars) {
    throw new ConfigurationError(
      'mediumDocumentMaxChars must not be below smallDocumentMaxChars',
      'sizeTiers.mediumDocumentMaxChars'
    );
  }

  requireNonNegativeInt(classifier.exclusionMaxChars, 'classifier.exclusionMaxChars');
  requirePositiveInt(classifier.minAttestationHits, 'classifier.minAttestationHits');

  requirePositiveInt(orchestration.concurrency, 'orchestration.concurrency');
  requireNonNegativeInt(orchestration.maxRetries, 'orchestration.maxRetries');
  requireNonNegativeInt(orchestration.backoffBaseMs, 'orchestration.backoffBaseMs');
  if (orchestration.backoffMaxMs < orchestration.backoffBaseMs) {
    throw new ConfigurationError('backoffMaxMs must not be below backoffBaseMs', 'orchestration.backoffMaxMs');
  }
  requirePositiveInt(orchestration.largeDocumentSegmentThreshold, 'orchestration.largeDocumentSegmentThreshold');
  requirePositiveInt(orchestration.runBudgetMs, 'orchestration.runBudgetMs');
  requirePositiveInt(orchestration.circuitBreaker.failureThreshold, 'orchestration.circuitBreaker.failureThreshold');
  requireNonNegativeInt(orchestration.circuitBreaker.recoveryTimeMs, 'orchestration.circuitBreaker.recoveryTimeMs');

  requirePositiveInt(adapter.maxCallChars, 'adapter.maxCallChars');
  for (const [pass, timeoutMs] of Object.entries(adapter.passTimeoutsMs)) {
    requirePositiveInt(timeoutMs, `adapter.passTimeoutsMs.${pass}`);
  }

  if (scoring.segmentWeight < 0 || scoring.fieldWeight < 0 || scoring.segmentWeight + scoring.fieldWeight <= 0) {
    throw new ConfigurationError('score weights must be non-negative and not both zero', 'scoring');
  }
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
