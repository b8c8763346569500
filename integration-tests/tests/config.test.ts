/**
 * Engine configuration and pass ordering tests
 */

import {
  CALCULATION_PASS,
  CROSS_REFERENCE_PASS,
  ConfigurationError,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_PASSES,
  DIRECT_EXTRACTION_PASS,
  IMPLICIT_FACTS_PASS,
  PipelineController,
  loadEngineConfig,
  orderPasses,
  resolveEngineConfig,
  selectRunStrategy,
} from '@leasex/shared';
import { FakeExtractionService } from './helpers';

describe('loadEngineConfig', () => {
  it('should fall back to defaults for unset variables', () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should read overrides from the environment', () => {
    const engine = loadEngineConfig({
      SEGMENT_TARGET_CHARS: '3000',
      EXTRACTION_CONCURRENCY: '3',
      EXTRACTION_RETRY_MALFORMED: 'false',
      PASS_TIMEOUT_CALCULATION_MS: '60000',
      SCORE_FIELD_WEIGHT: '0.5',
    });

    expect(engine.segmentation.targetSegmentChars).toBe(3000);
    expect(engine.orchestration.concurrency).toBe(3);
    expect(engine.orchestration.retryMalformed).toBe(false);
    expect(engine.adapter.passTimeoutsMs.calculation).toBe(60000);
    expect(engine.adapter.passTimeoutsMs.direct_extraction).toBe(15000);
    expect(engine.scoring).toEqual({ segmentWeight: 0.4, fieldWeight: 0.5 });
  });

  it('should reject a non-numeric value', () => {
    expect(() => loadEngineConfig({ SEGMENT_TARGET_CHARS: 'abc' })).toThrow(
      new ConfigurationError('SEGMENT_TARGET_CHARS must be an integer, got "abc"')
    );
  });

  it('should reject a target above the maximum segment size', () => {
    expect(() => loadEngineConfig({ SEGMENT_TARGET_CHARS: '12000' })).toThrow(ConfigurationError);
  });

  it('should default to pass timeouts that grow along the pass order', () => {
    const timeouts = DEFAULT_PASSES.map((pass) => DEFAULT_ENGINE_CONFIG.adapter.passTimeoutsMs[pass.name]);
    expect(timeouts).toEqual([15000, 25000, 30000, 45000]);
  });

  it('should return a frozen configuration', () => {
    const engine = loadEngineConfig({});
    expect(Object.isFrozen(engine)).toBe(true);
    expect(Object.isFrozen(engine.orchestration.circuitBreaker)).toBe(true);
  });
});

describe('resolveEngineConfig', () => {
  it('should merge nested overrides onto the defaults', () => {
    const engine = resolveEngineConfig({
      orchestration: { maxRetries: 0, circuitBreaker: { failureThreshold: 3 } },
      adapter: { passTimeoutsMs: { implicit_facts: 100 } },
    });

    expect(engine.orchestration.maxRetries).toBe(0);
    expect(engine.orchestration.concurrency).toBe(5);
    expect(engine.orchestration.circuitBreaker).toEqual({ failureThreshold: 3, recoveryTimeMs: 30000 });
    expect(engine.adapter.passTimeoutsMs.implicit_facts).toBe(100);
    expect(engine.adapter.passTimeoutsMs.cross_reference).toBe(25000);
  });

  it('should name the offending setting', () => {
    try {
      resolveEngineConfig({ orchestration: { concurrency: 0 } });
      throw new Error('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        setting: 'orchestration.concurrency',
        message: 'orchestration.concurrency must be a positive integer, got 0',
      });
    }
  });

  it('should reject score weights that are both zero', () => {
    expect(() => resolveEngineConfig({ scoring: { segmentWeight: 0, fieldWeight: 0 } })).toThrow(
      'score weights must be non-negative and not both zero'
    );
  });
});

describe('selectRunStrategy', () => {
  it('should pick the strategy for each size tier', () => {
    const tiers = DEFAULT_ENGINE_CONFIG.sizeTiers;
    expect(selectRunStrategy(20000, tiers)).toEqual({ tier: 'small', segmentation: 'layout', skipExpensivePasses: false });
    expect(selectRunStrategy(20001, tiers)).toEqual({
      tier: 'medium',
      segmentation: 'paragraph',
      skipExpensivePasses: false,
    });
    expect(selectRunStrategy(150001, tiers)).toEqual({
      tier: 'large',
      segmentation: 'paragraph',
      skipExpensivePasses: true,
    });
  });
});

describe('orderPasses', () => {
  it('should place every pass after its dependencies, keeping the given order otherwise', () => {
    const ordered = orderPasses([CALCULATION_PASS, CROSS_REFERENCE_PASS, IMPLICIT_FACTS_PASS, DIRECT_EXTRACTION_PASS]);
    expect(ordered.map((p) => p.name)).toEqual(['direct_extraction', 'cross_reference', 'calculation', 'implicit_facts']);
  });

  it('should reject an unknown dependency', () => {
    expect(() => orderPasses([CROSS_REFERENCE_PASS])).toThrow(
      'Pass cross_reference depends on unknown pass direct_extraction'
    );
  });

  it('should reject a dependency cycle', () => {
    const cyclic = { ...DIRECT_EXTRACTION_PASS, dependsOn: ['calculation' as const] };
    expect(() => orderPasses([cyclic, CALCULATION_PASS, CROSS_REFERENCE_PASS])).toThrow(
      'Pass dependency cycle among: direct_extraction, calculation, cross_reference'
    );
  });

  it('should reject duplicate passes', () => {
    expect(() => orderPasses([DIRECT_EXTRACTION_PASS, DIRECT_EXTRACTION_PASS])).toThrow(
      'Duplicate pass: direct_extraction'
    );
  });
});

describe('PipelineController construction', () => {
  it('should throw ConfigurationError for an invalid pass set', () => {
    const service = new FakeExtractionService(async () => ({ fields: [] }));
    expect(
      () => new PipelineController({ service, config: DEFAULT_ENGINE_CONFIG, passes: [CROSS_REFERENCE_PASS] })
    ).toThrow(ConfigurationError);
  });
});
