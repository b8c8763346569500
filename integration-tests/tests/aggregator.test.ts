/**
 * Aggregation unit tests
 */

import {
  DEFAULT_PASSES,
  DIRECT_EXTRACTION_PASS,
  ExtractionCallAdapter,
  aggregateResults,
  buildPassContext,
  normalizeFieldName,
  normalizeValue,
  type ExpectedFieldSets,
  type ExtractedField,
  type ExtractionResult,
  type PassContext,
  type PassName,
  type ScoringPolicy,
  type SegmentClassification,
} from '@leasex/shared';
import { FakeExtractionService, field, makeSegment } from './helpers';

const weights: ScoringPolicy = { segmentWeight: 0.4, fieldWeight: 0.6 };

const expectedFields: ExpectedFieldSets = {
  general: ['financial.base_rent', 'parties.tenant_name'],
  retail: ['financial.base_rent', 'financial.percentage_rent', 'parties.tenant_name', 'use.permitted_use'],
  office: [],
  industrial: ['financial.base_rent'],
};

const segments = [
  makeSegment({ text: 'a'.repeat(100), index: 0, startOffset: 0, pageHint: { start: 1, end: 1 } }),
  makeSegment({ text: 'b'.repeat(100), index: 1, startOffset: 100, pageHint: { start: 1, end: 2 } }),
  makeSegment({ text: 'c'.repeat(100), index: 2, startOffset: 200, excluded: true, classification: 'signature' }),
];

function f(value: string | number | boolean, category: SegmentClassification, confidence = 0.9, excerpt = 'excerpt'): ExtractedField {
  return { value, category, confidence, excerpt };
}

function ok(segmentId: string, passName: PassName, fields: Record<string, ExtractedField>): ExtractionResult {
  return { segmentId, passName, status: 'ok', fields, warnings: [], attempts: 1, truncated: false, durationMs: 1 };
}

function failed(segmentId: string, passName: PassName): ExtractionResult {
  return {
    segmentId,
    passName,
    status: 'timeout',
    fields: {},
    warnings: [],
    attempts: 3,
    truncated: false,
    durationMs: 1,
    error: { kind: 'CallTimeout', message: 'timed out', retryable: true },
  };
}

function aggregate(results: ExtractionResult[], declaredCategory: keyof ExpectedFieldSets = 'general') {
  return aggregateResults({ results, segments, passes: DEFAULT_PASSES, declaredCategory, weights, expectedFields });
}

describe('aggregateResults', () => {
  it('should merge equal values from several segments into one field', () => {
    const extraction = aggregate([
      ok('seg_0001', 'direct_extraction', { base_rent: f('$12,500.00', 'financial', 0.8) }),
      ok('seg_0002', 'direct_extraction', { base_rent: f('12500', 'financial', 0.95) }),
    ]);

    const baseRent = extraction.fieldsByCategory.financial?.base_rent;
    expect(baseRent?.value).toBe('$12,500.00');
    expect(baseRent?.normalizedValue).toBe('12500');
    expect(baseRent?.confidence).toBe(0.95);
    expect(baseRent?.sources.map((s) => [s.segmentId, s.startOffset, s.endOffset, s.pageHint])).toEqual([
      ['seg_0001', 0, 100, { start: 1, end: 1 }],
      ['seg_0002', 100, 200, { start: 1, end: 2 }],
    ]);
    expect(extraction.traceability['financial.base_rent']).toEqual(['seg_0001', 'seg_0002']);
    expect(extraction.conflicts).toEqual([]);
  });

  it('should resolve conflicting values by confidence and record the conflict', () => {
    const extraction = aggregate([
      ok('seg_0001', 'direct_extraction', { tenant_name: f('Bluefin Outfitters Inc.', 'parties', 0.7) }),
      ok('seg_0002', 'direct_extraction', { tenant_name: f('Bluefin Outfitters', 'parties', 0.9) }),
    ]);

    expect(extraction.fieldsByCategory.parties?.tenant_name.value).toBe('Bluefin Outfitters');
    expect(extraction.conflicts).toHaveLength(1);
    expect(extraction.conflicts[0].fieldKey).toBe('parties.tenant_name');
    expect(extraction.conflicts[0].passName).toBe('direct_extraction');
    expect(extraction.conflicts[0].resolvedValue).toBe('Bluefin Outfitters');
    expect(extraction.conflicts[0].candidates.map((c) => c.value)).toEqual(['Bluefin Outfitters Inc.', 'Bluefin Outfitters']);
    expect(extraction.traceability['parties.tenant_name']).toEqual(['seg_0002']);
  });

  it('should record one conflict when differently classified segments disagree on a field', async () => {
    const rentSegments = [
      makeSegment({ text: 'Base Rent is $12,500 per month.', index: 0, classification: 'financial' }),
      makeSegment({ text: 'During the term rent is $13,000.', index: 1, startOffset: 100, classification: 'term' }),
    ];
    const service = new FakeExtractionService(async (request) => ({
      fields:
        request.segmentId === 'seg_0001'
          ? [field('base_rent', '$12,500', 'unclassified', 0.8, 'Base Rent is $12,500')]
          : [field('base_rent', '$13,000', 'unclassified', 0.9, 'rent is $13,000')],
    }));
    const adapter = new ExtractionCallAdapter(service, {
      policy: {
        maxCallChars: 1000,
        passTimeoutsMs: { direct_extraction: 200, cross_reference: 200, implicit_facts: 200, calculation: 200 },
      },
      documentCategory: 'general',
    });
    const context: PassContext = { passNames: [], fields: {} };
    const results = [
      await adapter.call(rentSegments[0], DIRECT_EXTRACTION_PASS, context),
      await adapter.call(rentSegments[1], DIRECT_EXTRACTION_PASS, context),
    ];

    const extraction = aggregateResults({
      results,
      segments: rentSegments,
      passes: DEFAULT_PASSES,
      declaredCategory: 'general',
      weights,
      expectedFields,
    });

    expect(results.map((r) => r.fields.base_rent.category)).toEqual(['financial', 'term']);
    expect(extraction.conflicts).toHaveLength(1);
    expect(extraction.conflicts[0].fieldKey).toBe('term.base_rent');
    expect(extraction.conflicts[0].resolvedValue).toBe('$13,000');
    expect(extraction.conflicts[0].candidates.map((c) => c.value)).toEqual(['$12,500', '$13,000']);
    expect(Object.keys(extraction.fieldsByCategory)).toEqual(['term']);
    expect(extraction.fieldsByCategory.term?.base_rent.value).toBe('$13,000');
    expect(extraction.traceability).toEqual({ 'term.base_rent': ['seg_0002'] });
  });

  it('should break confidence ties by excerpt length, then by segment order', () => {
    const byExcerpt = aggregate([
      ok('seg_0001', 'direct_extraction', { permitted_use: f('retail', 'use', 0.8, 'retail') }),
      ok('seg_0002', 'direct_extraction', { permitted_use: f('retail sales', 'use', 0.8, 'solely for retail sales') }),
    ]);
    const byOrder = aggregate([
      ok('seg_0002', 'direct_extraction', { permitted_use: f('office', 'use', 0.8, 'same') }),
      ok('seg_0001', 'direct_extraction', { permitted_use: f('retail', 'use', 0.8, 'same') }),
    ]);

    expect(byExcerpt.fieldsByCategory.use?.permitted_use.value).toBe('retail sales');
    expect(byOrder.fieldsByCategory.use?.permitted_use.value).toBe('retail');
  });

  it('should let a later pass override an earlier value', () => {
    const extraction = aggregate([
      ok('seg_0001', 'direct_extraction', {
        base_rent: f('12500', 'financial'),
        security_deposit: f('$25,000', 'financial'),
      }),
      ok('seg_0001', 'calculation', {
        base_rent: f('13000', 'financial', 0.7),
        security_deposit: f('25000', 'financial'),
      }),
    ]);

    const financial = extraction.fieldsByCategory.financial;
    expect(financial?.base_rent.value).toBe('13000');
    expect(financial?.base_rent.passName).toBe('calculation');
    expect(financial?.security_deposit.value).toBe('$25,000');
    expect(financial?.security_deposit.passName).toBe('calculation');
    expect(financial?.security_deposit.sources.map((s) => s.passName)).toEqual(['direct_extraction', 'calculation']);
  });

  it('should score completeness from attempted segments and expected fields', () => {
    const extraction = aggregate([
      ok('seg_0001', 'direct_extraction', { base_rent: f('12500', 'financial') }),
      failed('seg_0002', 'direct_extraction'),
    ]);

    expect(extraction.stats).toEqual({
      segmentsEligible: 2,
      segmentsAttempted: 2,
      segmentsSucceeded: 1,
      expectedFields: 2,
      expectedFieldsResolved: 1,
    });
    expect(extraction.missingExpectedFields).toEqual(['parties.tenant_name']);
    expect(extraction.completenessScore).toBeCloseTo(0.5);
  });

  it('should count segments missing an executed pass or any result against completeness', () => {
    const partial = aggregateResults({
      results: [
        ok('seg_0001', 'direct_extraction', {}),
        ok('seg_0001', 'cross_reference', {}),
        ok('seg_0002', 'direct_extraction', {}),
      ],
      segments,
      passes: DEFAULT_PASSES,
      declaredCategory: 'office',
      weights,
      expectedFields,
      executedPasses: ['direct_extraction', 'cross_reference'],
    });
    const unattempted = aggregateResults({
      results: [ok('seg_0001', 'direct_extraction', {})],
      segments,
      passes: DEFAULT_PASSES,
      declaredCategory: 'office',
      weights,
      expectedFields,
      executedPasses: ['direct_extraction'],
    });

    expect(partial.stats).toEqual({
      segmentsEligible: 2,
      segmentsAttempted: 2,
      segmentsSucceeded: 1,
      expectedFields: 0,
      expectedFieldsResolved: 0,
    });
    expect(partial.completenessScore).toBe(0.5);
    expect(unattempted.stats).toEqual({
      segmentsEligible: 2,
      segmentsAttempted: 1,
      segmentsSucceeded: 1,
      expectedFields: 0,
      expectedFieldsResolved: 0,
    });
    expect(unattempted.completenessScore).toBe(0.5);
  });

  it('should use the segment ratio alone when no fields are expected', () => {
    const extraction = aggregate(
      [ok('seg_0001', 'direct_extraction', {}), failed('seg_0002', 'direct_extraction')],
      'office'
    );
    expect(extraction.completenessScore).toBeCloseTo(0.5);
  });

  it('should score an empty run as zero', () => {
    const extraction = aggregate([]);
    expect(extraction.completenessScore).toBe(0);
    expect(extraction.fieldsByCategory).toEqual({});
    expect(extraction.missingExpectedFields).toEqual(['financial.base_rent', 'parties.tenant_name']);
  });

  it('should not depend on the order results arrive in', () => {
    const results = [
      ok('seg_0001', 'direct_extraction', { tenant_name: f('Bluefin', 'parties', 0.8) }),
      ok('seg_0002', 'direct_extraction', { tenant_name: f('Bluefin Outfitters', 'parties', 0.8) }),
      ok('seg_0002', 'cross_reference', { base_rent: f('12500', 'financial') }),
      failed('seg_0001', 'cross_reference'),
    ];

    expect(aggregate([...results].reverse())).toEqual(aggregate(results));
  });

  it('should return a frozen extraction', () => {
    const extraction = aggregate([ok('seg_0001', 'direct_extraction', { base_rent: f('12500', 'financial') })]);
    expect(Object.isFrozen(extraction)).toBe(true);
    expect(Object.isFrozen(extraction.fieldsByCategory.financial)).toBe(true);
  });
});

describe('buildPassContext', () => {
  it('should expose aggregated values of the named passes only', () => {
    const results = [
      ok('seg_0001', 'direct_extraction', { base_rent: f('12500', 'financial') }),
      ok('seg_0001', 'implicit_facts', { hvac_responsibility: f('landlord', 'maintenance') }),
    ];

    expect(buildPassContext(results, ['direct_extraction'], segments)).toEqual({
      passNames: ['direct_extraction'],
      fields: { 'financial.base_rent': '12500' },
    });
    expect(buildPassContext(results, [], segments)).toEqual({ passNames: [], fields: {} });
  });
});

describe('normalisation', () => {
  it('should snake_case field names', () => {
    expect(normalizeFieldName('Base Rent')).toBe('base_rent');
    expect(normalizeFieldName('baseRent')).toBe('base_rent');
    expect(normalizeFieldName(' CAM charges ')).toBe('cam_charges');
  });

  it('should give equivalent values one comparison key', () => {
    expect(normalizeValue('$12,500.00')).toBe('12500');
    expect(normalizeValue(12500)).toBe('12500');
    expect(normalizeValue('12.5')).toBe('12.5');
    expect(normalizeValue(' Retail  Sales. ')).toBe('retail sales');
    expect(normalizeValue(true)).toBe('true');
  });
});
