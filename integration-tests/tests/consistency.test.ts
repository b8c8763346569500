/**
 * Consistency check tests
 */

import {
  DEFAULT_PASSES,
  aggregateResults,
  checkConsistency,
  normalizeValue,
  parseAmount,
  parseLeaseDate,
  sectionNumbers,
  type ExtractedField,
  type ExtractionResult,
  type ResolvedField,
} from '@leasex/shared';
import { makeSegment } from './helpers';

function resolved(value: string, excerpt = 'excerpt'): ResolvedField {
  return {
    value,
    normalizedValue: normalizeValue(value),
    confidence: 0.9,
    passName: 'direct_extraction',
    sources: [
      { segmentId: 'seg_0001', passName: 'direct_extraction', excerpt, confidence: 0.9, startOffset: 0, endOffset: 100 },
    ],
  };
}

const structured = [
  makeSegment({
    text: 'ARTICLE 1. TERM\nThe term is five years.\n\nARTICLE 4. RENT\nTenant shall pay rent.\n4.2 Late Charges apply.',
  }),
];

describe('checkConsistency', () => {
  it('should flag a commencement date that is not before expiration', () => {
    const issues = checkConsistency(
      { term: { commencement_date: resolved('2030-02-28'), expiration_date: resolved('March 1, 2025') } },
      []
    );

    expect(issues).toEqual([
      {
        kind: 'date_order',
        severity: 'high',
        message: 'Commencement (2030-02-28) is not before expiration (March 1, 2025)',
        fieldKeys: ['term.commencement_date', 'term.expiration_date'],
      },
    ]);
  });

  it('should flag rent commencement before lease commencement', () => {
    const issues = checkConsistency(
      {
        term: {
          commencement_date: resolved('03/01/2025'),
          expiration_date: resolved('2030-02-28'),
        },
        financial: { rent_commencement_date: resolved('2025-02-01') },
      },
      []
    );

    expect(issues).toEqual([
      {
        kind: 'date_sequence',
        severity: 'medium',
        message: 'Rent commencement (2025-02-01) precedes lease commencement (03/01/2025)',
        fieldKeys: ['financial.rent_commencement_date', 'term.commencement_date'],
      },
    ]);
  });

  it('should flag an option deadline after expiration', () => {
    const issues = checkConsistency(
      { term: { expiration_date: resolved('2030-02-28'), renewal_option_deadline: resolved('2030-06-30') } },
      []
    );

    expect(issues.map((issue) => [issue.kind, issue.message, issue.fieldKeys])).toEqual([
      [
        'option_deadline',
        'renewal_option_deadline (2030-06-30) falls after expiration (2030-02-28)',
        ['term.renewal_option_deadline', 'term.expiration_date'],
      ],
    ]);
  });

  it('should not run date checks on values it cannot parse', () => {
    const issues = checkConsistency(
      { term: { commencement_date: resolved('upon delivery of the premises'), expiration_date: resolved('2025-03-01') } },
      []
    );
    expect(issues).toEqual([]);
  });

  it('should flag annual rent that disagrees with the monthly rent', () => {
    const mismatched = checkConsistency(
      { financial: { annual_base_rent: resolved('$150,000'), monthly_base_rent: resolved('$13,000') } },
      []
    );
    const withinTolerance = checkConsistency(
      { financial: { annual_base_rent: resolved('$150,000'), monthly_base_rent: resolved('$12,550') } },
      []
    );

    expect(mismatched).toEqual([
      {
        kind: 'rent_calculation',
        severity: 'high',
        message: 'Annual rent 150000.00 does not match 12 x monthly rent (156000.00)',
        fieldKeys: ['financial.annual_base_rent', 'financial.monthly_base_rent'],
      },
    ]);
    expect(withinTolerance).toEqual([]);
  });

  it('should flag annual rent that disagrees with rate times area', () => {
    const issues = checkConsistency(
      {
        financial: { annual_base_rent: resolved('$150,000.00'), rent_per_square_foot: resolved('$36.00') },
        premises: { rentable_square_feet: resolved('4,250') },
      },
      []
    );

    expect(issues).toEqual([
      {
        kind: 'rent_calculation',
        severity: 'high',
        message: 'Annual rent 150000.00 does not match rate x area (153000.00)',
        fieldKeys: ['financial.annual_base_rent', 'financial.rent_per_square_foot', 'premises.rentable_square_feet'],
      },
    ]);
  });

  it('should flag a CAM estimate that disagrees with the pool and share', () => {
    const issues = checkConsistency(
      {
        financial: {
          cam_estimate: resolved('$9,000'),
          total_cam_pool: resolved('$200,000'),
          pro_rata_share: resolved('4.25%'),
        },
      },
      []
    );

    expect(issues).toEqual([
      {
        kind: 'cam_calculation',
        severity: 'medium',
        message: 'CAM estimate 9000.00 does not match pool x share (8500.00)',
        fieldKeys: ['financial.cam_estimate', 'financial.total_cam_pool', 'financial.pro_rata_share'],
      },
    ]);
  });

  it('should flag references to sections the document does not contain', () => {
    const issues = checkConsistency(
      {
        financial: { late_charge: resolved('5%', 'as set out in Section 4.3') },
        term: {
          renewal_notice: resolved('nine months', 'notice under Section 12.1, see also Section 12.1'),
          holdover: resolved('See Article 7'),
        },
      },
      structured
    );

    expect(issues.map((issue) => issue.message)).toEqual([
      'term.renewal_notice refers to section 12.1, which the document does not contain',
      'term.holdover refers to section 7, which the document does not contain',
    ]);
    expect(issues.every((issue) => issue.kind === 'broken_reference' && issue.severity === 'medium')).toBe(true);
  });

  it('should skip reference checks when no numbered headings are found', () => {
    const issues = checkConsistency(
      { term: { holdover: resolved('See Article 7') } },
      [makeSegment({ text: 'Tenant shall pay rent monthly.' })]
    );
    expect(issues).toEqual([]);
  });
});

describe('sectionNumbers', () => {
  it('should collect article and decimal heading numbers', () => {
    expect([...sectionNumbers(structured)]).toEqual(['1', '4', '4.2']);
  });
});

describe('value parsing', () => {
  it('should read the supported date formats as the same day', () => {
    const day = parseLeaseDate('2025-03-01');
    expect(day).toBe(Date.UTC(2025, 2, 1) / 86_400_000);
    expect(parseLeaseDate('03/01/2025')).toBe(day);
    expect(parseLeaseDate('March 1, 2025')).toBe(day);
    expect(parseLeaseDate('Mar. 1, 2025')).toBe(day);
  });

  it('should reject impossible or unknown dates', () => {
    expect(parseLeaseDate('2025-02-30')).toBeUndefined();
    expect(parseLeaseDate('Ma 1, 2025')).toBeUndefined();
    expect(parseLeaseDate('the first of March')).toBeUndefined();
    expect(parseLeaseDate(20250301)).toBeUndefined();
  });

  it('should read amounts with currency and percent signs', () => {
    expect(parseAmount('$12,500.00')).toBe(12500);
    expect(parseAmount('4.25%')).toBe(4.25);
    expect(parseAmount(12500)).toBe(12500);
    expect(parseAmount('TBD')).toBeUndefined();
  });
});

describe('aggregateResults consistency', () => {
  it('should attach consistency issues to the extraction', () => {
    const f = (value: string): ExtractedField => ({ value, category: 'term', confidence: 0.9, excerpt: value });
    const result: ExtractionResult = {
      segmentId: 'seg_0001',
      passName: 'direct_extraction',
      status: 'ok',
      fields: { commencement_date: f('2030-02-28'), expiration_date: f('2025-03-01') },
      warnings: [],
      attempts: 1,
      truncated: false,
      durationMs: 1,
    };

    const extraction = aggregateResults({
      results: [result],
      segments: [makeSegment({ text: 'The term runs from 2030-02-28 to 2025-03-01.' })],
      passes: DEFAULT_PASSES,
      declaredCategory: 'office',
      weights: { segmentWeight: 0.4, fieldWeight: 0.6 },
      expectedFields: { general: [], retail: [], office: [], industrial: [] },
    });

    expect(extraction.consistencyIssues.map((issue) => issue.kind)).toEqual(['date_order']);
    expect(extraction.completenessScore).toBe(1);
  });
});
