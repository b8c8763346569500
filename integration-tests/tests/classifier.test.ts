/**
 * Segment classifier unit tests
 */

import { classifySegment, classifySegments, countKeyword, type ClassifierPolicy } from '@leasex/shared';
import { makeSegment, SIGNATURE_BLOCK } from './helpers';

const options = {
  policy: { exclusionMaxChars: 1500, minAttestationHits: 2 } satisfies ClassifierPolicy,
};

describe('classifySegment', () => {
  it('should classify and exclude a short signature block', () => {
    const decision = classifySegment(makeSegment({ text: SIGNATURE_BLOCK }), { isFirstSegment: false }, options);

    expect(decision.classification).toBe('signature');
    expect(decision.attestationScore).toBe(7);
    expect(decision.excluded).toBe(true);
  });

  it('should not exclude a long attestation segment', () => {
    const text = `${SIGNATURE_BLOCK}${'_'.repeat(1600)}`;
    const decision = classifySegment(makeSegment({ text }), { isFirstSegment: false }, options);

    expect(decision.classification).toBe('signature');
    expect(decision.excluded).toBe(false);
  });

  it('should not exclude a signature-dominated segment with a single attestation hit', () => {
    const decision = classifySegment(makeSegment({ text: 'Signed by the tenant.' }), { isFirstSegment: false }, options);

    expect(decision.classification).toBe('signature');
    expect(decision.excluded).toBe(false);
  });

  it('should score keywords and currency amounts', () => {
    const decision = classifySegment(
      makeSegment({ text: 'Tenant shall pay Base Rent of $12,500.00 per month, payable monthly.' }),
      { isFirstSegment: false },
      options
    );

    expect(decision.classification).toBe('financial');
    expect(decision.scores.financial).toBe(4);
    expect(decision.scores.parties).toBe(1);
    expect(decision.excluded).toBe(false);
  });

  it('should weight keywords found in the heading', () => {
    const decision = classifySegment(
      makeSegment({ text: 'Tenant shall maintain coverage as described herein.', heading: 'ARTICLE 9. INSURANCE' }),
      { isFirstSegment: false },
      options
    );

    expect(decision.scores.insurance).toBe(5);
    expect(decision.classification).toBe('insurance');
  });

  it('should break ties in topic order', () => {
    const decision = classifySegment(makeSegment({ text: 'rent landlord' }), { isFirstSegment: false }, options);
    expect(decision.scores.financial).toBe(1);
    expect(decision.scores.parties).toBe(1);
    expect(decision.classification).toBe('financial');
  });

  it('should boost parties for a party introduction in the opening segment only', () => {
    const text = 'This Lease is entered into between Acme and Beta.';
    expect(classifySegment(makeSegment({ text }), { isFirstSegment: true }, options).classification).toBe('parties');
    expect(classifySegment(makeSegment({ text }), { isFirstSegment: false }, options).classification).toBe(
      'unclassified'
    );
  });

  it('should leave segments without evidence unclassified', () => {
    const decision = classifySegment(makeSegment({ text: 'Lorem ipsum dolor sit amet.' }), { isFirstSegment: false }, options);
    expect(decision.classification).toBe('unclassified');
    expect(decision.excluded).toBe(false);
  });
});

describe('classifySegments', () => {
  it('should return new frozen segments and leave the input untouched', () => {
    const input = [
      makeSegment({ text: 'Tenant shall pay Base Rent of $12,500.00 per month.', index: 0 }),
      makeSegment({ text: SIGNATURE_BLOCK, index: 1, startOffset: 60 }),
    ];
    const output = classifySegments(input, options);

    expect(output.map((s) => [s.id, s.classification, s.excluded])).toEqual([
      ['seg_0001', 'financial', false],
      ['seg_0002', 'signature', true],
    ]);
    expect(Object.isFrozen(output[0])).toBe(true);
    expect(input[1].classification).toBe('unclassified');
  });

  it('should give the same decision when a segment is classified again', () => {
    const segment = makeSegment({
      text: 'Tenant shall pay Base Rent of $12,500.00 per month. Landlord shall maintain the roof.',
      heading: 'ARTICLE 4. RENT',
    });
    const first = classifySegment(segment, { isFirstSegment: false }, options);
    const second = classifySegment(segment, { isFirstSegment: false }, options);

    expect(second.classification).toBe(first.classification);
    expect(second.excluded).toBe(first.excluded);
    expect(second.scores).toEqual(first.scores);
    expect(second.attestationScore).toBe(first.attestationScore);

    const input = [segment, makeSegment({ text: SIGNATURE_BLOCK, index: 1, startOffset: 100 })];
    const once = classifySegments(input, options);
    const twice = classifySegments(once, options);

    expect(twice.map((s) => [s.classification, s.excluded])).toEqual([
      ['financial', false],
      ['signature', true],
    ]);
    expect(twice).toEqual(once);
  });
});

describe('countKeyword', () => {
  it('should match whole words and phrases only', () => {
    expect(countKeyword('rent, rents and parent', 'rent')).toBe(1);
    expect(countKeyword('by and between landlord and tenant', 'by and between')).toBe(1);
  });
});
