/**
 * Test Helpers
 *
 * In-process extraction service fakes, engine configs with short timings,
 * and a synthetic lease document builder.
 */

import {
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type ExtractionRequest,
  type ExtractionService,
  type PassResponseField,
  type Segment,
  type SegmentClassification,
} from '@leasex/shared';

/**
 * Engine config with millisecond backoffs and short pass timeouts.
 */
export function testEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return resolveEngineConfig({
    ...overrides,
    orchestration: {
      backoffBaseMs: 1,
      backoffMaxMs: 4,
      runBudgetMs: 10000,
      ...overrides.orchestration,
      circuitBreaker: { failureThreshold: 50, recoveryTimeMs: 1000, ...overrides.orchestration?.circuitBreaker },
    },
    adapter: {
      ...overrides.adapter,
      passTimeoutsMs: {
        direct_extraction: 200,
        cross_reference: 200,
        implicit_facts: 200,
        calculation: 200,
        ...overrides.adapter?.passTimeoutsMs,
      },
    },
  });
}

export function makeSegment(overrides: Partial<Segment> & { text: string }): Segment {
  const index = overrides.index ?? 0;
  const startOffset = overrides.startOffset ?? 0;
  return {
    id: `seg_${String(index + 1).padStart(4, '0')}`,
    index,
    startOffset,
    endOffset: startOffset + overrides.text.length,
    overlapText: '',
    isTable: false,
    classification: 'unclassified',
    excluded: false,
    ...overrides,
  };
}

export function field(
  name: string,
  value: string | number | boolean,
  category: SegmentClassification,
  confidence = 0.9,
  excerpt = `${name} excerpt`
): PassResponseField {
  return { name, value, excerpt, confidence, category };
}

type Handler = (request: ExtractionRequest, signal: AbortSignal) => Promise<unknown>;

/**
 * ExtractionService fake: records every request and tracks how many calls
 * are in flight at once.
 */
export class FakeExtractionService implements ExtractionService {
  readonly requests: ExtractionRequest[] = [];
  inFlight = 0;
  peakInFlight = 0;

  constructor(private readonly handler: Handler) {}

  async extract(request: ExtractionRequest, signal: AbortSignal): Promise<unknown> {
    this.requests.push(request);
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      return await this.handler(request, signal);
    } finally {
      this.inFlight--;
    }
  }

  callsFor(segmentId: string, passName?: string): ExtractionRequest[] {
    return this.requests.filter((r) => r.segmentId === segmentId && (!passName || r.passName === passName));
  }
}

/** Resolves with `value` after `ms` milliseconds. */
export function delayed<T>(value: T, ms: number): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

/** Never settles on its own; rejects once the signal aborts. */
export function hangUntilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Synthetic lease documents
// ============================================================================

const CLAUSES: Array<{ heading: string; body: string }> = [
  {
    heading: 'BASIC TERMS',
    body:
      'This Lease is made and entered into by and between Harbor Point Holdings LLC, hereinafter referred to as Landlord, ' +
      'and Bluefin Outfitters Inc., hereinafter referred to as Tenant, for the premises described below.',
  },
  {
    heading: 'PREMISES',
    body:
      'Landlord leases to Tenant the premises known as Suite 210 of the building at 400 Quay Street, containing ' +
      'approximately 4,250 rentable square feet, together with the non-exclusive right to use the common areas and parking.',
  },
  {
    heading: 'TERM',
    body:
      'The term of this Lease shall begin on the Commencement Date of March 1, 2025 and end on the Expiration Date of ' +
      'February 28, 2030, unless extended under the renewal option granted in this Article.',
  },
  {
    heading: 'RENT',
    body:
      'Tenant shall pay Base Rent of $12,500.00 per month, payable in advance on the first day of each month. Base Rent ' +
      'increases by three percent on each anniversary of the Commencement Date. A late charge of five percent applies.',
  },
  {
    heading: 'USE',
    body:
      'Tenant shall use the premises solely for the retail sale of outdoor apparel and related goods and for no other ' +
      'purpose. Tenant shall comply with all laws applicable to its use and operating hours.',
  },
  {
    heading: 'MAINTENANCE AND REPAIRS',
    body:
      'Tenant shall maintain the interior of the premises in good condition and repair. Landlord shall maintain the roof, ' +
      'structural elements and the HVAC systems serving the building, the cost of which is an operating expense.',
  },
  {
    heading: 'ASSIGNMENT AND SUBLETTING',
    body:
      'Tenant shall not assign this Lease or sublet any part of the premises without the prior written consent of ' +
      'Landlord, which consent shall not be unreasonably withheld, conditioned or delayed.',
  },
  {
    heading: 'INSURANCE',
    body:
      'Tenant shall carry commercial general liability insurance with limits of not less than $2,000,000 per occurrence ' +
      'and shall name Landlord as an additional insured on each policy.',
  },
  {
    heading: 'DEFAULT',
    body:
      'If Tenant fails to pay rent within ten days after written notice, or fails to cure any other breach within thirty ' +
      'days after notice, an event of default occurs and Landlord may pursue all remedies available at law.',
  },
];

/**
 * A lease of at least `minChars` characters: numbered articles cycling
 * through the standard clauses, each paragraph padded with filler sentences.
 */
export function buildLeaseDocument(minChars: number): string {
  const parts: string[] = [];
  let length = 0;
  let article = 1;
  while (length < minChars) {
    const clause = CLAUSES[(article - 1) % CLAUSES.length];
    const filler = ` Provision ${article} continues with the further terms agreed by the parties for this article.`.repeat(4);
    const section = `ARTICLE ${article}. ${clause.heading}\n\n${clause.body}${filler}\n\n`;
    parts.push(section);
    length += section.length;
    article += 1;
  }
  return parts.join('');
}

export const SIGNATURE_BLOCK = [
  'IN WITNESS WHEREOF, the parties have executed this Lease as of the date first written above.',
  '',
  'LANDLORD: Harbor Point Holdings LLC',
  'By: ______________________',
  'Print Name: Dana Reyes',
  'Its: Manager',
  '',
  'TENANT: Bluefin Outfitters Inc.',
  'By: ______________________',
  'Print Name: Sam Okafor',
  'Its: President',
  '',
].join('\n');
