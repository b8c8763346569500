/**
 * Consistency checks over an aggregated extraction.
 *
 * Rule-based: lease dates must run in order, rent and CAM figures must agree
 * with the figures they are derived from (within 1%), and section
 * references must name a section the document actually has. Checks whose
 * inputs are missing or unparseable are not run.
 */

import { headingOf, splitLines } from '../segmentation/layout';
import type { ConsistencyIssue, FieldValue, ResolvedField, Segment, SegmentClassification } from '../types';

type FieldMap = Readonly<Partial<Record<SegmentClassification, Readonly<Record<string, ResolvedField>>>>>;

interface Located<T> {
  key: string;
  value: T;
}

const CALCULATION_TOLERANCE = 0.01;

const COMMENCEMENT = ['commencement_date', 'lease_commencement_date', 'lease_commencement'];
const EXPIRATION = ['expiration_date', 'lease_expiration_date', 'lease_expiration'];
const RENT_COMMENCEMENT = ['rent_commencement_date', 'rent_commencement'];
const ANNUAL_RENT = ['annual_base_rent', 'annual_rent'];
const MONTHLY_RENT = ['monthly_base_rent', 'monthly_rent'];
const RENT_PSF = ['rent_per_square_foot', 'rent_psf', 'base_rent_psf'];
const SQUARE_FEET = ['rentable_square_feet', 'square_feet', 'rentable_area'];
const CAM_ESTIMATE = ['cam_estimate', 'estimated_cam'];
const CAM_POOL = ['total_cam_pool', 'cam_pool'];
const PRO_RATA = ['pro_rata_share', 'proportionate_share'];

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const SECTION_REFERENCE = /\b(?:section|article)\s+(\d+(?:\.\d+)*)/gi;
const HEADING_NUMBER = /^(?:(?:article|section)\s+)?(\d+(?:\.\d+)*)\b/i;

function entries(fields: FieldMap): Array<Located<ResolvedField>> {
  const out: Array<Located<ResolvedField>> = [];
  for (const [category, byName] of Object.entries(fields)) {
    if (!byName) continue;
    for (const [name, field] of Object.entries(byName)) {
      out.push({ key: `${category}.${name}`, value: field });
    }
  }
  return out;
}

function find(fields: FieldMap, names: readonly string[]): Located<FieldValue> | undefined {
  const all = entries(fields);
  for (const name of names) {
    const hit = all.find((entry) => entry.key.endsWith(`.${name}`));
    if (hit) return { key: hit.key, value: hit.value.value };
  }
  return undefined;
}

/** Epoch day of YYYY-MM-DD, MM/DD/YYYY or "March 1, 2025"; undefined otherwise. */
export function parseLeaseDate(value: FieldValue): number | undefined {
  if (typeof value !== 'string') return undefined;
  const text = value.trim();

  let year: number;
  let month: number;
  let day: number;
  let match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (match) {
    [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  } else if ((match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text))) {
    [month, day, year] = [Number(match[1]), Number(match[2]), Number(match[3])];
  } else if ((match = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(text))) {
    const monthName = match[1].toLowerCase();
    const index = monthName.length < 3 ? -1 : MONTHS.findIndex((name) => name.startsWith(monthName));
    if (index === -1) return undefined;
    [month, day, year] = [index + 1, Number(match[2]), Number(match[3])];
  } else {
    return undefined;
  }

  const time = Date.UTC(year, month - 1, day);
  const date = new Date(time);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined;
  return time / 86_400_000;
}

/** Plain number from 12500, "$12,500.00" or "4.5%"; undefined otherwise. */
export function parseAmount(value: FieldValue): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const cleaned = value.trim().replace(/[$,%\s]/g, '');
  return /^-?\d+(\.\d+)?$/.test(cleaned) ? parseFloat(cleaned) : undefined;
}

function mismatch(expected: number, actual: number): boolean {
  if (actual === 0) return expected !== 0;
  return Math.abs(expected - actual) / Math.abs(actual) > CALCULATION_TOLERANCE;
}

function money(amount: number): string {
  return amount.toFixed(2);
}

function checkDates(fields: FieldMap): ConsistencyIssue[] {
  const issues: ConsistencyIssue[] = [];
  const commencement = find(fields, COMMENCEMENT);
  const expiration = find(fields, EXPIRATION);
  const commencementDay = commencement && parseLeaseDate(commencement.value);
  const expirationDay = expiration && parseLeaseDate(expiration.value);

  if (commencement && expiration && commencementDay !== undefined && expirationDay !== undefined) {
    if (commencementDay >= expirationDay) {
      issues.push({
        kind: 'date_order',
        severity: 'high',
        message: `Commencement (${String(commencement.value)}) is not before expiration (${String(expiration.value)})`,
        fieldKeys: [commencement.key, expiration.key],
      });
    }
  }

  const rentCommencement = find(fields, RENT_COMMENCEMENT);
  const rentDay = rentCommencement && parseLeaseDate(rentCommencement.value);
  if (rentCommencement && commencement && rentDay !== undefined && commencementDay !== undefined) {
    if (rentDay < commencementDay) {
      issues.push({
        kind: 'date_sequence',
        severity: 'medium',
        message: `Rent commencement (${String(rentCommencement.value)}) precedes lease commencement (${String(commencement.value)})`,
        fieldKeys: [rentCommencement.key, commencement.key],
      });
    }
  }

  if (expiration && expirationDay !== undefined) {
    for (const entry of entries(fields)) {
      const name = entry.key.slice(entry.key.indexOf('.') + 1);
      if (!name.includes('option') || !name.includes('deadline')) continue;
      const deadline = parseLeaseDate(entry.value.value);
      if (deadline !== undefined && deadline > expirationDay) {
        issues.push({
          kind: 'option_deadline',
          severity: 'high',
          message: `${name} (${String(entry.value.value)}) falls after expiration (${String(expiration.value)})`,
          fieldKeys: [entry.key, expiration.key],
        });
      }
    }
  }
  return issues;
}

function checkFinancials(fields: FieldMap): ConsistencyIssue[] {
  const issues: ConsistencyIssue[] = [];
  const amount = (names: readonly string[]): Located<number> | undefined => {
    const hit = find(fields, names);
    const parsed = hit && parseAmount(hit.value);
    return hit && parsed !== undefined ? { key: hit.key, value: parsed } : undefined;
  };

  const annual = amount(ANNUAL_RENT);
  const monthly = amount(MONTHLY_RENT);
  if (annual && monthly && mismatch(monthly.value * 12, annual.value)) {
    issues.push({
      kind: 'rent_calculation',
      severity: 'high',
      message: `Annual rent ${money(annual.value)} does not match 12 x monthly rent (${money(monthly.value * 12)})`,
      fieldKeys: [annual.key, monthly.key],
    });
  }

  const psf = amount(RENT_PSF);
  const area = amount(SQUARE_FEET);
  if (annual && psf && area && mismatch(psf.value * area.value, annual.value)) {
    issues.push({
      kind: 'rent_calculation',
      severity: 'high',
      message: `Annual rent ${money(annual.value)} does not match rate x area (${money(psf.value * area.value)})`,
      fieldKeys: [annual.key, psf.key, area.key],
    });
  }

  const cam = amount(CAM_ESTIMATE);
  const pool = amount(CAM_POOL);
  const share = amount(PRO_RATA);
  if (cam && pool && share) {
    const expected = (pool.value * share.value) / 100;
    if (mismatch(expected, cam.value)) {
      issues.push({
        kind: 'cam_calculation',
        severity: 'medium',
        message: `CAM estimate ${money(cam.value)} does not match pool x share (${money(expected)})`,
        fieldKeys: [cam.key, pool.key, share.key],
      });
    }
  }
  return issues;
}

/** Section numbers named by headings anywhere in the document. */
export function sectionNumbers(segments: readonly Segment[]): Set<string> {
  const numbers = new Set<string>();
  for (const segment of segments) {
    for (const line of splitLines(segment.text)) {
      const heading = headingOf(line.content);
      const match = heading ? HEADING_NUMBER.exec(heading) : null;
      if (match) numbers.add(match[1]);
    }
  }
  return numbers;
}

function checkReferences(fields: FieldMap, segments: readonly Segment[]): ConsistencyIssue[] {
  const known = sectionNumbers(segments);
  if (known.size === 0) return [];

  const issues: ConsistencyIssue[] = [];
  const reported = new Set<string>();
  for (const entry of entries(fields)) {
    const texts = [String(entry.value.value), ...entry.value.sources.map((source) => source.excerpt)];
    for (const text of texts) {
      for (const match of text.matchAll(SECTION_REFERENCE)) {
        const target = match[1];
        const parent = target.split('.')[0];
        if (known.has(target) || known.has(parent) || reported.has(`${entry.key}:${target}`)) continue;
        reported.add(`${entry.key}:${target}`);
        issues.push({
          kind: 'broken_reference',
          severity: 'medium',
          message: `${entry.key} refers to section ${target}, which the document does not contain`,
          fieldKeys: [entry.key],
        });
      }
    }
  }
  return issues;
}

export function checkConsistency(fields: FieldMap, segments: readonly Segment[]): ConsistencyIssue[] {
  return [...checkDates(fields), ...checkFinancials(fields), ...checkReferences(fields, segments)];
}
