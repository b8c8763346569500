/**
 * Field name and value normalisation used for deduplication.
 */

import type { FieldValue } from '../types';

/**
 * snake_case a field name: "Base Rent" and "baseRent" both become base_rent.
 */
export function normalizeFieldName(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

function canonicalNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(parseFloat(value.toFixed(4)));
}

const NUMERIC = /^-?\$?\s?-?\d[\d,]*(\.\d+)?$/;

/**
 * Comparison key for a value. "$12,500.00", "12500" and 12500 share a key;
 * strings are compared case- and whitespace-insensitively without trailing
 * punctuation.
 */
export function normalizeValue(value: FieldValue): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return canonicalNumber(value);

  const text = value
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[.,;:]+$/, '');

  if (NUMERIC.test(text)) {
    const negative = text.startsWith('-');
    const parsed = parseFloat(text.replace(/[$,\s-]/g, ''));
    if (!Number.isNaN(parsed)) {
      return canonicalNumber(negative ? -parsed : parsed);
    }
  }
  return text;
}
