/**
 * Expected `category.field` keys per declared lease category, loaded from
 * data/expected-fields.json.
 */

import { ConfigurationError } from '../errors';
import { loadDataFile, validateExpectedFieldSets, type ExpectedFieldSets } from '../schemas';

let defaultExpectedFields: ExpectedFieldSets | null = null;

export function parseExpectedFieldSets(data: unknown): ExpectedFieldSets {
  const result = validateExpectedFieldSets(data);
  if (!result.valid || !result.value) {
    throw new ConfigurationError(
      `Invalid expected field sets: ${(result.errors ?? []).join('; ')}`,
      'expected-fields.json'
    );
  }
  return result.value;
}

export function getDefaultExpectedFields(): ExpectedFieldSets {
  if (!defaultExpectedFields) {
    defaultExpectedFields = parseExpectedFieldSets(loadDataFile('expected-fields.json'));
  }
  return defaultExpectedFields;
}
