/**
 * Classifier keyword vocabulary, loaded from data/classifier-keywords.json.
 */

import { ConfigurationError } from '../errors';
import { loadDataFile, validateClassifierVocabulary, type ClassifierVocabulary } from '../schemas';

let defaultVocabulary: ClassifierVocabulary | null = null;

export function parseClassifierVocabulary(data: unknown): ClassifierVocabulary {
  const result = validateClassifierVocabulary(data);
  if (!result.valid || !result.value) {
    throw new ConfigurationError(
      `Invalid classifier vocabulary: ${(result.errors ?? []).join('; ')}`,
      'classifier-keywords.json'
    );
  }
  return result.value;
}

export function getDefaultVocabulary(): ClassifierVocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = parseClassifierVocabulary(loadDataFile('classifier-keywords.json'));
  }
  return defaultVocabulary;
}
