export {
  classifySegment,
  classifySegments,
  countKeyword,
  type ClassificationContext,
  type ClassificationDecision,
  type ClassifierOptions,
} from './classifier';
export { getDefaultVocabulary, parseClassifierVocabulary } from './vocabulary';
