export {
  ExtractionCallAdapter,
  truncateHead,
  formatPriorContext,
  type CallAdapter,
  type ExtractionCallAdapterOptions,
} from './adapter';
export { OpenAiExtractionService, type OpenAiExtractionServiceOptions } from './openai-service';
export {
  DEFAULT_PASSES,
  DIRECT_EXTRACTION_PASS,
  CROSS_REFERENCE_PASS,
  IMPLICIT_FACTS_PASS,
  CALCULATION_PASS,
  orderPasses,
} from './passes';
export type { ExtractionRequest, ExtractionService } from './service';
