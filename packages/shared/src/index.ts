/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  runInChildContext,
  type RequestContext,
} from './context';

// Logger
export { logger, serializeError, type LogContext } from './logger';

// Errors
export {
  EngineError,
  ConfigurationError,
  CallTimeoutError,
  CallServiceError,
  MalformedResponseError,
  isTransientServiceError,
  errorMessage,
  type EngineErrorCategory,
} from './errors';

// Config
export {
  config,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  resolveEngineConfig,
  validateEngineConfig,
  deepFreeze,
  type Config,
  type EngineConfig,
  type EngineConfigOverrides,
  type SegmentationPolicy,
  type SizeTierPolicy,
  type ClassifierPolicy,
  type CircuitBreakerPolicy,
  type OrchestrationPolicy,
  type AdapterPolicy,
  type ScoringPolicy,
} from './config';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractDocumentJob,
  type ExtractionCompleteJob,
  getRedisConnection,
  createQueue,
  createWorker,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  enableDefaultMetrics,
  jobDurationHistogram,
  jobsProcessedCounter,
  pipelineRunsCounter,
  pipelineDurationHistogram,
  segmentsCounter,
  completenessHistogram,
  extractionCallsCounter,
  extractionCallDurationHistogram,
  extractionRetriesCounter,
  passesSkippedCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  loadDataFile,
  validatePassResponse,
  validateClassifierVocabulary,
  validateExpectedFieldSets,
  type ValidationResult,
  type PassResponse,
  type PassResponseField,
  type ClassifierVocabulary,
  type ExpectedFieldSets,
} from './schemas';

// Templates
export {
  getTemplateForPass,
  renderTemplate,
  DIRECT_EXTRACTION_TEMPLATE,
  CROSS_REFERENCE_TEMPLATE,
  IMPLICIT_FACTS_TEMPLATE,
  CALCULATION_TEMPLATE,
  type PassTemplate,
} from './templates';

// Pipeline stages
export * from './segmentation';
export * from './classification';
export * from './extraction';
export * from './orchestration';
export * from './aggregation';
export * from './pipeline';
