/**
 * Extraction Worker
 *
 * Consumes extract_document jobs, runs the lease pipeline and enqueues
 * extraction_complete for downstream consumers.
 */

import {
  logger,
  config,
  errorMessage,
  createWorker,
  createQueue,
  enableDefaultMetrics,
  serveMetrics,
  loadEngineConfig,
  OpenAiExtractionService,
  PipelineController,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type ExtractionCompleteJob,
} from '@leasex/shared';
import { createExtractDocumentProcessor } from './processor';

// Fail fast on bad engine settings, before any job is taken.
const engineConfig = loadEngineConfig();

const controller = new PipelineController({
  service: new OpenAiExtractionService(),
  config: engineConfig,
});

const extractionCompleteQueue = createQueue<ExtractionCompleteJob, void>(QUEUE_NAMES.EXTRACTION_COMPLETE);

const processExtractDocument = createExtractDocumentProcessor({
  runner: controller,
  publish: async (payload) => {
    await extractionCompleteQueue.add('extraction_complete', payload, {
      jobId: `complete_${payload.document_id.replace(/:/g, '_')}_${payload.diagnostics.runId}`,
    });
  },
});

enableDefaultMetrics();
const metricsServer = serveMetrics(config.metricsPort);

const worker = createWorker<ExtractDocumentJob, ExtractionCompleteJob>(
  QUEUE_NAMES.EXTRACT_DOCUMENT,
  processExtractDocument
);

logger.info('Extraction worker started', {
  model: config.llmModel,
  concurrency: engineConfig.orchestration.concurrency,
  runBudgetMs: engineConfig.orchestration.runBudgetMs,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await extractionCompleteQueue.close();
  await new Promise<void>((resolve) => metricsServer.close(() => resolve()));
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error, { signal, reason: errorMessage(error) });
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
