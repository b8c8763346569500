/**
 * extract_document job processor
 *
 * Runs the pipeline for one document and publishes extraction_complete.
 * Kept apart from the worker entry point so it can run without Redis.
 */

import { type Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  QUEUE_NAMES,
  jobsProcessedCounter,
  jobDurationHistogram,
  type ExtractDocumentJob,
  type ExtractionCompleteJob,
  type PipelineRunner,
} from '@leasex/shared';

export type ExtractDocumentJobLike = Pick<Job<ExtractDocumentJob, ExtractionCompleteJob>, 'id' | 'data' | 'attemptsMade'>;

export interface ExtractDocumentProcessorDeps {
  runner: PipelineRunner;
  publish: (payload: ExtractionCompleteJob) => Promise<void>;
}

export function createExtractDocumentProcessor(
  deps: ExtractDocumentProcessorDeps
): (job: ExtractDocumentJobLike) => Promise<ExtractionCompleteJob> {
  return async function processExtractDocument(job) {
    const { correlation_id, document_id, text, declared_category } = job.data;

    return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
      const startTime = Date.now();

      logger.info('Processing extract_document', {
        jobId: job.id,
        document_id,
        declared_category,
        text_length: typeof text === 'string' ? text.length : 0,
        attempt: job.attemptsMade + 1,
      });

      try {
        // A payload without text will never succeed; don't let BullMQ retry it.
        if (typeof text !== 'string') {
          throw new UnrecoverableError('extract_document payload has no text');
        }

        const { extraction, diagnostics } = await deps.runner.run(text, declared_category);

        const payload: ExtractionCompleteJob = {
          event_type: 'extraction.complete',
          correlation_id,
          document_id,
          extraction,
          diagnostics,
        };
        await deps.publish(payload);

        logger.info('Published extraction_complete', {
          document_id,
          outcome: diagnostics.outcome,
          completeness_score: extraction.completenessScore,
          missing_fields: extraction.missingExpectedFields.length,
        });

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' }, duration);
        return payload;
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'failed' });
        jobDurationHistogram.observe(
          { queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'failed' },
          (Date.now() - startTime) / 1000
        );
        throw error;
      }
    });
  };
}
