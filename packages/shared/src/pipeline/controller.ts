/**
 * Pipeline Controller
 *
 * Entry point for one document: picks a run strategy from the size table,
 * then segments, classifies, orchestrates and aggregates. A run never
 * throws; failures surface as diagnostics. Invalid configuration throws
 * ConfigurationError from the constructor.
 */

import { ulid } from 'ulid';
import { aggregateResults } from '../aggregation/aggregator';
import { getDefaultExpectedFields } from '../aggregation/expected-fields';
import { classifySegments } from '../classification/classifier';
import { getDefaultVocabulary } from '../classification/vocabulary';
import { loadEngineConfig, validateEngineConfig, type EngineConfig } from '../config';
import { runInChildContext } from '../context';
import { errorMessage } from '../errors';
import { ExtractionCallAdapter } from '../extraction/adapter';
import { DEFAULT_PASSES, orderPasses } from '../extraction/passes';
import type { ExtractionService } from '../extraction/service';
import { logger } from '../logger';
import { completenessHistogram, pipelineDurationHistogram, pipelineRunsCounter, segmentsCounter } from '../metrics';
import { Orchestrator, type OrchestrationOutcome } from '../orchestration/orchestrator';
import type { ClassifierVocabulary, ExpectedFieldSets } from '../schemas';
import { segmentDocument, type SegmentationOutcome } from '../segmentation/segmenter';
import {
  isDocumentCategory,
  type AggregatedExtraction,
  type DiagnosticEvent,
  type DocumentCategory,
  type ExtractionPass,
  type ExtractionResult,
  type Segment,
} from '../types';
import { selectRunStrategy } from './strategy';
import type { PipelineDiagnostics, PipelineResult, RunOutcome, SegmentDiagnostics, SegmentRunStatus } from './types';

export interface PipelineControllerOptions {
  service: ExtractionService;
  /** Defaults to loadEngineConfig(process.env). */
  config?: EngineConfig;
  passes?: readonly ExtractionPass[];
  vocabulary?: ClassifierVocabulary;
  expectedFields?: ExpectedFieldSets;
  now?: () => number;
}

export interface PipelineRunner {
  run(documentText: string, declaredCategory: DocumentCategory): Promise<PipelineResult>;
}

function isSuccessful(result: ExtractionResult): boolean {
  return result.status === 'ok' || result.status === 'skipped';
}

export class PipelineController implements PipelineRunner {
  private readonly service: ExtractionService;
  private readonly config: EngineConfig;
  private readonly passes: readonly ExtractionPass[];
  private readonly vocabulary: ClassifierVocabulary;
  private readonly expectedFields: ExpectedFieldSets;
  private readonly now: () => number;

  constructor(options: PipelineControllerOptions) {
    this.service = options.service;
    this.config = options.config ?? loadEngineConfig();
    validateEngineConfig(this.config);
    this.passes = orderPasses(options.passes ?? DEFAULT_PASSES);
    this.vocabulary = options.vocabulary ?? getDefaultVocabulary();
    this.expectedFields = options.expectedFields ?? getDefaultExpectedFields();
    this.now = options.now ?? Date.now;
  }

  async run(documentText: string, declaredCategory: DocumentCategory): Promise<PipelineResult> {
    const runId = ulid();
    const category: DocumentCategory = isDocumentCategory(declaredCategory) ? declaredCategory : 'general';

    return runInChildContext({ runId, declaredCategory: category }, async () => {
      const startedAt = this.now();
      if (category !== declaredCategory) {
        logger.warn('Unknown declared category, using general', { declaredCategory: String(declaredCategory) });
      }
      try {
        return await this.execute(runId, documentText, category, startedAt);
      } catch (error) {
        logger.error('Pipeline run failed unexpectedly', error);
        return this.buildResult(runId, category, documentText, startedAt, {
          outcome: 'degraded',
          events: [{ kind: 'CallServiceError', message: `Pipeline error: ${errorMessage(error)}` }],
        });
      }
    });
  }

  private async execute(
    runId: string,
    documentText: string,
    category: DocumentCategory,
    startedAt: number
  ): Promise<PipelineResult> {
    if (typeof documentText !== 'string' || documentText.trim().length === 0) {
      logger.warn('Empty document, nothing to extract');
      return this.buildResult(runId, category, '', startedAt, {
        outcome: 'empty_document',
        events: [{ kind: 'EmptyDocument', message: 'Document text is empty' }],
      });
    }

    const strategy = selectRunStrategy(documentText.length, this.config.sizeTiers);
    logger.info('Pipeline run started', {
      documentLength: documentText.length,
      sizeTier: strategy.tier,
      segmentation: strategy.segmentation,
      skipExpensivePasses: strategy.skipExpensivePasses,
    });

    const segmentation = segmentDocument(documentText, this.config.segmentation, strategy.segmentation);
    const segments = classifySegments(segmentation.segments, {
      policy: this.config.classifier,
      vocabulary: this.vocabulary,
    });
    for (const segment of segments) {
      segmentsCounter.inc({ classification: segment.classification, excluded: String(segment.excluded) });
    }

    const adapter = new ExtractionCallAdapter(this.service, {
      policy: this.config.adapter,
      documentCategory: category,
    });
    const orchestrator = new Orchestrator({ adapter, policy: this.config.orchestration, now: this.now });
    const orchestration = await orchestrator.run(segments, this.passes, {
      skipExpensivePasses: strategy.skipExpensivePasses,
    });

    const extraction = aggregateResults({
      results: orchestration.results,
      segments,
      passes: this.passes,
      declaredCategory: category,
      weights: this.config.scoring,
      expectedFields: this.expectedFields,
      executedPasses: orchestration.executedPasses,
    });
    const consistencyEvents = extraction.consistencyIssues.map((issue): DiagnosticEvent => ({
      kind: 'ConsistencyIssue',
      message: `${issue.kind} (${issue.severity}): ${issue.message}`,
    }));
    if (consistencyEvents.length > 0) {
      logger.warn('Extraction failed consistency checks', {
        issues: extraction.consistencyIssues.map((issue) => issue.kind),
      });
    }

    const segmentDiagnostics = segments.map((segment) => this.diagnoseSegment(segment, orchestration));
    const degraded =
      segmentation.degraded ||
      orchestration.skippedPasses.length > 0 ||
      orchestration.budgetExhausted ||
      segmentDiagnostics.some((s) => s.status !== 'succeeded' && s.status !== 'excluded');

    const result = this.buildResult(runId, category, documentText, startedAt, {
      outcome: degraded ? 'degraded' : 'complete',
      events: [...segmentation.events, ...orchestration.events, ...consistencyEvents],
      extraction,
      segmentation,
      segmentDiagnostics,
      orchestration,
      sizeTier: strategy.tier,
    });

    logger.info('Pipeline run finished', {
      outcome: result.diagnostics.outcome,
      segmentCount: segments.length,
      resultCount: orchestration.results.length,
      skippedPasses: orchestration.skippedPasses.map((s) => s.passName),
      conflicts: extraction.conflicts.length,
      completenessScore: extraction.completenessScore,
      elapsedMs: result.diagnostics.elapsedMs,
    });
    return result;
  }

  private diagnoseSegment(segment: Segment, orchestration: OrchestrationOutcome): SegmentDiagnostics {
    const results = orchestration.results.filter((r) => r.segmentId === segment.id);
    const jobs = orchestration.jobs.filter((job) => job.segmentId === segment.id);

    const passes: SegmentDiagnostics['passes'] = {};
    for (const job of jobs) {
      const result = results.find((r) => r.passName === job.passName);
      passes[job.passName] = result ? result.status : 'not_attempted';
    }

    let status: SegmentRunStatus;
    if (segment.excluded) {
      status = 'excluded';
    } else if (results.length === 0) {
      status = 'not_attempted';
    } else if (jobs.every((job) => results.some((r) => r.passName === job.passName && isSuccessful(r)))) {
      status = 'succeeded';
    } else if (results.some(isSuccessful)) {
      status = 'partial';
    } else {
      status = 'failed';
    }

    return {
      segmentId: segment.id,
      index: segment.index,
      startOffset: segment.startOffset,
      endOffset: segment.endOffset,
      classification: segment.classification,
      excluded: segment.excluded,
      isTable: segment.isTable,
      truncated: results.some((r) => r.truncated),
      pageHint: segment.pageHint,
      status,
      passes,
      attempts: jobs.reduce((sum, job) => sum + job.attempts, 0),
    };
  }

  private buildResult(
    runId: string,
    category: DocumentCategory,
    documentText: string,
    startedAt: number,
    parts: {
      outcome: RunOutcome;
      events: DiagnosticEvent[];
      extraction?: AggregatedExtraction;
      segmentation?: SegmentationOutcome;
      segmentDiagnostics?: SegmentDiagnostics[];
      orchestration?: OrchestrationOutcome;
      sizeTier?: PipelineDiagnostics['sizeTier'];
    }
  ): PipelineResult {
    const extraction =
      parts.extraction ??
      aggregateResults({
        results: [],
        segments: [],
        passes: this.passes,
        declaredCategory: category,
        weights: this.config.scoring,
        expectedFields: this.expectedFields,
      });
    const segmentDiagnostics = parts.segmentDiagnostics ?? [];
    const elapsedMs = this.now() - startedAt;
    const sizeTier = parts.sizeTier ?? null;

    const diagnostics: PipelineDiagnostics = {
      runId,
      outcome: parts.outcome,
      declaredCategory: category,
      documentLength: typeof documentText === 'string' ? documentText.length : 0,
      sizeTier,
      segmentationStrategy: parts.segmentation?.strategy ?? null,
      segmentationDegraded: parts.segmentation?.degraded ?? false,
      segmentCount: segmentDiagnostics.length,
      excludedSegmentCount: segmentDiagnostics.filter((s) => s.excluded).length,
      segments: segmentDiagnostics,
      executedPasses: parts.orchestration?.executedPasses ?? [],
      skippedPasses: parts.orchestration?.skippedPasses ?? [],
      truncatedSegmentIds: segmentDiagnostics.filter((s) => s.truncated).map((s) => s.segmentId),
      budgetExhausted: parts.orchestration?.budgetExhausted ?? false,
      peakConcurrency: parts.orchestration?.peakConcurrency ?? 0,
      events: parts.events,
      completenessScore: extraction.completenessScore,
      elapsedMs,
    };

    pipelineRunsCounter.inc({ outcome: diagnostics.outcome, size_tier: sizeTier ?? 'none' });
    pipelineDurationHistogram.observe({ size_tier: sizeTier ?? 'none' }, elapsedMs / 1000);
    completenessHistogram.observe({ declared_category: category }, extraction.completenessScore);

    return { extraction, diagnostics };
  }
}
