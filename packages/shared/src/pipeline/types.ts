/**
 * Pipeline result and diagnostics types.
 */

import type {
  AggregatedExtraction,
  DiagnosticEvent,
  DocumentCategory,
  ExtractionStatus,
  PageHint,
  PassName,
  SegmentClassification,
  SegmentationStrategy,
  SkippedPass,
} from '../types';
import type { SizeTier } from './strategy';

export type RunOutcome = 'complete' | 'degraded' | 'empty_document';

export type SegmentRunStatus = 'succeeded' | 'partial' | 'failed' | 'excluded' | 'not_attempted';

export interface SegmentDiagnostics {
  segmentId: string;
  index: number;
  startOffset: number;
  endOffset: number;
  classification: SegmentClassification;
  excluded: boolean;
  isTable: boolean;
  truncated: boolean;
  pageHint?: PageHint;
  status: SegmentRunStatus;
  /** Final status per executed pass; not_attempted when the budget closed first. */
  passes: Partial<Record<PassName, ExtractionStatus | 'not_attempted'>>;
  attempts: number;
}

export interface PipelineDiagnostics {
  runId: string;
  outcome: RunOutcome;
  declaredCategory: DocumentCategory;
  documentLength: number;
  sizeTier: SizeTier | null;
  segmentationStrategy: SegmentationStrategy | null;
  segmentationDegraded: boolean;
  segmentCount: number;
  excludedSegmentCount: number;
  segments: SegmentDiagnostics[];
  executedPasses: PassName[];
  skippedPasses: SkippedPass[];
  truncatedSegmentIds: string[];
  budgetExhausted: boolean;
  peakConcurrency: number;
  events: DiagnosticEvent[];
  completenessScore: number;
  elapsedMs: number;
}

export interface PipelineResult {
  extraction: AggregatedExtraction;
  diagnostics: PipelineDiagnostics;
}
