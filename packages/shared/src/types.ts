/**
 * Shared TypeScript Types
 *
 * Types for the lease segmentation, extraction and aggregation pipeline.
 * Pass responses are validated against docs/contracts/pass_response.schema.json.
 */

// ============================================================================
// Document Categories
// ============================================================================

export type DocumentCategory = 'retail' | 'office' | 'industrial' | 'general';

export const DOCUMENT_CATEGORIES: readonly DocumentCategory[] = ['retail', 'office', 'industrial', 'general'];

export function isDocumentCategory(value: unknown): value is DocumentCategory {
  return typeof value === 'string' && DOCUMENT_CATEGORIES.some((category) => category === value);
}

// ============================================================================
// Segment Classification
// ============================================================================

export type SegmentClassification =
  | 'financial'
  | 'parties'
  | 'premises'
  | 'term'
  | 'use'
  | 'maintenance'
  | 'assignment'
  | 'insurance'
  | 'default'
  | 'signature'
  | 'unclassified';

/** Substantive classifications, in tie-break order. */
export type TopicClassification = Exclude<SegmentClassification, 'signature' | 'unclassified'>;

export const TOPIC_CLASSIFICATIONS: readonly TopicClassification[] = [
  'financial',
  'parties',
  'premises',
  'term',
  'use',
  'maintenance',
  'assignment',
  'insurance',
  'default',
];

export const SEGMENT_CLASSIFICATIONS: readonly SegmentClassification[] = [
  ...TOPIC_CLASSIFICATIONS,
  'signature',
  'unclassified',
];

export function isSegmentClassification(value: unknown): value is SegmentClassification {
  return typeof value === 'string' && SEGMENT_CLASSIFICATIONS.some((c) => c === value);
}

// ============================================================================
// Segments
// ============================================================================

export interface PageHint {
  start: number;
  end: number;
}

export interface Segment {
  /** Sequence id, e.g. seg_0001 */
  readonly id: string;
  readonly index: number;
  /** Exact source span; concatenating all segments reproduces the document. */
  readonly text: string;
  readonly startOffset: number;
  readonly endOffset: number;
  /** Tail of the previous segment, sent as context only. */
  readonly overlapText: string;
  readonly isTable: boolean;
  readonly heading?: string;
  readonly pageHint?: PageHint;
  readonly classification: SegmentClassification;
  readonly excluded: boolean;
}

export type SegmentationStrategy = 'layout' | 'paragraph' | 'window';

// ============================================================================
// Extraction Passes
// ============================================================================

export type PassName = 'direct_extraction' | 'cross_reference' | 'implicit_facts' | 'calculation';

export interface ExtractionPass {
  readonly name: PassName;
  /** Passes whose aggregated output is handed to this pass as context. */
  readonly dependsOn: readonly PassName[];
  /** Eligible for size-based skipping. */
  readonly expensive: boolean;
  readonly description: string;
}

// ============================================================================
// Extraction Results
// ============================================================================

export type FieldValue = string | number | boolean;

export interface ExtractedField {
  readonly value: FieldValue;
  readonly excerpt: string;
  readonly confidence: number;
  readonly category: SegmentClassification;
}

export type ExtractionStatus = 'ok' | 'timeout' | 'serviceError' | 'malformed' | 'skipped';

export type CallFailureKind = 'CallTimeout' | 'CallServiceError' | 'CallMalformedResponse' | 'CircuitOpen';

export interface CallFailure {
  readonly kind: CallFailureKind;
  readonly message: string;
  readonly retryable: boolean;
}

export interface ExtractionResult {
  readonly segmentId: string;
  readonly passName: PassName;
  readonly status: ExtractionStatus;
  readonly fields: Readonly<Record<string, ExtractedField>>;
  readonly warnings: readonly string[];
  readonly attempts: number;
  readonly truncated: boolean;
  readonly durationMs: number;
  readonly error?: CallFailure;
}

/** Aggregated output of earlier passes, keyed by `category.field`. */
export interface PassContext {
  readonly passNames: readonly PassName[];
  readonly fields: Readonly<Record<string, FieldValue>>;
}

// ============================================================================
// Aggregation
// ============================================================================

export interface FieldSource {
  readonly segmentId: string;
  readonly passName: PassName;
  readonly excerpt: string;
  readonly confidence: number;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly pageHint?: PageHint;
}

export interface FieldCandidate {
  readonly value: FieldValue;
  readonly normalizedValue: string;
  readonly confidence: number;
  readonly sources: readonly FieldSource[];
}

export interface ResolvedField extends FieldCandidate {
  /** Pass that produced the winning value. */
  readonly passName: PassName;
}

export interface FieldConflict {
  /** `category.field` */
  readonly fieldKey: string;
  readonly passName: PassName;
  readonly candidates: readonly FieldCandidate[];
  readonly resolvedValue: FieldValue;
}

export interface AggregationStats {
  /** Non-excluded segments. */
  readonly segmentsEligible: number;
  readonly segmentsAttempted: number;
  readonly segmentsSucceeded: number;
  readonly expectedFields: number;
  readonly expectedFieldsResolved: number;
}

export interface AggregatedExtraction {
  readonly declaredCategory: DocumentCategory;
  readonly fieldsByCategory: Readonly<Partial<Record<SegmentClassification, Readonly<Record<string, ResolvedField>>>>>;
  readonly conflicts: readonly FieldConflict[];
  readonly missingExpectedFields: readonly string[];
  /** 0..1 */
  readonly completenessScore: number;
  /** `category.field` -> segment ids that contributed the resolved value */
  readonly traceability: Readonly<Record<string, readonly string[]>>;
  readonly consistencyIssues: readonly ConsistencyIssue[];
  readonly stats: AggregationStats;
}

export type ConsistencyIssueKind =
  | 'date_order'
  | 'date_sequence'
  | 'option_deadline'
  | 'rent_calculation'
  | 'cam_calculation'
  | 'broken_reference';

export interface ConsistencyIssue {
  readonly kind: ConsistencyIssueKind;
  readonly severity: 'high' | 'medium' | 'low';
  readonly message: string;
  /** `category.field` keys the check read. */
  readonly fieldKeys: readonly string[];
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticEventKind =
  | 'SegmentationDegraded'
  | 'CallTimeout'
  | 'CallServiceError'
  | 'CallMalformedResponse'
  | 'PassSkipped'
  | 'RunBudgetExhausted'
  | 'CircuitOpen'
  | 'EmptyDocument'
  | 'ConsistencyIssue';

export interface DiagnosticEvent {
  readonly kind: DiagnosticEventKind;
  readonly message: string;
  readonly segmentId?: string;
  readonly passName?: PassName;
}

export type PassSkipReason = 'document_size' | 'budget';

export interface SkippedPass {
  readonly passName: PassName;
  readonly reason: PassSkipReason;
}
