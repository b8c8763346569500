/**
 * Aggregator
 *
 * Merges per-segment, per-pass results into one extraction. Results are
 * processed in pass order, then segment order, so completion order never
 * affects the outcome.
 *
 * Within a pass, values for the same field name that normalise to the same
 * key merge into one candidate with several sources; differing values are a
 * conflict, resolved by confidence, then excerpt length, then earliest
 * segment. Segments classified differently still compete for one field: the
 * winning candidate decides the category. A later pass overrides an earlier
 * pass's value for the same field.
 */

import type { ScoringPolicy } from '../config';
import { deepFreeze } from '../config';
import type { ExpectedFieldSets } from '../schemas';
import type {
  AggregatedExtraction,
  DocumentCategory,
  ExtractionPass,
  ExtractionResult,
  FieldConflict,
  FieldSource,
  FieldValue,
  PassContext,
  PassName,
  ResolvedField,
  Segment,
  SegmentClassification,
} from '../types';
import { checkConsistency } from './consistency';
import { getDefaultExpectedFields } from './expected-fields';
import { normalizeValue } from './normalize';

export interface AggregationInput {
  results: readonly ExtractionResult[];
  segments: readonly Segment[];
  /** Passes in execution order. */
  passes: readonly ExtractionPass[];
  declaredCategory: DocumentCategory;
  weights: ScoringPolicy;
  expectedFields?: ExpectedFieldSets;
  /** Passes that ran. Defaults to the passes present in `results`. */
  executedPasses?: readonly PassName[];
}

interface Candidate {
  category: SegmentClassification;
  value: FieldValue;
  normalizedValue: string;
  confidence: number;
  sources: FieldSource[];
  firstSegmentIndex: number;
  excerptLength: number;
}

interface Resolved {
  category: SegmentClassification;
  name: string;
  value: FieldValue;
  normalizedValue: string;
  confidence: number;
  passName: PassName;
  sources: FieldSource[];
}

interface Resolution {
  /** Keyed by field name. */
  resolved: Map<string, Resolved>;
  conflicts: FieldConflict[];
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.confidence - a.confidence ||
    b.excerptLength - a.excerptLength ||
    a.firstSegmentIndex - b.firstSegmentIndex
  );
}

function mergeSources(into: FieldSource[], from: readonly FieldSource[]): void {
  for (const source of from) {
    if (!into.some((s) => s.segmentId === source.segmentId && s.passName === source.passName)) {
      into.push(source);
    }
  }
}

function resolveFields(
  results: readonly ExtractionResult[],
  passOrder: readonly PassName[],
  segments: readonly Segment[]
): Resolution {
  const segmentsById = new Map(segments.map((segment) => [segment.id, segment]));
  const resolved = new Map<string, Resolved>();
  const conflicts: FieldConflict[] = [];

  for (const passName of passOrder) {
    const passResults = results
      .filter((r) => r.passName === passName && r.status === 'ok' && segmentsById.has(r.segmentId))
      .sort(
        (a, b) => (segmentsById.get(a.segmentId)?.index ?? 0) - (segmentsById.get(b.segmentId)?.index ?? 0)
      );

    const groups = new Map<string, Candidate[]>();

    for (const result of passResults) {
      const segment = segmentsById.get(result.segmentId);
      if (!segment) continue;

      for (const [name, field] of Object.entries(result.fields)) {
        const normalizedValue = normalizeValue(field.value);
        const source: FieldSource = {
          segmentId: segment.id,
          passName,
          excerpt: field.excerpt,
          confidence: field.confidence,
          startOffset: segment.startOffset,
          endOffset: segment.endOffset,
          pageHint: segment.pageHint,
        };

        const candidates = groups.get(name) ?? [];
        groups.set(name, candidates);
        const existing = candidates.find((c) => c.normalizedValue === normalizedValue);
        if (existing) {
          existing.sources.push(source);
          existing.confidence = Math.max(existing.confidence, field.confidence);
          existing.excerptLength = Math.max(existing.excerptLength, field.excerpt.length);
        } else {
          candidates.push({
            category: field.category,
            value: field.value,
            normalizedValue,
            confidence: field.confidence,
            sources: [source],
            firstSegmentIndex: segment.index,
            excerptLength: field.excerpt.length,
          });
        }
      }
    }

    for (const [name, candidates] of groups) {
      const [winner] = [...candidates].sort(compareCandidates);

      if (candidates.length > 1) {
        conflicts.push({
          fieldKey: `${winner.category}.${name}`,
          passName,
          candidates: candidates.map((c) => ({
            value: c.value,
            normalizedValue: c.normalizedValue,
            confidence: c.confidence,
            sources: [...c.sources],
          })),
          resolvedValue: winner.value,
        });
      }

      const previous = resolved.get(name);
      if (previous && previous.normalizedValue === winner.normalizedValue) {
        mergeSources(previous.sources, winner.sources);
        previous.confidence = Math.max(previous.confidence, winner.confidence);
        previous.passName = passName;
      } else {
        resolved.set(name, {
          category: winner.category,
          name,
          value: winner.value,
          normalizedValue: winner.normalizedValue,
          confidence: winner.confidence,
          passName,
          sources: [...winner.sources],
        });
      }
    }
  }

  return { resolved, conflicts };
}

/**
 * Context handed to a pass: the aggregated values of the passes it depends
 * on, keyed by `category.field`.
 */
export function buildPassContext(
  results: readonly ExtractionResult[],
  passNames: readonly PassName[],
  segments: readonly Segment[]
): PassContext {
  if (passNames.length === 0) {
    return deepFreeze<PassContext>({ passNames: [], fields: {} });
  }
  const { resolved } = resolveFields(results, passNames, segments);
  const fields: Record<string, FieldValue> = {};
  for (const entry of resolved.values()) {
    fields[`${entry.category}.${entry.name}`] = entry.value;
  }
  return deepFreeze<PassContext>({ passNames: [...passNames], fields });
}

function isSuccessful(result: ExtractionResult): boolean {
  return result.status === 'ok' || result.status === 'skipped';
}

export function aggregateResults(input: AggregationInput): AggregatedExtraction {
  const { results, segments, passes, declaredCategory, weights } = input;
  const expectedFields = input.expectedFields ?? getDefaultExpectedFields();

  const { resolved, conflicts } = resolveFields(
    results,
    passes.map((pass) => pass.name),
    segments
  );

  const fieldsByCategory: Partial<Record<SegmentClassification, Record<string, ResolvedField>>> = {};
  const traceability: Record<string, string[]> = {};
  for (const entry of resolved.values()) {
    const bucket = fieldsByCategory[entry.category] ?? {};
    bucket[entry.name] = {
      value: entry.value,
      normalizedValue: entry.normalizedValue,
      confidence: entry.confidence,
      passName: entry.passName,
      sources: entry.sources,
    };
    fieldsByCategory[entry.category] = bucket;
    traceability[`${entry.category}.${entry.name}`] = [...new Set(entry.sources.map((source) => source.segmentId))];
  }

  const resultsBySegment = new Map<string, ExtractionResult[]>();
  for (const result of results) {
    const bucket = resultsBySegment.get(result.segmentId) ?? [];
    bucket.push(result);
    resultsBySegment.set(result.segmentId, bucket);
  }
  const executedPasses =
    input.executedPasses ??
    passes.map((pass) => pass.name).filter((name) => results.some((result) => result.passName === name));

  // Every non-excluded segment counts, attempted or not.
  const eligible = segments.filter((s) => !s.excluded);
  const attempted = eligible.filter((s) => resultsBySegment.has(s.id));
  const succeeded = attempted.filter((s) => {
    const segmentResults = resultsBySegment.get(s.id) ?? [];
    return executedPasses.every((passName) =>
      segmentResults.some((result) => result.passName === passName && isSuccessful(result))
    );
  });

  const expected = expectedFields[declaredCategory] ?? [];
  const resolvedKeys = new Set(Object.keys(traceability));
  const missingExpectedFields = expected.filter((key) => !resolvedKeys.has(key));
  const expectedResolved = expected.length - missingExpectedFields.length;

  const segmentRatio = eligible.length > 0 ? succeeded.length / eligible.length : 0;
  let completenessScore: number;
  if (expected.length === 0) {
    completenessScore = segmentRatio;
  } else {
    const fieldRatio = expectedResolved / expected.length;
    completenessScore =
      (weights.segmentWeight * segmentRatio + weights.fieldWeight * fieldRatio) /
      (weights.segmentWeight + weights.fieldWeight);
  }

  return deepFreeze<AggregatedExtraction>({
    declaredCategory,
    fieldsByCategory,
    conflicts,
    missingExpectedFields,
    completenessScore: Math.min(1, Math.max(0, completenessScore)),
    traceability,
    consistencyIssues: checkConsistency(fieldsByCategory, segments),
    stats: {
      segmentsEligible: eligible.length,
      segmentsAttempted: attempted.length,
      segmentsSucceeded: succeeded.length,
      expectedFields: expected.length,
      expectedFieldsResolved: expectedResolved,
    },
  });
}
