/**
 * Segmenter
 *
 * Splits a document into contiguous, bounded segments. Strategies are tried
 * in order (preferred -> paragraph -> fixed windows); each result is checked
 * against the coverage rules before it is used, so segmentDocument never
 * throws for any input text.
 */

import type { SegmentationPolicy } from '../config';
import { logger } from '../logger';
import type { DiagnosticEvent, Segment, SegmentationStrategy } from '../types';
import { detectBoundaries } from './layout';
import { detectPageMarkers, pageHintFor } from './pages';
import { layoutSegmentation, paragraphSegmentation, windowSegmentation, type Span } from './strategies';

export interface SegmentationOutcome {
  segments: Segment[];
  strategy: SegmentationStrategy;
  /** True when the requested strategy failed and a fallback was used. */
  degraded: boolean;
  events: DiagnosticEvent[];
}

type StrategyFn = (text: string, policy: SegmentationPolicy) => Span[];

const STRATEGIES: Record<SegmentationStrategy, StrategyFn> = {
  layout: layoutSegmentation,
  paragraph: paragraphSegmentation,
  window: windowSegmentation,
};

const FALLBACK_ORDER: SegmentationStrategy[] = ['layout', 'paragraph', 'window'];

export function segmentId(index: number): string {
  return `seg_${String(index + 1).padStart(4, '0')}`;
}

/**
 * Problems with a span list, empty when it covers [0, length) contiguously
 * with no span above the maximum.
 */
export function validateSpans(spans: Span[], length: number, maxSegmentChars: number): string[] {
  const problems: string[] = [];
  if (spans.length === 0) {
    problems.push('no segments produced');
    return problems;
  }
  let expected = 0;
  spans.forEach((span, i) => {
    if (span.start !== expected) {
      problems.push(`segment ${i} starts at ${span.start}, expected ${expected}`);
    }
    if (span.end <= span.start) {
      problems.push(`segment ${i} is empty`);
    }
    if (span.end - span.start > maxSegmentChars) {
      problems.push(`segment ${i} has ${span.end - span.start} chars (max ${maxSegmentChars})`);
    }
    expected = span.end;
  });
  if (expected !== length) {
    problems.push(`segments end at ${expected}, document length is ${length}`);
  }
  return problems;
}

/**
 * Tail of the previous segment trimmed to a word boundary.
 */
export function overlapFrom(previousText: string, overlapChars: number): string {
  if (overlapChars <= 0 || previousText.length === 0) return '';
  let tail = previousText.slice(-overlapChars);
  if (previousText.length > overlapChars) {
    const firstSpace = tail.search(/\s/);
    tail = firstSpace >= 0 ? tail.slice(firstSpace + 1) : '';
  }
  return tail.trim();
}

function buildSegments(text: string, spans: Span[], policy: SegmentationPolicy): Segment[] {
  const markers = detectPageMarkers(text);
  const headings = detectBoundaries(text).filter((b) => b.kind === 'heading');

  return spans.map((span, index) => {
    const segmentText = text.slice(span.start, span.end);
    const previous = index > 0 ? spans[index - 1] : undefined;
    const overlapText =
      previous && !previous.isTable && !span.isTable
        ? overlapFrom(text.slice(previous.start, previous.end), policy.overlapChars)
        : '';

    let heading: string | undefined;
    for (const boundary of headings) {
      if (boundary.offset > span.start) break;
      heading = boundary.heading;
    }

    const segment: Segment = {
      id: segmentId(index),
      index,
      text: segmentText,
      startOffset: span.start,
      endOffset: span.end,
      overlapText,
      isTable: span.isTable,
      heading,
      pageHint: pageHintFor(markers, span.start, span.end),
      classification: 'unclassified',
      excluded: false,
    };
    return Object.freeze(segment);
  });
}

export function segmentDocument(
  text: string,
  policy: SegmentationPolicy,
  preferred: SegmentationStrategy = 'layout'
): SegmentationOutcome {
  const events: DiagnosticEvent[] = [];

  if (text.trim().length === 0) {
    return { segments: [], strategy: preferred, degraded: false, events };
  }

  const order = FALLBACK_ORDER.slice(FALLBACK_ORDER.indexOf(preferred));

  for (const strategy of order) {
    let spans: Span[];
    try {
      spans = STRATEGIES[strategy](text, policy);
    } catch (err) {
      const message = `${strategy} segmentation threw: ${err instanceof Error ? err.message : String(err)}`;
      logger.warn('Segmentation strategy failed', { strategy, error: message });
      events.push({ kind: 'SegmentationDegraded', message });
      continue;
    }

    const problems = validateSpans(spans, text.length, policy.maxSegmentChars);
    if (problems.length > 0) {
      const message = `${strategy} segmentation produced invalid output: ${problems.slice(0, 3).join('; ')}`;
      logger.warn('Segmentation output rejected', { strategy, problems: problems.slice(0, 10) });
      events.push({ kind: 'SegmentationDegraded', message });
      continue;
    }

    const segments = buildSegments(text, spans, policy);
    logger.info('Document segmented', {
      strategy,
      documentLength: text.length,
      segmentCount: segments.length,
      tableSegments: segments.filter((s) => s.isTable).length,
      degraded: strategy !== preferred,
    });
    return { segments, strategy, degraded: strategy !== preferred, events };
  }

  // Window spans always validate.
  const spans = windowSegmentation(text, policy);
  return { segments: buildSegments(text, spans, policy), strategy: 'window', degraded: true, events };
}
