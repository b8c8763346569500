/**
 * Segmentation strategies. Each returns contiguous spans covering the whole
 * text; the segmenter validates that before trusting the output.
 */

import type { SegmentationPolicy } from '../config';
import { detectBoundaries, detectTables, type Boundary, type TableRegion } from './layout';

export interface Span {
  start: number;
  end: number;
  isTable: boolean;
}

const SENTENCE_BREAK = /[.!?;]["')\]]*\s+/g;
const WHITESPACE_BREAK = /\s+/g;

function lastBreak(pattern: RegExp, text: string, from: number, to: number): number {
  const window = text.slice(from, to);
  let cut = -1;
  for (const match of window.matchAll(pattern)) {
    cut = from + (match.index ?? 0) + match[0].length;
  }
  return cut > from ? cut : -1;
}

/**
 * Split [start, end) into pieces of at most `max` characters, cutting at the
 * last sentence end in each window, then at whitespace, then hard.
 */
export function splitOversized(text: string, start: number, end: number, max: number, isTable = false): Span[] {
  const spans: Span[] = [];
  let pos = start;
  while (end - pos > max) {
    const windowEnd = pos + max;
    const floor = pos + Math.floor(max / 2);
    let cut = lastBreak(SENTENCE_BREAK, text, floor, windowEnd);
    if (cut < 0) cut = lastBreak(WHITESPACE_BREAK, text, floor, windowEnd);
    if (cut < 0) cut = windowEnd;
    spans.push({ start: pos, end: cut, isTable });
    pos = cut;
  }
  if (end > pos) {
    spans.push({ start: pos, end, isTable });
  }
  return spans;
}

// ============================================================================
// Fixed windows
// ============================================================================

export function windowSegmentation(text: string, policy: SegmentationPolicy): Span[] {
  return splitOversized(text, 0, text.length, policy.maxSegmentChars);
}

// ============================================================================
// Paragraph accumulation
// ============================================================================

/** Paragraph spans; blank-line separators stay with the preceding paragraph. */
export function paragraphSpans(text: string): Array<{ start: number; end: number }> {
  const spans: Array<{ start: number; end: number }> = [];
  let start = 0;
  for (const match of text.matchAll(/\n[ \t]*\n\s*/g)) {
    const end = (match.index ?? 0) + match[0].length;
    spans.push({ start, end });
    start = end;
  }
  if (start < text.length) {
    spans.push({ start, end: text.length });
  }
  return spans;
}

export function paragraphSegmentation(text: string, policy: SegmentationPolicy): Span[] {
  const spans: Span[] = [];
  let currentStart = -1;
  let currentEnd = -1;

  const flush = () => {
    if (currentStart >= 0) {
      spans.push({ start: currentStart, end: currentEnd, isTable: false });
      currentStart = -1;
    }
  };

  for (const paragraph of paragraphSpans(text)) {
    if (paragraph.end - paragraph.start > policy.maxSegmentChars) {
      flush();
      spans.push(...splitOversized(text, paragraph.start, paragraph.end, policy.maxSegmentChars));
      continue;
    }
    if (currentStart >= 0 && paragraph.end - currentStart > policy.targetSegmentChars) {
      flush();
    }
    if (currentStart < 0) currentStart = paragraph.start;
    currentEnd = paragraph.end;
  }
  flush();

  return spans;
}

// ============================================================================
// Layout-aware
// ============================================================================

interface Candidate {
  offset: number;
  strength: number;
}

function chooseCut(candidates: Candidate[], checkpoint: number): Candidate | undefined {
  let best: Candidate | undefined;
  for (const candidate of candidates) {
    if (!best) {
      best = candidate;
      continue;
    }
    const distance = Math.abs(candidate.offset - checkpoint);
    const bestDistance = Math.abs(best.offset - checkpoint);
    if (distance < bestDistance || (distance === bestDistance && candidate.strength > best.strength)) {
      best = candidate;
    }
  }
  return best;
}

/** A table becomes one span, or row groups when it exceeds the maximum. */
function tableSpans(text: string, table: TableRegion, max: number): Span[] {
  if (table.end - table.start <= max) {
    return [{ start: table.start, end: table.end, isTable: true }];
  }

  const spans: Span[] = [];
  let groupStart = table.start;
  let groupEnd = table.start;
  for (const row of table.rows) {
    if (row.end - row.start > max) {
      if (groupEnd > groupStart) spans.push({ start: groupStart, end: groupEnd, isTable: true });
      spans.push(...splitOversized(text, row.start, row.end, max, true));
      groupStart = row.end;
      groupEnd = row.end;
      continue;
    }
    if (row.end - groupStart > max) {
      spans.push({ start: groupStart, end: groupEnd, isTable: true });
      groupStart = row.start;
    }
    groupEnd = row.end;
  }
  if (groupEnd > groupStart) spans.push({ start: groupStart, end: groupEnd, isTable: true });
  return spans;
}

/**
 * Cut at the layout boundary nearest each target checkpoint. Tables are kept
 * whole; a cut with no boundary in reach falls back to a sentence split.
 */
export function layoutSegmentation(text: string, policy: SegmentationPolicy): Span[] {
  const { targetSegmentChars: target, maxSegmentChars: max, minSegmentChars: min } = policy;
  const tables = detectTables(text);
  const boundaries = detectBoundaries(text).filter(
    (b: Boundary) => !tables.some((t) => b.offset > t.start && b.offset < t.end)
  );

  const spans: Span[] = [];
  let pos = 0;
  let tableIndex = 0;

  while (pos < text.length) {
    const table: TableRegion | undefined = tables[tableIndex];
    if (table && pos >= table.start) {
      spans.push(...tableSpans(text, table, max));
      pos = table.end;
      tableIndex += 1;
      continue;
    }

    const hardLimit = table ? table.start : text.length;
    if (hardLimit - pos <= target) {
      spans.push({ start: pos, end: hardLimit, isTable: false });
      pos = hardLimit;
      continue;
    }

    const limit = Math.min(pos + max, hardLimit);
    const candidates: Candidate[] = boundaries
      .filter((b) => b.offset >= pos + Math.max(1, min) && b.offset <= limit && text.length - b.offset >= min)
      .map((b) => ({ offset: b.offset, strength: b.strength }));
    if (limit === hardLimit) {
      candidates.push({ offset: hardLimit, strength: 3 });
    }

    const cut = chooseCut(candidates, pos + target);
    if (cut) {
      spans.push({ start: pos, end: cut.offset, isTable: false });
      pos = cut.offset;
      continue;
    }

    const [forced] = splitOversized(text, pos, limit + 1, max);
    spans.push(forced);
    pos = forced.end;
  }

  return spans;
}
