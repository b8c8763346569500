/**
 * Layout signals: heading and paragraph boundaries, table regions.
 *
 * All offsets point at the start of a line, so any cut made at a boundary
 * keeps the document contiguous. A boundary at offset 0 only names the
 * opening heading; it is never a cut.
 */

export type BoundaryKind = 'heading' | 'page_break' | 'paragraph' | 'indent';

export interface Boundary {
  offset: number;
  /** 3 = heading, 2 = blank-line run or page break, 1 = indentation change */
  strength: number;
  kind: BoundaryKind;
  heading?: string;
}

export interface TableRegion {
  start: number;
  end: number;
  /** [start, end) of each row, in order */
  rows: Array<{ start: number; end: number }>;
}

interface Line {
  start: number;
  /** End including the trailing newline, if any. */
  end: number;
  content: string;
}

const NUMBERED_HEADING = /^(article|section)\s+([0-9]+|[ivxlc]+)(\.\d+)*\b/i;
const DECIMAL_HEADING = /^\d+(\.\d+)*\.?\s+[A-Z][A-Za-z]/;
const ANNEX_HEADING = /^(exhibit|schedule|addendum|rider)\s+[A-Z0-9]+\b/i;
const CAPS_HEADING = /^[A-Z][A-Z0-9 ,.;:()'&/-]{3,79}$/;
const PAGE_MARKER = /^(-{2,}\s*page\s+\d+\s*-{2,}|page\s+\d+\s+of\s+\d+)$/i;
const CURRENCY_AMOUNT = /\$\s?\d[\d,]*(\.\d+)?/g;
const COLUMN_GAP = /\S(\t| {3,})\S/g;

export function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    const end = newline === -1 ? text.length : newline + 1;
    lines.push({ start, end, content: text.slice(start, newline === -1 ? text.length : newline) });
    start = end;
  }
  return lines;
}

function isBlank(line: Line): boolean {
  return line.content.trim().length === 0;
}

function indentation(content: string): number {
  const match = /^[ \t]*/.exec(content);
  return match ? match[0].replace(/\t/g, '    ').length : 0;
}

/**
 * Heading text of a line, or undefined when the line is not a heading.
 */
export function headingOf(content: string): string | undefined {
  const trimmed = content.trim();
  if (trimmed.length === 0 || trimmed.length > 120) return undefined;
  if (NUMBERED_HEADING.test(trimmed) || ANNEX_HEADING.test(trimmed)) return trimmed;
  if (DECIMAL_HEADING.test(trimmed) && trimmed.length <= 80) return trimmed;
  if (CAPS_HEADING.test(trimmed) && /[A-Z]{3}/.test(trimmed)) return trimmed;
  return undefined;
}

export function detectBoundaries(text: string): Boundary[] {
  const boundaries: Boundary[] = [];
  const lines = splitLines(text);
  let previousBlank = false;
  let previousIndent = 0;

  for (const line of lines) {
    if (isBlank(line)) {
      previousBlank = true;
      continue;
    }

    const trimmed = line.content.trim();
    const indent = indentation(line.content);
    let boundary: Boundary | undefined;

    const heading = headingOf(line.content);
    if (PAGE_MARKER.test(trimmed) || line.content.startsWith('\f')) {
      boundary = { offset: line.start, strength: 2, kind: 'page_break' };
    } else if (heading) {
      boundary = { offset: line.start, strength: 3, kind: 'heading', heading };
    } else if (previousBlank) {
      boundary = { offset: line.start, strength: 2, kind: 'paragraph' };
    } else if (indent >= 4 && indent > previousIndent && /^[A-Z(]/.test(trimmed)) {
      boundary = { offset: line.start, strength: 1, kind: 'indent' };
    }

    if (boundary) {
      boundaries.push(boundary);
    }
    previousBlank = false;
    previousIndent = indent;
  }

  return boundaries;
}

function isTabularLine(content: string): boolean {
  if (content.trim().length === 0) return false;
  if ((content.match(/\|/g) ?? []).length >= 2) return true;
  if ((content.match(COLUMN_GAP) ?? []).length >= 2) return true;
  return (content.match(CURRENCY_AMOUNT) ?? []).length >= 2;
}

/**
 * Runs of at least three consecutive tabular lines.
 */
export function detectTables(text: string, minRows = 3): TableRegion[] {
  const regions: TableRegion[] = [];
  let run: Line[] = [];

  const closeRun = () => {
    if (run.length >= minRows) {
      regions.push({
        start: run[0].start,
        end: run[run.length - 1].end,
        rows: run.map((line) => ({ start: line.start, end: line.end })),
      });
    }
    run = [];
  };

  for (const line of splitLines(text)) {
    if (isTabularLine(line.content)) {
      run.push(line);
    } else {
      closeRun();
    }
  }
  closeRun();

  return regions;
}
