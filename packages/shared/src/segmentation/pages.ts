/**
 * Page marker detection for segment page hints.
 *
 * Recognised markers: `--- Page N ---`, form feeds and `Page N of M` footers.
 */

import type { PageHint } from '../types';

export interface PageMarker {
  /** Offset at which page `page` begins. */
  offset: number;
  page: number;
}

const EXPLICIT_MARKER = /^[ \t]*-{2,}\s*page\s+(\d+)\s*-{2,}[ \t]*$/gim;
const FOOTER_MARKER = /^[ \t]*page\s+(\d+)\s+of\s+\d+[ \t]*$/gim;

export function detectPageMarkers(text: string): PageMarker[] {
  const markers: PageMarker[] = [];

  for (const match of text.matchAll(EXPLICIT_MARKER)) {
    markers.push({ offset: match.index ?? 0, page: parseInt(match[1], 10) });
  }

  // A footer closes page N, so page N + 1 starts after it.
  for (const match of text.matchAll(FOOTER_MARKER)) {
    const end = (match.index ?? 0) + match[0].length;
    markers.push({ offset: end, page: parseInt(match[1], 10) + 1 });
  }

  if (markers.length === 0) {
    let page = 1;
    for (let i = text.indexOf('\f'); i >= 0; i = text.indexOf('\f', i + 1)) {
      page += 1;
      markers.push({ offset: i + 1, page });
    }
  }

  return markers.sort((a, b) => a.offset - b.offset || a.page - b.page);
}

function pageAt(markers: PageMarker[], offset: number): number {
  let page = 1;
  for (const marker of markers) {
    if (marker.offset > offset) break;
    page = marker.page;
  }
  return page;
}

/**
 * Page range covered by [start, end). Undefined when the document carries no
 * page markers at all.
 */
export function pageHintFor(markers: PageMarker[], start: number, end: number): PageHint | undefined {
  if (markers.length === 0) return undefined;
  const first = pageAt(markers, start);
  const last = pageAt(markers, Math.max(start, end - 1));
  return { start: first, end: Math.max(first, last) };
}
