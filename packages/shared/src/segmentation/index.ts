export { segmentDocument, validateSpans, overlapFrom, segmentId, type SegmentationOutcome } from './segmenter';
export { detectBoundaries, detectTables, headingOf, type Boundary, type BoundaryKind, type TableRegion } from './layout';
export { detectPageMarkers, pageHintFor, type PageMarker } from './pages';
export {
  layoutSegmentation,
  paragraphSegmentation,
  windowSegmentation,
  splitOversized,
  type Span,
} from './strategies';
