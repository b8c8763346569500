/**
 * Size-indexed run strategy table.
 */

import type { SizeTierPolicy } from '../config';
import type { SegmentationStrategy } from '../types';

export type SizeTier = 'small' | 'medium' | 'large';

export interface RunStrategy {
  segmentation: SegmentationStrategy;
  skipExpensivePasses: boolean;
}

export const STRATEGY_TABLE: Readonly<Record<SizeTier, RunStrategy>> = Object.freeze({
  small: { segmentation: 'layout', skipExpensivePasses: false },
  medium: { segmentation: 'paragraph', skipExpensivePasses: false },
  large: { segmentation: 'paragraph', skipExpensivePasses: true },
});

export function sizeTierFor(documentLength: number, tiers: SizeTierPolicy): SizeTier {
  if (documentLength <= tiers.smallDocumentMaxChars) return 'small';
  if (documentLength <= tiers.mediumDocumentMaxChars) return 'medium';
  return 'large';
}

export function selectRunStrategy(documentLength: number, tiers: SizeTierPolicy): { tier: SizeTier } & RunStrategy {
  const tier = sizeTierFor(documentLength, tiers);
  return { tier, ...STRATEGY_TABLE[tier] };
}
