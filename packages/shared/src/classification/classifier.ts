/**
 * Segment Classifier
 *
 * Tags each segment with a topic from keyword evidence and excludes short
 * attestation blocks (signature pages, notary acknowledgments) from
 * extraction. Pure: the same segment and options always give the same
 * decision.
 */

import type { ClassifierPolicy } from '../config';
import { logger } from '../logger';
import type { ClassifierVocabulary } from '../schemas';
import { TOPIC_CLASSIFICATIONS, type Segment, type SegmentClassification, type TopicClassification } from '../types';
import { getDefaultVocabulary } from './vocabulary';

const HEADING_WEIGHT = 5;
const PARTY_INTRODUCTION_WEIGHT = 3;
const CURRENCY = /\$\s?\d/g;

export interface ClassificationContext {
  isFirstSegment: boolean;
}

export interface ClassifierOptions {
  policy: ClassifierPolicy;
  vocabulary?: ClassifierVocabulary;
}

export interface ClassificationDecision {
  classification: SegmentClassification;
  excluded: boolean;
  scores: Record<TopicClassification, number>;
  attestationScore: number;
  /** Human-readable reasons, for logs and diagnostics. */
  signals: string[];
}

const patternCache = new Map<string, RegExp>();

function keywordPattern(keyword: string): RegExp {
  let pattern = patternCache.get(keyword);
  if (!pattern) {
    const escaped = keyword.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    pattern = new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`, 'g');
    patternCache.set(keyword, pattern);
  }
  return pattern;
}

export function countKeyword(haystack: string, keyword: string): number {
  return (haystack.match(keywordPattern(keyword)) ?? []).length;
}

function scoreKeywords(body: string, heading: string, keywords: string[]): number {
  let score = 0;
  for (const keyword of keywords) {
    score += countKeyword(body, keyword);
    if (heading && countKeyword(heading, keyword) > 0) {
      score += HEADING_WEIGHT;
    }
  }
  return score;
}

export function classifySegment(
  segment: Segment,
  context: ClassificationContext,
  options: ClassifierOptions
): ClassificationDecision {
  const vocabulary = options.vocabulary ?? getDefaultVocabulary();
  const body = segment.text.toLowerCase();
  const heading = (segment.heading ?? '').toLowerCase();
  const signals: string[] = [];

  const score = (topic: TopicClassification) => scoreKeywords(body, heading, vocabulary.topics[topic]);
  const scores: Record<TopicClassification, number> = {
    financial: score('financial'),
    parties: score('parties'),
    premises: score('premises'),
    term: score('term'),
    use: score('use'),
    maintenance: score('maintenance'),
    assignment: score('assignment'),
    insurance: score('insurance'),
    default: score('default'),
  };

  const currencyHits = (segment.text.match(CURRENCY) ?? []).length;
  if (currencyHits > 0) {
    scores.financial += currencyHits;
    signals.push(`currency amounts: ${currencyHits}`);
  }

  if (context.isFirstSegment && vocabulary.partyIntroduction.some((kw) => countKeyword(body, kw) > 0)) {
    scores.parties += PARTY_INTRODUCTION_WEIGHT;
    signals.push('party introduction in opening segment');
  }

  let topTopic: TopicClassification = TOPIC_CLASSIFICATIONS[0];
  for (const topic of TOPIC_CLASSIFICATIONS) {
    if (scores[topic] > scores[topTopic]) topTopic = topic;
  }
  const topScore = scores[topTopic];

  const attestationScore = scoreKeywords(body, heading, vocabulary.attestation);
  const attestationDominates = attestationScore > 0 && attestationScore >= topScore;

  let classification: SegmentClassification;
  if (attestationDominates) {
    classification = 'signature';
    signals.push(`attestation ${attestationScore} >= topic ${topScore}`);
  } else if (topScore > 0) {
    classification = topTopic;
    signals.push(`top topic ${topTopic} (${topScore})`);
  } else {
    classification = 'unclassified';
    signals.push('no keyword evidence');
  }

  const excluded =
    attestationDominates &&
    attestationScore >= options.policy.minAttestationHits &&
    segment.text.length < options.policy.exclusionMaxChars;
  if (excluded) {
    signals.push(`excluded: attestation block under ${options.policy.exclusionMaxChars} chars`);
  }

  return { classification, excluded, scores, attestationScore, signals };
}

/**
 * Classify every segment, returning new frozen segments.
 */
export function classifySegments(segments: readonly Segment[], options: ClassifierOptions): Segment[] {
  return segments.map((segment, index) => {
    const decision = classifySegment(segment, { isFirstSegment: index === 0 }, options);
    logger.debug('Segment classified', {
      segmentId: segment.id,
      classification: decision.classification,
      excluded: decision.excluded,
      attestationScore: decision.attestationScore,
      signals: decision.signals,
    });
    return Object.freeze({
      ...segment,
      classification: decision.classification,
      excluded: decision.excluded,
    });
  });
}
