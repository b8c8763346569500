/**
 * Extraction Pass Template Types
 */

import type { PassName } from '../types';

/**
 * Prompt template for one extraction pass.
 */
export interface PassTemplate {
  /** The pass this template drives */
  passName: PassName;

  /** System prompt with pass-specific extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{segment_id}}: Segment sequence id
   * - {{document_category}}: Declared lease category (retail, office, industrial, general)
   * - {{classification}}: Segment topic from the classifier
   * - {{heading}}: Nearest section heading, or "(none)"
   * - {{pages}}: Page range, or "(unknown)"
   * - {{prior_context}}: Aggregated fields from earlier passes, one per line
   * - {{segment_text}}: The (possibly truncated) segment text with overlap marker
   */
  userPromptTemplate: string;

  /** Human-readable description of what this pass extracts */
  description: string;
}
