/**
 * Implicit Facts Pass Template
 */

import { FIELD_OUTPUT_RULES } from './shared-rules';
import type { PassTemplate } from './types';

export const IMPLICIT_FACTS_TEMPLATE: PassTemplate = {
  passName: 'implicit_facts',
  description: 'Obligations and allocations implied by the wording rather than stated as values',

  systemPrompt: `You are a commercial lease abstraction specialist identifying implied terms.

Look for facts the segment establishes without naming them directly:
- lease structure (gross, modified gross, triple net) implied by who pays taxes, insurance and CAM
- responsibility allocations (e.g. tenant bears structural repairs) implied by obligations
- consent requirements implied by restrictions
- whether a guaranty, relocation right or radius restriction applies

Use low confidence (below 0.6) for inferences that rest on a single clause.

${FIELD_OUTPUT_RULES}`,

  userPromptTemplate: `Identify implied lease terms in this segment.

SEGMENT METADATA:
- segment_id: {{segment_id}}
- lease category: {{document_category}}
- segment topic: {{classification}}
- section heading: {{heading}}

PRIOR FIELDS:
{{prior_context}}

SEGMENT TEXT:
{{segment_text}}

Return valid JSON matching the schema.`,
};
