/**
 * Cross Reference Pass Template
 *
 * Resolves references to other sections, exhibits and defined terms using
 * the values found by the direct pass.
 */

import { FIELD_OUTPUT_RULES } from './shared-rules';
import type { PassTemplate } from './types';

export const CROSS_REFERENCE_TEMPLATE: PassTemplate = {
  passName: 'cross_reference',
  description: 'Values that depend on references to other sections, exhibits or defined terms',

  systemPrompt: `You are a commercial lease abstraction specialist resolving cross references.

The segment may say things like "the Base Rent set forth in Section 4.1", "as defined in Exhibit B"
or "Tenant's Proportionate Share". Known values from earlier passes are listed under PRIOR FIELDS.

Report a field only when the segment modifies, qualifies or resolves it (e.g. a rent abatement that
applies to the Base Rent, a renewal term that references the initial Term). Do not repeat prior
fields unchanged.

${FIELD_OUTPUT_RULES}`,

  userPromptTemplate: `Resolve cross references in this segment.

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
