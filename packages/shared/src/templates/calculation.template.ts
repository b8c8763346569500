/**
 * Calculation Pass Template
 *
 * Derived figures: annualised rent, rent per square foot, escalated rent for
 * later lease years, total deposit. Depends on the direct and cross
 * reference passes.
 */

import { FIELD_OUTPUT_RULES } from './shared-rules';
import type { PassTemplate } from './types';

export const CALCULATION_TEMPLATE: PassTemplate = {
  passName: 'calculation',
  description: 'Derived figures such as annual rent, rent per square foot and escalated rent',

  systemPrompt: `You are a commercial lease analyst computing derived figures.

Using PRIOR FIELDS and the segment, compute only figures whose inputs are all available:
- annual_base_rent from monthly base rent (x 12) or the reverse
- rent_per_square_foot from annual base rent and rentable square feet
- escalated_rent_year_N from a fixed escalation percentage or schedule
- total_lease_term_months from commencement and expiration dates

Name each computed field exactly as above. The excerpt must quote the clause that defines the inputs.
Round currency to two decimals.

${FIELD_OUTPUT_RULES}`,

  userPromptTemplate: `Compute derived lease figures for this segment.

SEGMENT METADATA:
- segment_id: {{segment_id}}
- lease category: {{document_category}}
- segment topic: {{classification}}

PRIOR FIELDS:
{{prior_context}}

SEGMENT TEXT:
{{segment_text}}

Return valid JSON matching the schema.`,
};
