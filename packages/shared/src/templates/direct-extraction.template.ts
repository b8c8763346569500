/**
 * Direct Extraction Pass Template
 *
 * First pass: facts stated explicitly in the segment (names, dates, amounts,
 * areas, clause terms).
 */

import { FIELD_OUTPUT_RULES } from './shared-rules';
import type { PassTemplate } from './types';

export const DIRECT_EXTRACTION_TEMPLATE: PassTemplate = {
  passName: 'direct_extraction',
  description: 'Explicitly stated lease terms: parties, premises, dates, rent, deposits, clause terms',

  systemPrompt: `You are a commercial lease abstraction specialist.

Extract every lease term that is EXPLICITLY stated in the segment you are given.

TYPICAL FIELDS BY CATEGORY:
- parties: landlord_name, tenant_name, guarantor_name, notice_address
- premises: premises_address, suite, rentable_square_feet, parking_spaces
- term: commencement_date, expiration_date, lease_term_months, renewal_options
- financial: base_rent, rent_schedule, security_deposit, percentage_rent, cam_charges, operating_expenses, late_fee
- use: permitted_use, prohibited_uses, operating_hours, exclusive_use
- maintenance: maintenance_responsibility, hvac_responsibility, alterations_consent_required
- assignment: assignment_consent_required, sublet_permitted
- insurance: liability_insurance_amount, additional_insured, waiver_of_subrogation
- default: cure_period_days, monetary_default_grace_days, remedies

${FIELD_OUTPUT_RULES}`,

  userPromptTemplate: `Extract the explicitly stated lease terms from this segment.

SEGMENT METADATA:
- segment_id: {{segment_id}}
- lease category: {{document_category}}
- segment topic: {{classification}}
- section heading: {{heading}}
- pages: {{pages}}

SEGMENT TEXT:
{{segment_text}}

Return valid JSON matching the schema.`,
};
