/**
 * Extraction Pass Templates
 *
 * One prompt template per pass; the call adapter renders the template for
 * each (segment, pass) job.
 */

import type { PassName } from '../types';
import type { PassTemplate } from './types';
import { DIRECT_EXTRACTION_TEMPLATE } from './direct-extraction.template';
import { CROSS_REFERENCE_TEMPLATE } from './cross-reference.template';
import { IMPLICIT_FACTS_TEMPLATE } from './implicit-facts.template';
import { CALCULATION_TEMPLATE } from './calculation.template';

export type { PassTemplate } from './types';

export { DIRECT_EXTRACTION_TEMPLATE, CROSS_REFERENCE_TEMPLATE, IMPLICIT_FACTS_TEMPLATE, CALCULATION_TEMPLATE };

/**
 * Map of passes to their templates
 */
const TEMPLATES: Record<PassName, PassTemplate> = {
  direct_extraction: DIRECT_EXTRACTION_TEMPLATE,
  cross_reference: CROSS_REFERENCE_TEMPLATE,
  implicit_facts: IMPLICIT_FACTS_TEMPLATE,
  calculation: CALCULATION_TEMPLATE,
};

export function getTemplateForPass(passName: PassName): PassTemplate {
  return TEMPLATES[passName];
}

/**
 * Replace {{placeholders}}; unknown placeholders are left as written.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
  );
}
