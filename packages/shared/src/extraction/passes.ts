/**
 * Extraction pass definitions and ordering.
 */

import { ConfigurationError } from '../errors';
import type { ExtractionPass, PassName } from '../types';

export const DIRECT_EXTRACTION_PASS: ExtractionPass = {
  name: 'direct_extraction',
  dependsOn: [],
  expensive: false,
  description: 'Explicitly stated terms',
};

export const CROSS_REFERENCE_PASS: ExtractionPass = {
  name: 'cross_reference',
  dependsOn: ['direct_extraction'],
  expensive: true,
  description: 'Terms resolved through references to other sections',
};

export const IMPLICIT_FACTS_PASS: ExtractionPass = {
  name: 'implicit_facts',
  dependsOn: ['direct_extraction'],
  expensive: true,
  description: 'Terms implied by obligations and allocations',
};

export const CALCULATION_PASS: ExtractionPass = {
  name: 'calculation',
  dependsOn: ['direct_extraction', 'cross_reference'],
  expensive: true,
  description: 'Derived figures',
};

export const DEFAULT_PASSES: readonly ExtractionPass[] = Object.freeze([
  DIRECT_EXTRACTION_PASS,
  CROSS_REFERENCE_PASS,
  IMPLICIT_FACTS_PASS,
  CALCULATION_PASS,
]);

/**
 * Topological order of the passes, stable with respect to the given order.
 * Throws ConfigurationError on duplicates, unknown dependencies or cycles.
 */
export function orderPasses(passes: readonly ExtractionPass[]): ExtractionPass[] {
  const byName = new Map<PassName, ExtractionPass>();
  for (const pass of passes) {
    if (byName.has(pass.name)) {
      throw new ConfigurationError(`Duplicate pass: ${pass.name}`, 'passes');
    }
    byName.set(pass.name, pass);
  }
  for (const pass of passes) {
    for (const dependency of pass.dependsOn) {
      if (!byName.has(dependency)) {
        throw new ConfigurationError(`Pass ${pass.name} depends on unknown pass ${dependency}`, 'passes');
      }
    }
  }

  const ordered: ExtractionPass[] = [];
  const placed = new Set<PassName>();
  while (ordered.length < passes.length) {
    const next = passes.find(
      (pass) => !placed.has(pass.name) && pass.dependsOn.every((dependency) => placed.has(dependency))
    );
    if (!next) {
      const remaining = passes.filter((pass) => !placed.has(pass.name)).map((pass) => pass.name);
      throw new ConfigurationError(`Pass dependency cycle among: ${remaining.join(', ')}`, 'passes');
    }
    ordered.push(next);
    placed.add(next.name);
  }
  return ordered;
}
