export { aggregateResults, buildPassContext, type AggregationInput } from './aggregator';
export { checkConsistency, parseAmount, parseLeaseDate, sectionNumbers } from './consistency';
export { getDefaultExpectedFields, parseExpectedFieldSets } from './expected-fields';
export { normalizeFieldName, normalizeValue } from './normalize';
