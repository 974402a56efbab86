export * from './types';
export * from './errors';
export { cleanDomain, isValidDomain, toIdna, contentHash, extractDomainsFromText } from './domain';
export { normalize, payloadFormat, DEFAULT_HTML_PATTERN } from './normalizer';
export { AggregationStore } from './store';
export { createResolverQuery, verifyDomain, classifyDnsError } from './dns';
export type { DnsQuery, DnsResolverLike, ResolverQueryOptions } from './dns';
export { runAggregation, selectSources, validateCandidates } from './orchestrator';
export type { RunDependencies, SourceFetcher } from './orchestrator';
export { fetchSource } from './sources/fetchSource';
export { loadSources, parseSources, withLocalFiles } from './sources/registry';
export { CUSTOM_ADAPTERS, resolveAdapter } from './sources/adapters';
export { writeOutputs, loadPreviousOutput } from './output';
export { CONFIG } from './config';
