export type { Classification, ClassifyOptions, DiagnosticStream, MatchTier } from './types.js';
export type { PatternMapping, PatternRule, RegistryOptions } from './ruleRegistry.js';
export { DEFAULT_REGISTRY_OPTIONS, RuleRegistry } from './ruleRegistry.js';
export { classify, explain } from './classifier.js';
