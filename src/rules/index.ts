export { RuleRegistry, createDefaultRuleRegistry } from './rule-registry.js';
export { LinkResolver, type LinkResolution } from './link-resolver.js';
export * from './front-matter.rules.js';
export * from './links.rules.js';
export * from './code-samples.rules.js';
export * from './navigation.rules.js';
export * from './translations.rules.js';
