/**
 * docsite-lint: checks for localized Jekyll documentation sites
 *
 * @packageDocumentation
 */

// Main class and factory
export {
    DocsiteLinter,
    createDocsiteLinter,
    countBySeverity,
    type DocsiteLintDependencies,
    type LintOptions,
} from './docsite-lint.js';

// Types
export * from './types/index.js';
export type { CodeValidator, CodeValidationResult } from './types/validator.types.js';

// Configuration
export { resolveConfig, loadConfigFile, parseConfigFile } from './config/loader.js';
export { parseEnv, type Env } from './config/env.js';

// Errors
export {
    DocsiteLintError,
    ConfigurationError,
    SourceReadError,
    ParseError,
    ValidationError,
    NotFoundError,
    RuleExecutionError,
    LintRunError,
    wrapError,
    generateCorrelationId,
} from './errors/index.js';

// Sources
export { FileSystemPageSource } from './sources/index.js';

// Parsers
export {
    parseFrontMatter,
    parseMarkdown,
    parseHtml,
    stripLiquid,
    classifyLink,
} from './parsers/index.js';

// Engines
export { SiteLoader, LintEngine } from './engines/index.js';

// Rules
export { RuleRegistry, createDefaultRuleRegistry, LinkResolver } from './rules/index.js';

// Validators
export {
    CodeValidatorRegistry,
    createDefaultValidatorRegistry,
    JsonValidator,
    JsoncValidator,
    YamlValidator,
    XmlValidator,
    CSharpValidator,
} from './validators/index.js';

// Reporters
export { formatReport, formatText, formatJson, type ReportFormat } from './reporters/index.js';

// Utilities
export {
    createLogger,
    DocsiteLintEventEmitter,
    createEventEmitter,
    hashNormalized,
    normalizeSitePath,
    type Logger,
    type LogMeta,
    type DocsiteLintEvents,
} from './utils/index.js';
