export * from './enums.js';
export type * from './page.types.js';
export type * from './diagnostic.types.js';
export type * from './source.types.js';
export type * from './rule.types.js';
export type {
    LogConfig,
    DocsiteLintConfig,
    DocsiteLintConfigFile,
    ResolvedConfig,
} from './config.types.js';
export {
    configSchema,
    configFileSchema,
    DEFAULT_LANGUAGES,
    DEFAULT_REQUIRED_KEYS,
    DEFAULT_ALLOWED_KEYS,
    DEFAULT_EXTENSIONS,
    DEFAULT_EXCLUDE,
    DEFAULT_CONCURRENCY,
    DEFAULT_LOG_CONFIG,
} from './config.types.js';
