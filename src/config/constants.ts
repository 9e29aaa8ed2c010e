/**
 * System constants for docsite-lint
 */

// ============================================
// Liquid
// ============================================

export const LIQUID = {
    /**
     * Stand-in written where `{{ site.baseurl }}` appeared, so Markdown sees a
     * plain root-relative URL and the loader can still tell the link used baseurl
     */
    BASEURL_MARKER: '/__site_baseurl__',

    /** `{{ site.baseurl }}` with any inner whitespace */
    BASEURL_PATTERN: /\{\{\s*site\.baseurl\s*\}\}/g,

    /** `{{ '/path' | relative_url }}` or `absolute_url`, single or double quoted */
    URL_FILTER_PATTERN: /\{\{\s*(['"])([^'"]*)\1\s*\|\s*(?:relative_url|absolute_url)\s*\}\}/g,
} as const;

// ============================================
// Site layout
// ============================================

export const SITE_FILES = {
    CONFIG: '_config.yml',
    LAYOUTS_DIR: '_layouts',
    /** Candidates tried, in order, when resolving a link to a page */
    INDEX_NAMES: ['index.md', 'index.markdown', 'index.html'],
    PAGE_SUFFIXES: ['.md', '.markdown', '.html'],
} as const;

// ============================================
// Code samples
// ============================================

export const CODE_LIMITS = {
    /** Longest snippet quoted back in a diagnostic message */
    MESSAGE_EXCERPT_LENGTH: 60,
} as const;

/**
 * Config file looked up in the working directory when --config is not given
 */
export const DEFAULT_CONFIG_FILE = 'docsite-lint.config.json';

/**
 * Docs root the CLI falls back to when neither an argument, the config file nor DOCSITE_ROOT names one
 */
export const DEFAULT_DOCS_ROOT = 'docs';
