/**
 * Diagnostic severity enumeration
 */
export const SeverityEnum = {
    ERROR: 'error',
    WARNING: 'warning',
    INFO: 'info',
} as const;

export type SeverityEnumType = (typeof SeverityEnum)[keyof typeof SeverityEnum];

/**
 * Severity override accepted in config: a severity, or 'off' to disable a rule
 */
export type RuleSetting = SeverityEnumType | 'off';

/**
 * Page kind enumeration
 */
export const PageKindEnum = {
    MARKDOWN: 'markdown',
    HTML: 'html',
} as const;

export type PageKindEnumType = (typeof PageKindEnum)[keyof typeof PageKindEnum];

/**
 * Link kind enumeration
 */
export const LinkKindEnum = {
    /** Scheme-qualified or protocol-relative URL */
    EXTERNAL: 'external',
    /** Same-page fragment (#section) */
    ANCHOR: 'anchor',
    /** Root-relative path or {{ site.baseurl }}-prefixed path */
    INTERNAL: 'internal',
    /** Path relative to the current page */
    RELATIVE: 'relative',
    /** Target built from Liquid the linter cannot evaluate ({{ page.url }}) */
    TEMPLATE: 'template',
} as const;

export type LinkKindEnumType = (typeof LinkKindEnum)[keyof typeof LinkKindEnum];

/**
 * Rule identifiers
 */
export const RuleIdEnum = {
    FRONT_MATTER_MISSING: 'front-matter/missing',
    FRONT_MATTER_INVALID_YAML: 'front-matter/invalid-yaml',
    FRONT_MATTER_REQUIRED_KEY: 'front-matter/required-key',
    FRONT_MATTER_INVALID_TYPE: 'front-matter/invalid-type',
    FRONT_MATTER_INVALID_LANG: 'front-matter/invalid-lang',
    FRONT_MATTER_LANG_MISMATCH: 'front-matter/lang-mismatch',
    FRONT_MATTER_UNKNOWN_KEY: 'front-matter/unknown-key',
    FRONT_MATTER_UNKNOWN_LAYOUT: 'front-matter/unknown-layout',
    LINKS_BROKEN: 'links/broken',
    LINKS_MISSING_BASEURL: 'links/missing-baseurl',
    LINKS_CROSS_LANGUAGE: 'links/cross-language',
    CODE_INVALID_SYNTAX: 'code/invalid-syntax',
    CODE_EMPTY: 'code/empty',
    CODE_MISSING_LANGUAGE: 'code/missing-language',
    NAVIGATION_DUPLICATE_ORDER: 'navigation/duplicate-order',
    TRANSLATIONS_MISSING: 'translations/missing',
    TRANSLATIONS_ORPHAN: 'translations/orphan',
    TRANSLATIONS_NAV_ORDER_MISMATCH: 'translations/nav-order-mismatch',
    TRANSLATIONS_UNTRANSLATED: 'translations/untranslated',
} as const;

export type RuleIdEnumType = (typeof RuleIdEnum)[keyof typeof RuleIdEnum];
