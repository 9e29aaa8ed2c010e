import type { LinkKindEnumType, PageKindEnumType } from './enums.js';

/**
 * Front matter fields recognized by the site templates.
 * Values are unvalidated; the front-matter rules check their types.
 */
export interface FrontMatter {
    layout?: unknown;
    title?: unknown;
    description?: unknown;
    lang?: unknown;
    nav_order?: unknown;
    hide_title?: unknown;
    permalink?: unknown;
    [key: string]: unknown;
}

/**
 * Result of splitting a file into front matter and body
 */
export interface FrontMatterParseResult {
    /** True when the file opens with a `---` block */
    present: boolean;
    /** Parsed data (empty object when absent or invalid) */
    data: FrontMatter;
    /** Content after the closing delimiter */
    body: string;
    /** Number of lines preceding the body in the original file */
    bodyLineOffset: number;
    /** 1-based line of each top-level key in the original file */
    keyLines: Record<string, number>;
    /** YAML error message, when the block does not parse */
    error?: string;
    /** 1-based line of the YAML error in the original file */
    errorLine?: number;
}

/**
 * A link or asset reference found in a page
 */
export interface PageLink {
    /** Target as written in the source, Liquid included */
    raw: string;
    /** Target with Liquid expressions and baseurl marker removed */
    href: string;
    /** 1-based line in the original file */
    line: number;
    kind: LinkKindEnumType;
    /** Whether the target was written with {{ site.baseurl }} or relative_url */
    usesBaseurl: boolean;
}

/**
 * A fenced (or <pre><code>) code sample
 */
export interface CodeBlock {
    /** Lower-cased first word of the info string; empty when none was given */
    lang: string;
    code: string;
    /** 1-based line of the opening fence or <pre> tag in the original file */
    line: number;
    /** 1-based line holding the first line of `code` */
    codeLine: number;
}

/**
 * A Markdown or HTML page with front matter
 */
export interface DocPage {
    /** POSIX path relative to the docs root */
    path: string;
    kind: PageKindEnumType;
    /** Language directory the page lives in, if any */
    language?: string;
    /** Path relative to the language directory (or the root, for unlocalized pages) */
    localPath: string;
    frontMatter: FrontMatterParseResult;
    links: PageLink[];
    codeBlocks: CodeBlock[];
    /** SHA-256 of the whitespace-normalized body ('' when the body is blank) */
    bodyHash: string;
}

/**
 * Site-wide settings read from _config.yml
 */
export interface SiteSettings {
    baseurl: string;
    /** Extra keys from _config.yml */
    [key: string]: unknown;
}

/**
 * A loaded documentation tree
 */
export interface Site {
    root: string;
    pages: DocPage[];
    /** All non-page files (assets, images, static HTML) by relative path */
    staticFiles: Set<string>;
    /** Normalized permalink → page path */
    permalinks: Map<string, string>;
    /** Layout names found in _layouts/, or undefined when the tree has none */
    layouts?: Set<string>;
    settings: SiteSettings;
}
