/**
 * Test Fixtures
 *
 * Page builders, resolved config and a site loader wired to an in-memory tree.
 */

import type { DocsiteLintConfig, ResolvedConfig } from '../../src/types/config.types.js';
import type { RuleFinding } from '../../src/types/diagnostic.types.js';
import type { Site } from '../../src/types/page.types.js';
import type { LintRule, RuleContext } from '../../src/types/rule.types.js';
import { resolveConfig } from '../../src/config/loader.js';
import { SiteLoader } from '../../src/engines/site-loader.engine.js';
import { createDefaultValidatorRegistry } from '../../src/validators/validator-registry.js';
import { createMockLogger } from './logger.mock.js';
import { MemoryPageSource } from './memory-source.mock.js';

// ============================================
// Config
// ============================================

export function createMockResolvedConfig(overrides: Partial<DocsiteLintConfig> = {}): ResolvedConfig {
    return resolveConfig({ root: '/virtual/docs', ...overrides });
}

// ============================================
// Pages
// ============================================

export interface PageOptions {
    layout?: string;
    title?: string;
    lang?: string;
    navOrder?: number;
    /** Extra front matter lines, written as-is */
    extra?: string[];
}

/**
 * Build a Markdown page with front matter; layout and title always come first (lines 2 and 3)
 */
export function createPage(body: string, options: PageOptions = {}): string {
    const lines = ['---'];
    lines.push(`layout: ${options.layout ?? 'default'}`);
    lines.push(`title: ${options.title ?? 'Test Page'}`);
    if (options.lang !== undefined) lines.push(`lang: ${options.lang}`);
    if (options.navOrder !== undefined) lines.push(`nav_order: ${options.navOrder}`);
    lines.push(...(options.extra ?? []));
    lines.push('---');
    return `${lines.join('\n')}\n${body}`;
}

/**
 * Wrap code in a fenced block
 */
export function fence(lang: string, code: string): string {
    return `\`\`\`${lang}\n${code}\n\`\`\`\n`;
}

// ============================================
// Sites
// ============================================

export async function loadTestSite(
    files: Record<string, string>,
    overrides: Partial<DocsiteLintConfig> = {}
): Promise<Site> {
    const config = createMockResolvedConfig(overrides);
    const loader = new SiteLoader({
        source: new MemoryPageSource(files),
        config,
        logger: createMockLogger(),
    });
    return loader.load();
}

export function createRuleContext(overrides: Partial<DocsiteLintConfig> = {}): RuleContext {
    return {
        config: createMockResolvedConfig(overrides),
        logger: createMockLogger(),
        validators: createDefaultValidatorRegistry(),
    };
}

/**
 * Load a tree and run one rule over it
 */
export async function runRule(
    rule: LintRule,
    files: Record<string, string>,
    overrides: Partial<DocsiteLintConfig> = {}
): Promise<RuleFinding[]> {
    const site = await loadTestSite(files, overrides);
    return rule.check(site, createRuleContext(overrides));
}
