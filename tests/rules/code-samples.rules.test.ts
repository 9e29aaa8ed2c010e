import { describe, it, expect } from 'vitest';
import {
    InvalidCodeSyntaxRule,
    EmptyCodeBlockRule,
    MissingCodeLanguageRule,
} from '../../src/rules/code-samples.rules.js';
import { createDefaultValidatorRegistry } from '../../src/validators/validator-registry.js';
import { createPage, createRuleContext, fence, loadTestSite, runRule } from '../mocks/index.js';

// Fences open on file lines 6, 10, 14 and 18
const body = 'Intro\n'
    + fence('json', '{"a": 1,}') + '\n'
    + fence('yaml', 'key: value') + '\n'
    + fence('', '') + '\n'
    + fence('python', 'print(');

const files = { 'en/samples.md': createPage(body) };

describe('Code sample rules', () => {
    describe('InvalidCodeSyntaxRule', () => {
        it('should report invalid samples at the failing line', async () => {
            const findings = await runRule(new InvalidCodeSyntaxRule(), files);

            expect(findings).toHaveLength(1);
            expect(findings[0]?.file).toBe('en/samples.md');
            expect(findings[0]?.line).toBe(7);
            expect(findings[0]?.message.startsWith('Invalid json sample: ')).toBe(true);
            expect(findings[0]?.details).toEqual({ lang: 'json', sampleLine: 1 });
        });

        it('should shorten long validator messages', async () => {
            const site = await loadTestSite(files);
            const validators = createDefaultValidatorRegistry().register({
                languages: ['json'],
                validate: () => ({ valid: false, message: 'x'.repeat(70), line: 2 }),
            }, true);

            const findings = new InvalidCodeSyntaxRule().check(site, { ...createRuleContext(), validators });

            expect(findings).toEqual([
                {
                    file: 'en/samples.md',
                    line: 8,
                    message: `Invalid json sample: ${'x'.repeat(59)}…`,
                    details: { lang: 'json', sampleLine: 2 },
                },
            ]);
        });

        it('should validate samples in HTML pages', async () => {
            const findings = await runRule(new InvalidCodeSyntaxRule(), {
                'en/page.html': '---\nlayout: default\ntitle: Page\n---\n<pre><code class="language-xml">\n&lt;a&gt;\n</code></pre>\n',
            });

            expect(findings).toEqual([
                {
                    file: 'en/page.html',
                    line: 6,
                    message: 'Invalid xml sample: Element <a> is never closed',
                    details: { lang: 'xml', sampleLine: 2 },
                },
            ]);
        });

        it('should count HTML samples from the <code> tag line when code starts on it', async () => {
            const findings = await runRule(new InvalidCodeSyntaxRule(), {
                'en/page.html': '---\nlayout: default\ntitle: Page\n---\n<p>Intro</p>\n<pre><code class="language-xml">&lt;a&gt;\n&lt;b/&gt;</code></pre>\n',
            });

            expect(findings).toEqual([
                {
                    file: 'en/page.html',
                    line: 6,
                    message: 'Invalid xml sample: Element <a> is never closed',
                    details: { lang: 'xml', sampleLine: 1 },
                },
            ]);
        });
    });

    describe('EmptyCodeBlockRule', () => {
        it('should report blocks without content', async () => {
            const findings = await runRule(new EmptyCodeBlockRule(), files);

            expect(findings).toEqual([{ file: 'en/samples.md', line: 14, message: 'Empty code block' }]);
        });
    });

    describe('MissingCodeLanguageRule', () => {
        it('should report untagged blocks', async () => {
            const findings = await runRule(new MissingCodeLanguageRule(), files);

            expect(findings).toEqual([
                {
                    file: 'en/samples.md',
                    line: 14,
                    message: 'Code block has no language tag; it will not be highlighted or checked',
                },
            ]);
        });
    });
});
