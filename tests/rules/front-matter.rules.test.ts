import { describe, it, expect } from 'vitest';
import {
    FrontMatterMissingRule,
    FrontMatterInvalidYamlRule,
    FrontMatterRequiredKeyRule,
    FrontMatterInvalidTypeRule,
    FrontMatterInvalidLangRule,
    FrontMatterLangMismatchRule,
    FrontMatterUnknownKeyRule,
    FrontMatterUnknownLayoutRule,
} from '../../src/rules/front-matter.rules.js';
import { createPage, runRule } from '../mocks/index.js';

describe('Front matter rules', () => {
    describe('FrontMatterMissingRule', () => {
        it('should report Markdown pages without front matter', async () => {
            const findings = await runRule(new FrontMatterMissingRule(), {
                'en/a.md': '# No front matter\n',
                'en/b.md': createPage('Body'),
                'en/c.html': '<p>static</p>',
            });

            expect(findings).toEqual([
                {
                    file: 'en/a.md',
                    line: 1,
                    message: 'Page has no front matter block; the site generator will copy it verbatim',
                },
            ]);
        });
    });

    describe('FrontMatterInvalidYamlRule', () => {
        it('should report unclosed blocks on line 1', async () => {
            const findings = await runRule(new FrontMatterInvalidYamlRule(), {
                'en/a.md': '---\nlayout: default\n\nBody\n',
            });

            expect(findings).toEqual([
                {
                    file: 'en/a.md',
                    line: 1,
                    message: 'Invalid front matter: Front matter block is not closed with ---',
                },
            ]);
        });

        it('should report YAML errors', async () => {
            const findings = await runRule(new FrontMatterInvalidYamlRule(), {
                'en/a.md': '---\ntitle: A\ntitle: B\n---\nBody\n',
            });

            expect(findings).toHaveLength(1);
            expect(findings[0]?.message).toContain('Invalid front matter: ');
            expect(findings[0]?.message).toContain('duplicated mapping key');
        });

        it('should leave broken pages to this rule alone', async () => {
            const findings = await runRule(new FrontMatterRequiredKeyRule(), {
                'en/a.md': '---\nlayout: default\n\nBody\n',
            });

            expect(findings).toEqual([]);
        });
    });

    describe('FrontMatterRequiredKeyRule', () => {
        it('should report absent and empty keys', async () => {
            const findings = await runRule(new FrontMatterRequiredKeyRule(), {
                'en/a.md': '---\nlayout: default\n---\nBody',
                'en/b.md': '---\nlayout: default\ntitle: "  "\n---\nBody',
                'en/c.md': '---\nlayout: default\ntitle:\n---\nBody',
                'en/d.md': createPage('Body'),
            });

            expect(findings).toEqual([
                { file: 'en/a.md', line: 1, message: 'Missing required front matter key "title"', details: { key: 'title' } },
                { file: 'en/b.md', line: 3, message: 'Missing required front matter key "title"', details: { key: 'title' } },
                { file: 'en/c.md', line: 3, message: 'Missing required front matter key "title"', details: { key: 'title' } },
            ]);
        });

        it('should use the configured keys', async () => {
            const findings = await runRule(
                new FrontMatterRequiredKeyRule(),
                { 'en/a.md': createPage('Body') },
                { requiredKeys: ['description'] }
            );

            expect(findings.map((finding) => finding.message)).toEqual([
                'Missing required front matter key "description"',
            ]);
        });
    });

    describe('FrontMatterInvalidTypeRule', () => {
        it('should report wrong types at the key line', async () => {
            const findings = await runRule(new FrontMatterInvalidTypeRule(), {
                'en/a.md': createPage('Body', {
                    extra: ['nav_order: 1.5', 'hide_title: "yes"', 'description: [a, b]'],
                }),
            });

            expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
                [6, 'Front matter key "description" must be a string, got a list'],
                [4, 'Front matter key "nav_order" must be an integer, got number 1.5'],
                [5, 'Front matter key "hide_title" must be a boolean, got string "yes"'],
            ]);
        });

        it('should describe numbers and mappings', async () => {
            const findings = await runRule(new FrontMatterInvalidTypeRule(), {
                'en/a.md': createPage('Body', { title: '42', extra: ['permalink:', '  path: /x/'] }),
            });

            expect(findings.map((finding) => finding.message)).toEqual([
                'Front matter key "title" must be a string, got number 42',
                'Front matter key "permalink" must be a string, got a mapping',
            ]);
        });

        it('should accept well-typed values', async () => {
            const findings = await runRule(new FrontMatterInvalidTypeRule(), {
                'en/a.md': createPage('Body', { lang: 'en', navOrder: 3, extra: ['hide_title: true'] }),
            });

            expect(findings).toEqual([]);
        });
    });

    describe('FrontMatterInvalidLangRule', () => {
        it('should report languages outside the configuration', async () => {
            const findings = await runRule(new FrontMatterInvalidLangRule(), {
                'en/a.md': createPage('Body', { lang: 'fr' }),
                'en/b.md': createPage('Body', { lang: 'en' }),
            });

            expect(findings).toEqual([
                { file: 'en/a.md', line: 4, message: 'Unknown lang "fr"; expected one of en, tr, de, ru' },
            ]);
        });
    });

    describe('FrontMatterLangMismatchRule', () => {
        it('should report lang that disagrees with the directory', async () => {
            const findings = await runRule(new FrontMatterLangMismatchRule(), {
                'tr/a.md': createPage('Body', { lang: 'en' }),
                'tr/b.md': createPage('Body', { lang: 'tr' }),
                'tr/c.md': createPage('Body', { lang: 'fr' }),
                'index.md': createPage('Body', { lang: 'tr' }),
            });

            expect(findings).toEqual([
                { file: 'tr/a.md', line: 4, message: 'lang is "en" but the page is in the "tr" directory' },
            ]);
        });
    });

    describe('FrontMatterUnknownKeyRule', () => {
        it('should report keys outside allowedKeys', async () => {
            const findings = await runRule(new FrontMatterUnknownKeyRule(), {
                'en/a.md': createPage('Body', { extra: ['author: someone', 'nav_order: 2'] }),
            });

            expect(findings).toEqual([
                { file: 'en/a.md', line: 4, message: 'Unknown front matter key "author"', details: { key: 'author' } },
            ]);
        });
    });

    describe('FrontMatterUnknownLayoutRule', () => {
        it('should skip trees without _layouts/', async () => {
            const findings = await runRule(new FrontMatterUnknownLayoutRule(), {
                'en/a.md': createPage('Body', { layout: 'docs' }),
            });

            expect(findings).toEqual([]);
        });

        it('should report layouts with no template', async () => {
            const findings = await runRule(new FrontMatterUnknownLayoutRule(), {
                '_layouts/default.html': '<html>{{ content }}</html>',
                'en/a.md': createPage('Body', { layout: 'docs' }),
                'en/b.md': createPage('Body', { layout: 'default' }),
            });

            expect(findings).toEqual([
                { file: 'en/a.md', line: 2, message: 'Layout "docs" not found in _layouts/' },
            ]);
        });
    });
});
