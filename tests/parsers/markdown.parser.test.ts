import { describe, it, expect } from 'vitest';
import { parseMarkdown } from '../../src/parsers/markdown.parser.js';

describe('parseMarkdown', () => {
    const body = [
        '# Getting Started',
        '',
        'See [setup](/__site_baseurl__/en/setup/) and [docs](https://example.com).',
        '',
        '```json',
        '{"a": 1}',
        '```',
        '',
        '    indented code',
        '',
        '<a href="guide.html">Guide</a>',
        '',
    ].join('\n');

    it('should collect links with body-relative lines', () => {
        const result = parseMarkdown(body);

        expect(result.links).toEqual([
            {
                raw: '{{ site.baseurl }}/en/setup/',
                href: '/en/setup/',
                line: 3,
                kind: 'internal',
                usesBaseurl: true,
            },
            {
                raw: 'https://example.com',
                href: 'https://example.com',
                line: 3,
                kind: 'external',
                usesBaseurl: false,
            },
            {
                raw: 'guide.html',
                href: 'guide.html',
                line: 11,
                kind: 'relative',
                usesBaseurl: false,
            },
        ]);
    });

    it('should collect fenced code blocks only', () => {
        const result = parseMarkdown(body);

        expect(result.codeBlocks).toEqual([{ lang: 'json', code: '{"a": 1}', line: 5, codeLine: 6 }]);
    });

    it('should collect heading text', () => {
        const result = parseMarkdown('# Setup\n\n## Install `pkg` now\n');

        expect(result.headings).toEqual(['Setup', 'Install pkg now']);
    });

    it('should lower-case tilde fence languages', () => {
        const result = parseMarkdown('~~~YAML\na: 1\n~~~\n');

        expect(result.codeBlocks).toEqual([{ lang: 'yaml', code: 'a: 1', line: 1, codeLine: 2 }]);
    });

    it('should keep empty and untagged fences', () => {
        const result = parseMarkdown('```\n```\n');

        expect(result.codeBlocks).toEqual([{ lang: '', code: '', line: 1, codeLine: 2 }]);
    });

    it('should collect images and definitions', () => {
        const result = parseMarkdown('![logo](images/logo.png)\n\n[ref]: /en/api/\n');

        expect(result.links.map((link) => [link.href, link.kind, link.line])).toEqual([
            ['images/logo.png', 'relative', 1],
            ['/en/api/', 'internal', 3],
        ]);
    });

    it('should ignore links inside code', () => {
        const result = parseMarkdown('```md\n[x](/nowhere)\n```\n\nUse `[y](/also-nowhere)` inline.\n');

        expect(result.links).toEqual([]);
    });
});
