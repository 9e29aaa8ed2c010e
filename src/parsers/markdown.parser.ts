import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import type { Nodes, Root } from 'mdast';
import type { CodeBlock, PageLink } from '../types/page.types.js';
import { buildLink } from './links.js';
import { extractAttributeLinks } from './html.parser.js';

/**
 * Markdown parsing result. Line numbers are relative to the parsed text.
 */
export interface MarkdownParseResult {
    links: PageLink[];
    codeBlocks: CodeBlock[];
    headings: string[];
}

const processor = unified().use(remarkParse).use(remarkGfm);

/**
 * Parse a Liquid-stripped Markdown body into links, fenced code blocks and headings
 *
 * Indented code blocks are skipped: they carry no language tag to validate against.
 */
export function parseMarkdown(body: string): MarkdownParseResult {
    const tree: Root = processor.parse(body);
    const result: MarkdownParseResult = { links: [], codeBlocks: [], headings: [] };

    visit(tree, body, result);
    return result;
}

function visit(node: Nodes, source: string, result: MarkdownParseResult): void {
    const line = node.position?.start.line ?? 1;

    switch (node.type) {
        case 'link':
        case 'image':
        case 'definition':
            result.links.push(buildLink(node.url, line));
            break;

        case 'html':
            result.links.push(...extractAttributeLinks(node.value, line));
            break;

        case 'code': {
            const offset = node.position?.start.offset;
            const opening = offset === undefined ? '' : source.substring(offset, offset + 3);
            // Fenced blocks open with ``` or ~~~; anything else is indented
            if (opening.startsWith('```') || opening.startsWith('~~~')) {
                result.codeBlocks.push({
                    lang: (node.lang ?? '').toLowerCase(),
                    code: node.value,
                    line,
                    codeLine: line + 1,
                });
            }
            break;
        }

        case 'heading':
            result.headings.push(textOf(node));
            break;

        default:
            break;
    }

    if ('children' in node) {
        for (const child of node.children) {
            visit(child, source, result);
        }
    }
}

function textOf(node: Nodes): string {
    if ('value' in node) return node.value;
    let text = '';
    if ('children' in node) {
        for (const child of node.children) {
            text += textOf(child);
        }
    }
    return text;
}
