import type { CodeBlock, PageLink } from '../types/page.types.js';
import { buildLink } from './links.js';

const ATTRIBUTE_PATTERN = /(?<![\w-])(?:href|src)\s*=\s*(["'])(.*?)\1/gi;
const CODE_BLOCK_PATTERN = /(<pre\b[^>]*>\s*<code\b([^>]*)>)([\s\S]*?)<\/code>\s*<\/pre>/gi;
const SCRIPT_PATTERN = /<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi;

const ENTITIES: Record<string, string> = {
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&nbsp;': ' ',
    '&amp;': '&',
};

/**
 * Decode the handful of entities that appear in escaped code samples
 */
export function decodeEntities(text: string): string {
    return text
        .replace(/&#(\d+);/g, (_match, code: string) => String.fromCodePoint(Number.parseInt(code, 10)))
        .replace(/&#x([0-9a-f]+);/gi, (_match, code: string) => String.fromCodePoint(Number.parseInt(code, 16)))
        .replace(/&(?:lt|gt|quot|#39|apos|nbsp|amp);/g, (entity) => ENTITIES[entity] ?? entity);
}

/**
 * Extract href/src attribute targets from an HTML fragment
 *
 * @param html - Liquid-stripped HTML
 * @param firstLine - Line number of the fragment's first line
 */
export function extractAttributeLinks(html: string, firstLine: number): PageLink[] {
    const links: PageLink[] = [];
    const regex = new RegExp(ATTRIBUTE_PATTERN.source, 'gi');
    let match: RegExpExecArray | null;

    while ((match = regex.exec(html)) !== null) {
        const line = firstLine + lineOfIndex(html, match.index) - 1;
        links.push(buildLink(decodeEntities(match[2] ?? ''), line));
    }

    return links;
}

/**
 * Parse an HTML page body: attribute links and <pre><code> samples
 */
export function parseHtml(body: string): { links: PageLink[]; codeBlocks: CodeBlock[] } {
    // Blank out scripts and styles, keeping their newlines
    const visible = body.replace(SCRIPT_PATTERN, (block) => block.replace(/[^\n]/g, ' '));

    const codeBlocks: CodeBlock[] = [];
    const regex = new RegExp(CODE_BLOCK_PATTERN.source, 'gi');
    let match: RegExpExecArray | null;

    while ((match = regex.exec(visible)) !== null) {
        const opening = match[1] ?? '';
        const attributes = match[2] ?? '';
        const classMatch = /class\s*=\s*["'][^"']*\b(?:language|lang)-([\w#+-]+)/i.exec(attributes);
        codeBlocks.push({
            lang: (classMatch?.[1] ?? '').toLowerCase(),
            code: decodeEntities(match[3] ?? ''),
            line: lineOfIndex(visible, match.index),
            // The sample starts right after <code>, on that tag's line
            codeLine: lineOfIndex(visible, match.index + opening.length),
        });
    }

    // Links inside code samples are sample text, not navigation
    const withoutCode = visible.replace(
        new RegExp(CODE_BLOCK_PATTERN.source, 'gi'),
        (block) => block.replace(/[^\n]/g, ' ')
    );

    return { links: extractAttributeLinks(withoutCode, 1), codeBlocks };
}

/**
 * 1-based line of a character index
 */
export function lineOfIndex(text: string, index: number): number {
    let line = 1;
    for (let i = 0; i < index && i < text.length; i++) {
        if (text.charCodeAt(i) === 10) line++;
    }
    return line;
}
