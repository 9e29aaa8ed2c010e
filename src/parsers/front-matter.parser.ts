import matter from 'gray-matter';
import type { FrontMatterParseResult } from '../types/page.types.js';

const OPENING_DELIMITER = /^---[ \t]*\r?\n/;
const CLOSING_DELIMITER = /\r?\n---[ \t]*(?:\r?\n|$)/;

/**
 * Split a page into YAML front matter and body
 *
 * Never throws: malformed YAML comes back as `error`/`errorLine` with an empty `data`.
 *
 * @example
 * ```typescript
 * const result = parseFrontMatter('---\nlayout: default\ntitle: Kurulum\n---\n# Kurulum\n');
 * // result.data → { layout: 'default', title: 'Kurulum' }
 * // result.body → '# Kurulum\n', result.bodyLineOffset → 4
 * ```
 */
export function parseFrontMatter(raw: string): FrontMatterParseResult {
    const text = raw.replace(/^\uFEFF/, '');

    if (!OPENING_DELIMITER.test(text)) {
        return { present: false, data: {}, body: text, bodyLineOffset: 0, keyLines: {} };
    }

    const openingLength = text.indexOf('\n') + 1;
    if (!CLOSING_DELIMITER.test(text.substring(openingLength - 1))) {
        return {
            present: true,
            data: {},
            body: text,
            bodyLineOffset: 0,
            keyLines: {},
            error: 'Front matter block is not closed with ---',
            errorLine: 1,
        };
    }

    let parsed: ReturnType<typeof matter>;
    try {
        // Passing options bypasses gray-matter's content cache
        parsed = matter(text, { excerpt: false });
    } catch (error) {
        const closing = CLOSING_DELIMITER.exec(text.substring(openingLength - 1));
        const bodyStart = closing ? openingLength - 1 + closing.index + closing[0].length : text.length;
        const body = text.substring(bodyStart);

        return {
            present: true,
            data: {},
            body,
            bodyLineOffset: countNewlines(text.substring(0, bodyStart)),
            keyLines: {},
            error: yamlErrorMessage(error),
            errorLine: yamlErrorLine(error),
        };
    }

    const body = parsed.content;
    const prefix = text.endsWith(body) ? text.substring(0, text.length - body.length) : '';
    const bodyLineOffset = countNewlines(prefix);
    const keyLines = findKeyLines(prefix);

    if (!isPlainObject(parsed.data)) {
        return {
            present: true,
            data: {},
            body,
            bodyLineOffset,
            keyLines,
            error: 'Front matter must be a YAML mapping',
            errorLine: 1,
        };
    }

    return {
        present: true,
        data: parsed.data,
        body,
        bodyLineOffset,
        keyLines,
    };
}

/**
 * Map unindented `key:` lines of the front matter block to their line numbers
 */
function findKeyLines(block: string): Record<string, number> {
    const keyLines: Record<string, number> = {};
    const lines = block.split('\n');

    // Line 1 is the opening delimiter
    for (let i = 1; i < lines.length; i++) {
        const match = /^([A-Za-z_][\w-]*)\s*:/.exec(lines[i] ?? '');
        if (match?.[1] && keyLines[match[1]] === undefined) {
            keyLines[match[1]] = i + 1;
        }
    }
    return keyLines;
}

function countNewlines(text: string): number {
    let count = 0;
    for (const char of text) {
        if (char === '\n') count++;
    }
    return count;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function yamlErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        // js-yaml appends a code excerpt after the first line
        return error.message.split('\n')[0] ?? error.message;
    }
    return String(error);
}

/**
 * js-yaml errors carry a 0-based `mark.line` relative to the YAML text;
 * gray-matter hands over that text starting with the opening line's newline
 */
function yamlErrorLine(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('mark' in error)) return undefined;
    const mark: unknown = error.mark;
    if (typeof mark !== 'object' || mark === null || !('line' in mark)) return undefined;
    return typeof mark.line === 'number' ? mark.line + 1 : undefined;
}
