import type { CodeValidationResult, CodeValidator } from '../types/validator.types.js';
import { lineOfIndex } from '../parsers/html.parser.js';

const PAIRS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };
const CLOSERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

interface Opener {
    char: string;
    index: number;
}

/**
 * Delimiter balance for C# samples
 *
 * Strings (regular, verbatim, interpolated, raw), char literals, comments and
 * preprocessor lines are skipped. This is not a C# parser: it catches the
 * truncated or mis-pasted samples that make up most broken snippets.
 */
export class CSharpValidator implements CodeValidator {
    readonly languages: readonly string[] = ['csharp', 'cs', 'c#'];

    validate(code: string): CodeValidationResult {
        const stack: Opener[] = [];
        let i = 0;
        let lineStart = true;

        while (i < code.length) {
            const char = code[i] ?? '';
            const next = code[i + 1];

            if (char === '\n') {
                lineStart = true;
                i++;
                continue;
            }
            if (lineStart && char === '#') {
                i = skipToLineEnd(code, i);
                continue;
            }
            if (char !== ' ' && char !== '\t' && char !== '\r') {
                lineStart = false;
            }

            if (char === '/' && next === '/') {
                i = skipToLineEnd(code, i);
                continue;
            }
            if (char === '/' && next === '*') {
                const close = code.indexOf('*/', i + 2);
                if (close === -1) {
                    return { valid: false, message: 'Unterminated block comment', line: lineOfIndex(code, i) };
                }
                i = close + 2;
                continue;
            }

            const literal = skipLiteral(code, i);
            if (literal !== undefined) {
                if (literal === -1) {
                    return { valid: false, message: 'Unterminated string or character literal', line: lineOfIndex(code, i) };
                }
                i = literal;
                continue;
            }

            if (CLOSERS[char]) {
                stack.push({ char, index: i });
            } else if (PAIRS[char]) {
                const open = stack.pop();
                if (!open) {
                    return { valid: false, message: `Unexpected '${char}'`, line: lineOfIndex(code, i) };
                }
                if (open.char !== PAIRS[char]) {
                    return {
                        valid: false,
                        message: `Expected '${CLOSERS[open.char] ?? ''}' but found '${char}'`,
                        line: lineOfIndex(code, i),
                    };
                }
            }
            i++;
        }

        const unclosed = stack.pop();
        if (unclosed) {
            return { valid: false, message: `Unclosed '${unclosed.char}'`, line: lineOfIndex(code, unclosed.index) };
        }
        return { valid: true };
    }
}

function skipToLineEnd(code: string, index: number): number {
    const end = code.indexOf('\n', index);
    return end === -1 ? code.length : end;
}

/**
 * If a literal starts at `index`, return the index after it (-1 when unterminated)
 */
function skipLiteral(code: string, index: number): number | undefined {
    // Prefixes: $, @, $@, @$, any number of $ before raw strings
    const prefix = /^(?:\$*@?\$*)/.exec(code.substring(index, index + 8))?.[0] ?? '';
    const quoteIndex = index + prefix.length;
    const quote = code[quoteIndex];

    if (quote === "'" && prefix === '') {
        return skipQuoted(code, quoteIndex, "'", false);
    }
    if (quote !== '"') {
        return undefined;
    }
    if (code.startsWith('"""', quoteIndex)) {
        let count = 3;
        while (code[quoteIndex + count] === '"') count++;
        const fence = '"'.repeat(count);
        const end = code.indexOf(fence, quoteIndex + count);
        return end === -1 ? -1 : end + count;
    }
    return skipQuoted(code, quoteIndex, '"', prefix.includes('@'));
}

function skipQuoted(code: string, quoteIndex: number, quote: string, verbatim: boolean): number {
    let i = quoteIndex + 1;

    while (i < code.length) {
        const char = code[i];
        if (!verbatim && char === '\\') {
            i += 2;
            continue;
        }
        if (char === quote) {
            // "" escapes a quote inside verbatim strings
            if (verbatim && code[i + 1] === quote) {
                i += 2;
                continue;
            }
            return i + 1;
        }
        if (!verbatim && char === '\n') {
            return -1;
        }
        i++;
    }
    return -1;
}
