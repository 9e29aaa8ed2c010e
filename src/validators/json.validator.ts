import type { CodeValidationResult, CodeValidator } from '../types/validator.types.js';
import { lineOfIndex } from '../parsers/html.parser.js';

/**
 * Strict JSON, as in `json` fenced blocks
 */
export class JsonValidator implements CodeValidator {
    readonly languages: readonly string[] = ['json'];

    validate(code: string): CodeValidationResult {
        return parseJson(code);
    }
}

/**
 * JSON with comments and trailing commas, as in `jsonc` blocks (appsettings.json style)
 */
export class JsoncValidator implements CodeValidator {
    readonly languages: readonly string[] = ['jsonc', 'json5'];

    validate(code: string): CodeValidationResult {
        const stripped = stripJsonComments(code);
        if (typeof stripped !== 'string') {
            return stripped;
        }
        return parseJson(stripped.replace(/,(\s*[}\]])/g, '$1'));
    }
}

function parseJson(code: string): CodeValidationResult {
    try {
        JSON.parse(code);
        return { valid: true };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { valid: false, message, line: jsonErrorLine(code, message) };
    }
}

/**
 * V8 reports either "(line N column M)" or "at position N"
 */
function jsonErrorLine(code: string, message: string): number | undefined {
    const lineMatch = /\(line (\d+) column \d+\)/.exec(message);
    if (lineMatch?.[1]) {
        return Number.parseInt(lineMatch[1], 10);
    }
    const positionMatch = /at position (\d+)/.exec(message);
    if (positionMatch?.[1]) {
        return lineOfIndex(code, Number.parseInt(positionMatch[1], 10));
    }
    return undefined;
}

/**
 * Replace // and /* *\/ comments with whitespace, keeping strings and newlines intact
 */
export function stripJsonComments(code: string): string | CodeValidationResult {
    let output = '';
    let i = 0;

    while (i < code.length) {
        const char = code[i];
        const next = code[i + 1];

        if (char === '"') {
            const end = findStringEnd(code, i);
            output += code.substring(i, end);
            i = end;
        } else if (char === '/' && next === '/') {
            while (i < code.length && code[i] !== '\n') {
                output += ' ';
                i++;
            }
        } else if (char === '/' && next === '*') {
            const close = code.indexOf('*/', i + 2);
            if (close === -1) {
                return { valid: false, message: 'Unterminated block comment', line: lineOfIndex(code, i) };
            }
            output += code.substring(i, close + 2).replace(/[^\n]/g, ' ');
            i = close + 2;
        } else {
            output += char;
            i++;
        }
    }

    return output;
}

function findStringEnd(code: string, start: number): number {
    let i = start + 1;
    while (i < code.length) {
        if (code[i] === '\\') {
            i += 2;
            continue;
        }
        if (code[i] === '"' || code[i] === '\n') {
            return i + 1;
        }
        i++;
    }
    return code.length;
}
