import type { CodeValidationResult, CodeValidator } from '../types/validator.types.js';
import { lineOfIndex } from '../parsers/html.parser.js';

interface OpenTag {
    name: string;
    index: number;
}

/**
 * Well-formedness check for XML fragments (.csproj excerpts, NuGet config)
 *
 * Several root elements are accepted, since samples are usually excerpts.
 */
export class XmlValidator implements CodeValidator {
    readonly languages: readonly string[] = ['xml', 'csproj', 'msbuild'];

    validate(code: string): CodeValidationResult {
        const stack: OpenTag[] = [];
        let i = 0;

        while (i < code.length) {
            const lt = code.indexOf('<', i);
            if (lt === -1) break;

            const special = this.skipSpecial(code, lt);
            if (special !== undefined) {
                if (special === -1) {
                    return { valid: false, message: 'Unterminated comment, CDATA or declaration', line: lineOfIndex(code, lt) };
                }
                i = special;
                continue;
            }

            const end = findTagEnd(code, lt + 1);
            if (end === -1) {
                return { valid: false, message: 'Unterminated tag', line: lineOfIndex(code, lt) };
            }

            const inner = code.substring(lt + 1, end);
            const line = lineOfIndex(code, lt);

            if (inner.startsWith('/')) {
                const name = inner.substring(1).trim();
                const open = stack.pop();
                if (!open) {
                    return { valid: false, message: `Closing tag </${name}> has no matching opening tag`, line };
                }
                if (open.name !== name) {
                    return { valid: false, message: `Expected </${open.name}> but found </${name}>`, line };
                }
            } else {
                const nameMatch = /^([A-Za-z_][\w:.-]*)/.exec(inner);
                if (!nameMatch?.[1]) {
                    return { valid: false, message: 'Invalid tag name', line };
                }
                if (!inner.trimEnd().endsWith('/')) {
                    stack.push({ name: nameMatch[1], index: lt });
                }
            }

            i = end + 1;
        }

        const unclosed = stack.pop();
        if (unclosed) {
            return { valid: false, message: `Element <${unclosed.name}> is never closed`, line: lineOfIndex(code, unclosed.index) };
        }
        return { valid: true };
    }

    /**
     * Skip `<?...?>`, `<!--...-->`, `<![CDATA[...]]>` and `<!DOCTYPE ...>`.
     * Returns the index after the construct, -1 when unterminated, undefined when not special.
     */
    private skipSpecial(code: string, lt: number): number | undefined {
        const constructs: Array<[string, string]> = [
            ['<?', '?>'],
            ['<!--', '-->'],
            ['<![CDATA[', ']]>'],
            ['<!', '>'],
        ];

        for (const [open, close] of constructs) {
            if (code.startsWith(open, lt)) {
                const end = code.indexOf(close, lt + open.length);
                return end === -1 ? -1 : end + close.length;
            }
        }
        return undefined;
    }
}

/**
 * Index of the `>` closing a tag, skipping quoted attribute values
 */
function findTagEnd(code: string, start: number): number {
    let quote: string | undefined;

    for (let i = start; i < code.length; i++) {
        const char = code[i];
        if (quote) {
            if (char === quote) quote = undefined;
        } else if (char === '"' || char === "'") {
            quote = char;
        } else if (char === '>') {
            return i;
        } else if (char === '<') {
            return -1;
        }
    }
    return -1;
}
