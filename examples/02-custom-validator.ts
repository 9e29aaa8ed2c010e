/**
 * 02 - Custom Validator and Page Source
 *
 * Register a validator for another fenced-block language and lint an
 * in-memory tree instead of a directory.
 *
 * Run: npx tsx examples/02-custom-validator.ts
 */

import {
    createDocsiteLinter,
    createDefaultValidatorRegistry,
    formatText,
    type CodeValidationResult,
    type CodeValidator,
    type IPageSource,
} from '../src/index.js';

/**
 * INI files: every non-blank line is a [section], key=value or a ; comment
 */
class IniValidator implements CodeValidator {
    readonly languages = ['ini'];

    validate(code: string): CodeValidationResult {
        const lines = code.split('\n');
        for (let i = 0; i < lines.length; i++) {
            const line = (lines[i] ?? '').trim();
            if (line === '' || line.startsWith(';') || /^\[[^\]]+\]$/.test(line) || /^[^=]+=/.test(line)) {
                continue;
            }
            return { valid: false, message: `Expected a section or key=value, got "${line}"`, line: i + 1 };
        }
        return { valid: true };
    }
}

class InMemorySource implements IPageSource {
    readonly root = 'memory://docs';

    constructor(private readonly files: Record<string, string>) { }

    async list(): Promise<string[]> {
        return Object.keys(this.files).sort();
    }

    async read(path: string): Promise<string> {
        const content = this.files[path];
        if (content === undefined) {
            throw new Error(`No such file: ${path}`);
        }
        return content;
    }
}

async function main() {
    const source = new InMemorySource({
        'en/settings.md': [
            '---',
            'layout: default',
            'title: Settings',
            '---',
            '```ini',
            '[storage]',
            'provider = postgres',
            'this line is broken',
            '```',
        ].join('\n'),
    });

    const linter = createDocsiteLinter(
        { root: source.root, languages: ['en'] },
        { source, validators: createDefaultValidatorRegistry().register(new IniValidator()) }
    );

    const report = await linter.lint();
    process.stdout.write(formatText(report));
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
