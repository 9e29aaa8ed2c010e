import type { LintRule, RuleContext } from '../types/rule.types.js';
import type { RuleFinding } from '../types/diagnostic.types.js';
import type { Site } from '../types/page.types.js';
import { RuleIdEnum, SeverityEnum } from '../types/enums.js';
import { CODE_LIMITS } from '../config/constants.js';

export class InvalidCodeSyntaxRule implements LintRule {
    readonly id = RuleIdEnum.CODE_INVALID_SYNTAX;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'Code sample does not parse as its declared language';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const findings: RuleFinding[] = [];

        for (const page of site.pages) {
            for (const block of page.codeBlocks) {
                if (block.code.trim() === '') continue;

                const validator = context.validators.get(block.lang);
                if (!validator) continue;

                const result = validator.validate(block.code);
                if (result.valid) continue;

                const line = result.line === undefined ? block.line : block.codeLine + result.line - 1;
                findings.push({
                    file: page.path,
                    line,
                    message: `Invalid ${block.lang} sample: ${excerpt(result.message)}`,
                    details: { lang: block.lang, sampleLine: result.line },
                });
            }
        }
        return findings;
    }
}

export class EmptyCodeBlockRule implements LintRule {
    readonly id = RuleIdEnum.CODE_EMPTY;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Code block has no content';

    check(site: Site): RuleFinding[] {
        const findings: RuleFinding[] = [];
        for (const page of site.pages) {
            for (const block of page.codeBlocks) {
                if (block.code.trim() !== '') continue;
                findings.push({ file: page.path, line: block.line, message: 'Empty code block' });
            }
        }
        return findings;
    }
}

export class MissingCodeLanguageRule implements LintRule {
    readonly id = RuleIdEnum.CODE_MISSING_LANGUAGE;
    readonly defaultSeverity = SeverityEnum.INFO;
    readonly description = 'Code block declares no language';

    check(site: Site): RuleFinding[] {
        const findings: RuleFinding[] = [];
        for (const page of site.pages) {
            for (const block of page.codeBlocks) {
                if (block.lang !== '') continue;
                findings.push({
                    file: page.path,
                    line: block.line,
                    message: 'Code block has no language tag; it will not be highlighted or checked',
                });
            }
        }
        return findings;
    }
}

function excerpt(message: string): string {
    const max = CODE_LIMITS.MESSAGE_EXCERPT_LENGTH;
    return message.length > max ? `${message.substring(0, max - 1)}…` : message;
}
