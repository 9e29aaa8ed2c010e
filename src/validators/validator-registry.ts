/**
 * Code Validator Registry
 *
 * Maps fenced-block language tags to syntax validators.
 */

import type { CodeValidator } from '../types/validator.types.js';
import { ConfigurationError } from '../errors/index.js';
import { JsonValidator, JsoncValidator } from './json.validator.js';
import { YamlValidator } from './yaml.validator.js';
import { XmlValidator } from './xml.validator.js';
import { CSharpValidator } from './csharp.validator.js';

export class CodeValidatorRegistry {
    private readonly byLanguage = new Map<string, CodeValidator>();

    /**
     * Register a validator for each of its languages.
     * A language that already has a validator is rejected unless `replace` is set.
     */
    register(validator: CodeValidator, replace: boolean = false): this {
        for (const language of validator.languages) {
            const key = language.toLowerCase();
            if (this.byLanguage.has(key) && !replace) {
                throw new ConfigurationError(`A validator for "${key}" is already registered`, {
                    language: key,
                });
            }
            this.byLanguage.set(key, validator);
        }
        return this;
    }

    get(language: string): CodeValidator | undefined {
        return this.byLanguage.get(language.toLowerCase());
    }

    has(language: string): boolean {
        return this.byLanguage.has(language.toLowerCase());
    }

    languages(): string[] {
        return [...this.byLanguage.keys()].sort();
    }
}

/**
 * Registry with the built-in validators
 */
export function createDefaultValidatorRegistry(): CodeValidatorRegistry {
    return new CodeValidatorRegistry()
        .register(new JsonValidator())
        .register(new JsoncValidator())
        .register(new YamlValidator())
        .register(new XmlValidator())
        .register(new CSharpValidator());
}
