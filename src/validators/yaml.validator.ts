import * as yaml from 'js-yaml';
import type { CodeValidationResult, CodeValidator } from '../types/validator.types.js';

/**
 * YAML samples (docker-compose files, _config.yml excerpts); multi-document streams allowed
 */
export class YamlValidator implements CodeValidator {
    readonly languages: readonly string[] = ['yaml', 'yml'];

    validate(code: string): CodeValidationResult {
        try {
            yaml.loadAll(code);
            return { valid: true };
        } catch (error) {
            if (error instanceof yaml.YAMLException) {
                return {
                    valid: false,
                    message: error.reason || error.message.split('\n')[0] || error.message,
                    line: error.mark ? error.mark.line + 1 : undefined,
                };
            }
            throw error;
        }
    }
}
