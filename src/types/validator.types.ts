/**
 * Outcome of checking one code sample
 */
export type CodeValidationResult =
    | { valid: true }
    | { valid: false; message: string; /** 1-based line within the sample */ line?: number };

/**
 * Syntax checker for one family of code sample languages
 */
export interface CodeValidator {
    /** Language tags (and aliases) this validator handles, lower-case */
    readonly languages: readonly string[];
    validate(code: string): CodeValidationResult;
}
