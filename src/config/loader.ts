import * as fs from 'fs/promises';
import type {
    DocsiteLintConfig,
    DocsiteLintConfigFile,
    ResolvedConfig,
} from '../types/config.types.js';
import {
    configFileSchema,
    configSchema,
    DEFAULT_ALLOWED_KEYS,
    DEFAULT_CONCURRENCY,
    DEFAULT_EXCLUDE,
    DEFAULT_EXTENSIONS,
    DEFAULT_LANGUAGES,
    DEFAULT_LOG_CONFIG,
    DEFAULT_REQUIRED_KEYS,
} from '../types/config.types.js';
import { RuleIdEnum } from '../types/enums.js';
import { ConfigurationError } from '../errors/index.js';

const KNOWN_RULE_IDS = new Set<string>(Object.values(RuleIdEnum));

/**
 * Validate user config and apply defaults
 */
export function resolveConfig(userConfig: DocsiteLintConfig): ResolvedConfig {
    const validation = configSchema.safeParse(userConfig);
    if (!validation.success) {
        throw new ConfigurationError('Invalid configuration', {
            errors: validation.error.issues,
        });
    }

    const languages = userConfig.languages ?? [...DEFAULT_LANGUAGES];
    const defaultLanguage = userConfig.defaultLanguage ?? languages[0] ?? 'en';
    if (!languages.includes(defaultLanguage)) {
        throw new ConfigurationError(
            `Default language "${defaultLanguage}" is not one of the configured languages`,
            { languages, defaultLanguage }
        );
    }

    const rules = userConfig.rules ?? {};
    const unknownRules = Object.keys(rules).filter((id) => !KNOWN_RULE_IDS.has(id));
    if (unknownRules.length > 0) {
        throw new ConfigurationError(`Unknown rule id: ${unknownRules.join(', ')}`, {
            unknownRules,
        });
    }

    // Required keys are always allowed
    const requiredKeys = userConfig.requiredKeys ?? [...DEFAULT_REQUIRED_KEYS];
    const allowedKeys = [
        ...new Set([...(userConfig.allowedKeys ?? DEFAULT_ALLOWED_KEYS), ...requiredKeys]),
    ];

    return {
        root: userConfig.root,
        languages,
        defaultLanguage,
        requiredKeys,
        allowedKeys,
        extensions: (userConfig.extensions ?? [...DEFAULT_EXTENSIONS]).map((ext) => ext.toLowerCase()),
        exclude: userConfig.exclude ?? [...DEFAULT_EXCLUDE],
        concurrency: userConfig.concurrency ?? DEFAULT_CONCURRENCY,
        rules: { ...rules },
        logging: {
            ...DEFAULT_LOG_CONFIG,
            ...userConfig.logging,
        },
    };
}

/**
 * Read and validate a JSON config file
 */
export async function loadConfigFile(filePath: string): Promise<DocsiteLintConfigFile> {
    let raw: string;
    try {
        raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read config file: ${filePath}`, { filePath }, {
            cause: error instanceof Error ? error : undefined,
            operation: 'loadConfigFile',
        });
    }

    return parseConfigFile(raw, filePath);
}

/**
 * Validate config file content
 */
export function parseConfigFile(raw: string, filePath: string = '<inline>'): DocsiteLintConfigFile {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Config file is not valid JSON: ${filePath}`, {
            filePath,
            reason: error instanceof Error ? error.message : String(error),
        });
    }

    const result = configFileSchema.safeParse(json);
    if (!result.success) {
        const errors = result.error.issues
            .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('\n');
        throw new ConfigurationError(`Invalid config file ${filePath}:\n${errors}`, {
            filePath,
            errors: result.error.issues,
        });
    }

    return result.data;
}

/**
 * Check whether a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}
