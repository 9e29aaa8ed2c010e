import { z } from 'zod';
import type { RuleSetting } from './enums.js';

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * User-facing linter configuration
 */
export interface DocsiteLintConfig {
    /** Docs root directory */
    root: string;
    /** Language directory names (default: en, tr, de, ru) */
    languages?: string[];
    /** Language that translations are compared against (default: 'en') */
    defaultLanguage?: string;
    /** Front matter keys every page must carry (default: layout, title) */
    requiredKeys?: string[];
    /** Front matter keys that are not reported as unknown */
    allowedKeys?: string[];
    /** Page file extensions (default: .md, .markdown, .html) */
    extensions?: string[];
    /** Directory names skipped while walking the tree */
    exclude?: string[];
    /** Maximum files read in parallel (default: 8) */
    concurrency?: number;
    /** Per-rule severity override, or 'off' */
    rules?: Record<string, RuleSetting>;
    /** Logging configuration */
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    root: string;
    languages: string[];
    defaultLanguage: string;
    requiredKeys: string[];
    allowedKeys: string[];
    extensions: string[];
    exclude: string[];
    concurrency: number;
    rules: Record<string, RuleSetting>;
    logging: LogConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_LANGUAGES: readonly string[] = ['en', 'tr', 'de', 'ru'];

export const DEFAULT_REQUIRED_KEYS: readonly string[] = ['layout', 'title'];

export const DEFAULT_ALLOWED_KEYS: readonly string[] = [
    'layout',
    'title',
    'description',
    'lang',
    'nav_order',
    'hide_title',
    'permalink',
];

export const DEFAULT_EXTENSIONS: readonly string[] = ['.md', '.markdown', '.html'];

export const DEFAULT_EXCLUDE: readonly string[] = ['_site', 'node_modules', 'vendor', '.jekyll-cache'];

export const DEFAULT_CONCURRENCY = 8;

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'warn',
    structured: true,
};

const ruleSettingSchema = z.enum(['error', 'warning', 'info', 'off']);

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    root: z.string().min(1, 'Docs root is required'),
    languages: z
        .array(z.string().regex(/^[a-z]{2}(-[A-Za-z]{2})?$/, 'Language must be an ISO code like "tr" or "pt-BR"'))
        .min(1)
        .optional(),
    defaultLanguage: z.string().min(1).optional(),
    requiredKeys: z.array(z.string().min(1)).optional(),
    allowedKeys: z.array(z.string().min(1)).optional(),
    extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/i, 'Extension must start with a dot')).min(1).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    concurrency: z.number().int().min(1).max(64).optional(),
    rules: z.record(ruleSettingSchema).optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});

/**
 * Schema for a config file: the same options, root optional (the CLI argument wins)
 */
export const configFileSchema = configSchema.partial({ root: true }).strict();

export type DocsiteLintConfigFile = z.infer<typeof configFileSchema>;
