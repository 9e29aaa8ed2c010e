/**
 * Centralized Environment Configuration
 *
 * Validates environment variables with Zod.
 * Import this module instead of accessing process.env directly.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'warn'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('warn')
        .describe('Log level: debug, info, warn, error'),

    /**
     * Pretty-print logs instead of JSON lines
     */
    LOG_PRETTY: z
        .enum(['true', 'false', '1', '0'])
        .optional()
        .transform((value) => value === 'true' || value === '1')
        .describe('Pretty-print logs through pino-pretty'),

    /**
     * Default docs root when the CLI is given none
     */
    DOCSITE_ROOT: z
        .string()
        .optional()
        .describe('Default documentation root directory'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}
