import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    file?: string;
    ruleId?: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = keyof Logger;

/**
 * Creates a Pino logger that injects the current run's correlation ID
 *
 * Structured mode writes JSON lines to stderr so report output on stdout stays
 * machine-readable; non-structured mode goes through pino-pretty.
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = config.structured === false
        ? pino({
            level: config.level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        })
        : pino({ level: config.level }, pino.destination(2));

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enrichedMeta = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enrichedMeta);
            return;
        }

        pinoLogger[level](enrichedMeta, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}

export { generateCorrelationId } from '../errors/index.js';
