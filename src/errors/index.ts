/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Run ID the error belongs to */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID for a lint run
 */
export function generateCorrelationId(): string {
    return `dsl_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

let currentCorrelationId: string | undefined;

export function setCorrelationId(id: string): void {
    currentCorrelationId = id;
}

export function getCorrelationId(): string {
    return currentCorrelationId ?? generateCorrelationId();
}

export function clearCorrelationId(): void {
    currentCorrelationId = undefined;
}

/**
 * Base error class for docsite-lint
 * All errors extend this class for consistent handling
 */
export class DocsiteLintError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public override readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'DocsiteLintError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Wrap an unknown error into a DocsiteLintError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>, context?: ErrorContext) => DocsiteLintError,
    operation?: string
): DocsiteLintError {
    if (error instanceof DocsiteLintError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ErrorClass(
        originalError.message,
        { originalError: originalError.name },
        { cause: originalError, operation }
    );
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends DocsiteLintError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'CONFIGURATION_ERROR', details, context);
        this.name = 'ConfigurationError';
    }
}

/**
 * Errors reading the documentation tree
 */
export class SourceReadError extends DocsiteLintError {
    public readonly path?: string;

    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'SOURCE_READ_ERROR', details, context);
        this.name = 'SourceReadError';
        this.path = typeof details?.['path'] === 'string' ? details['path'] : undefined;
    }
}

/**
 * Errors parsing a page body (front matter errors are reported as diagnostics instead)
 */
export class ParseError extends DocsiteLintError {
    public readonly file?: string;

    constructor(message: string, file?: string, details?: Record<string, unknown>) {
        super(message, 'PARSE_ERROR', { file, ...details });
        this.name = 'ParseError';
        this.file = file;
    }
}

/**
 * Validation errors
 */
export class ValidationError extends DocsiteLintError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Not found errors
 */
export class NotFoundError extends DocsiteLintError {
    public readonly resourceType: string;
    public readonly resourceId: string;

    constructor(resourceType: string, resourceId: string) {
        super(`${resourceType} not found: ${resourceId}`, 'NOT_FOUND', {
            resourceType,
            resourceId,
        });
        this.name = 'NotFoundError';
        this.resourceType = resourceType;
        this.resourceId = resourceId;
    }
}

/**
 * A rule threw while checking the site
 */
export class RuleExecutionError extends DocsiteLintError {
    public readonly ruleId: string;

    constructor(ruleId: string, message: string, context?: ErrorContext) {
        super(`Rule ${ruleId} failed: ${message}`, 'RULE_EXECUTION_ERROR', { ruleId }, context);
        this.name = 'RuleExecutionError';
        this.ruleId = ruleId;
    }
}

/**
 * Unexpected failure during a lint run
 */
export class LintRunError extends DocsiteLintError {
    constructor(message: string, details?: Record<string, unknown>, context?: ErrorContext) {
        super(message, 'LINT_RUN_ERROR', details, context);
        this.name = 'LintRunError';
    }
}
