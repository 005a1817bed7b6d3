/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for request tracing */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Error categories, used to pick HTTP status codes and retry behaviour
 */
export const ErrorCategoryEnum = {
    INVALID_INPUT: 'invalid_input',
    RESOURCE_EXHAUSTED: 'resource_exhausted',
    TOOL_FAILURE: 'tool_failure',
    DOWNSTREAM_UNAVAILABLE: 'downstream_unavailable',
    NOT_FOUND: 'not_found',
    CONFLICT: 'conflict',
    CONFIGURATION: 'configuration',
    INTERNAL: 'internal',
} as const;

export type ErrorCategory = (typeof ErrorCategoryEnum)[keyof typeof ErrorCategoryEnum];

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `ocr_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
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
 * Base error class for the pipeline
 * All errors extend this class for consistent handling
 */
export class OcrPipelineError extends Error {
    public readonly code: string;
    public readonly category: ErrorCategory;
    public readonly statusCode: number;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        options: {
            category?: ErrorCategory;
            statusCode?: number;
            details?: Record<string, unknown>;
        } = {},
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'OcrPipelineError';
        this.code = code;
        this.category = options.category ?? ErrorCategoryEnum.INTERNAL;
        this.statusCode = options.statusCode ?? 500;
        this.details = options.details;
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
            category: this.category,
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
 * Wrap an unknown error into an OcrPipelineError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>) => OcrPipelineError,
    operation?: string
): OcrPipelineError {
    if (error instanceof OcrPipelineError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    const wrapped = new ErrorClass(originalError.message, {
        originalError: originalError.name,
    });

    Object.defineProperty(wrapped, 'cause', { value: originalError });
    Object.defineProperty(wrapped, 'operation', { value: operation });

    return wrapped;
}

/**
 * Read the message of any thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

// ============================================
// Invalid input
// ============================================

/**
 * Request validation errors
 */
export class ValidationError extends OcrPipelineError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', {
            category: ErrorCategoryEnum.INVALID_INPUT,
            statusCode: 400,
            details: { field, ...details },
        });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * The input is not a readable PDF (wrong type, empty, corrupt, no pages)
 */
export class InvalidDocumentError extends OcrPipelineError {
    public readonly filename?: string;

    constructor(message: string, filename?: string, details?: Record<string, unknown>) {
        super(message, 'INVALID_DOCUMENT', {
            category: ErrorCategoryEnum.INVALID_INPUT,
            statusCode: 400,
            details: { filename, ...details },
        });
        this.name = 'InvalidDocumentError';
        this.filename = filename;
    }
}

// ============================================
// Resource exhaustion
// ============================================

export class FileTooLargeError extends OcrPipelineError {
    /** Undefined when the upload was cut off at the limit */
    public readonly sizeBytes?: number;
    public readonly maxBytes: number;

    constructor(sizeBytes: number | undefined, maxBytes: number) {
        const message = sizeBytes === undefined
            ? `File exceeds limit of ${maxBytes} bytes`
            : `File size ${sizeBytes} bytes exceeds limit of ${maxBytes} bytes`;
        super(message, 'FILE_TOO_LARGE', {
            category: ErrorCategoryEnum.RESOURCE_EXHAUSTED,
            statusCode: 413,
            details: { sizeBytes, maxBytes },
        });
        this.name = 'FileTooLargeError';
        this.sizeBytes = sizeBytes;
        this.maxBytes = maxBytes;
    }
}

export class ChunkTooLargeError extends OcrPipelineError {
    public readonly chunkIndex: number;
    public readonly sizeBytes: number;
    public readonly maxBytes: number;

    constructor(chunkIndex: number, sizeBytes: number, maxBytes: number) {
        super(
            `Chunk ${chunkIndex} is ${sizeBytes} bytes, exceeding the ${maxBytes} byte chunk limit`,
            'CHUNK_TOO_LARGE',
            {
                category: ErrorCategoryEnum.RESOURCE_EXHAUSTED,
                statusCode: 413,
                details: { chunkIndex, sizeBytes, maxBytes },
            }
        );
        this.name = 'ChunkTooLargeError';
        this.chunkIndex = chunkIndex;
        this.sizeBytes = sizeBytes;
        this.maxBytes = maxBytes;
    }
}

export class InsufficientStorageError extends OcrPipelineError {
    public readonly requiredBytes: number;
    public readonly availableBytes: number;

    constructor(requiredBytes: number, availableBytes: number, directory: string) {
        super(
            `Insufficient storage in ${directory}: ${requiredBytes} bytes required, ${availableBytes} available`,
            'INSUFFICIENT_STORAGE',
            {
                category: ErrorCategoryEnum.RESOURCE_EXHAUSTED,
                statusCode: 507,
                details: { requiredBytes, availableBytes, directory },
            }
        );
        this.name = 'InsufficientStorageError';
        this.requiredBytes = requiredBytes;
        this.availableBytes = availableBytes;
    }
}

export class QueueFullError extends OcrPipelineError {
    constructor(activeJobs: number, maxActiveJobs: number) {
        super(`Processing queue is full (${activeJobs}/${maxActiveJobs} active jobs)`, 'QUEUE_FULL', {
            category: ErrorCategoryEnum.RESOURCE_EXHAUSTED,
            statusCode: 429,
            details: { activeJobs, maxActiveJobs },
        });
        this.name = 'QueueFullError';
    }
}

// ============================================
// Tool failures
// ============================================

/**
 * An external tool (pdfinfo, pdftoppm, tesseract) failed or produced unexpected output
 */
export class ToolFailureError extends OcrPipelineError {
    public readonly tool: string;
    public readonly exitCode?: number;

    constructor(
        message: string,
        tool: string,
        options: { exitCode?: number; code?: string; details?: Record<string, unknown> } = {}
    ) {
        super(message, options.code ?? 'TOOL_FAILURE', {
            category: ErrorCategoryEnum.TOOL_FAILURE,
            statusCode: 500,
            details: { tool, exitCode: options.exitCode, ...options.details },
        });
        this.name = 'ToolFailureError';
        this.tool = tool;
        this.exitCode = options.exitCode;
    }
}

/**
 * Rasterization produced no usable images
 */
export class ConversionError extends ToolFailureError {
    constructor(message: string, options: { exitCode?: number; details?: Record<string, unknown> } = {}) {
        super(message, 'pdftoppm', { ...options, code: 'CONVERSION_ERROR' });
        this.name = 'ConversionError';
    }
}

// ============================================
// Downstream availability
// ============================================

/**
 * Circuit breaker rejected the call
 */
export class ServiceUnavailableError extends OcrPipelineError {
    public readonly service: string;
    public readonly retryAfterMs?: number;

    constructor(service: string, retryAfterMs?: number) {
        super(`Service temporarily unavailable: ${service}`, 'SERVICE_UNAVAILABLE', {
            category: ErrorCategoryEnum.DOWNSTREAM_UNAVAILABLE,
            statusCode: 503,
            details: { service, retryAfterMs },
        });
        this.name = 'ServiceUnavailableError';
        this.service = service;
        this.retryAfterMs = retryAfterMs;
    }
}

export class TimeoutError extends OcrPipelineError {
    public readonly timeoutMs: number;

    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', {
            category: ErrorCategoryEnum.DOWNSTREAM_UNAVAILABLE,
            statusCode: 504,
            details: { operation, timeoutMs },
        });
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Chunk analysis provider API errors
 */
export class AnalysisProviderError extends OcrPipelineError {
    public readonly provider: string;
    public readonly providerStatus?: number;
    public readonly retryable: boolean;

    constructor(
        message: string,
        provider: string,
        options: {
            providerStatus?: number;
            retryable?: boolean;
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(message, 'ANALYSIS_PROVIDER_ERROR', {
            category: ErrorCategoryEnum.DOWNSTREAM_UNAVAILABLE,
            statusCode: 502,
            details: { provider, providerStatus: options.providerStatus, ...options.details },
        });
        this.name = 'AnalysisProviderError';
        this.provider = provider;
        this.providerStatus = options.providerStatus;
        this.retryable = options.retryable ?? false;
    }
}

// ============================================
// Lookup and state
// ============================================

export class NotFoundError extends OcrPipelineError {
    public readonly resourceType: string;
    public readonly resourceId: string;

    constructor(resourceType: string, resourceId: string) {
        super(`${resourceType} not found: ${resourceId}`, 'NOT_FOUND', {
            category: ErrorCategoryEnum.NOT_FOUND,
            statusCode: 404,
            details: { resourceType, resourceId },
        });
        this.name = 'NotFoundError';
        this.resourceType = resourceType;
        this.resourceId = resourceId;
    }
}

export class JobNotReadyError extends OcrPipelineError {
    public readonly jobId: string;

    constructor(jobId: string, status: string) {
        super(`Job ${jobId} is not complete (status: ${status})`, 'JOB_NOT_READY', {
            category: ErrorCategoryEnum.CONFLICT,
            statusCode: 400,
            details: { jobId, status },
        });
        this.name = 'JobNotReadyError';
        this.jobId = jobId;
    }
}

export class ConfigurationError extends OcrPipelineError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', {
            category: ErrorCategoryEnum.CONFIGURATION,
            statusCode: 500,
            details,
        });
        this.name = 'ConfigurationError';
    }
}
