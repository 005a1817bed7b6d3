import type { AnalysisConfig } from '../types/config.types.js';
import {
    AnalysisProviderError,
    ServiceUnavailableError,
    TimeoutError,
} from '../errors/index.js';

export interface RetryOptions {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    retryableErrors?: string[];
    onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Default retry options from analysis config
 */
export function getRetryOptions(analysisConfig: AnalysisConfig): RetryOptions {
    return {
        maxRetries: analysisConfig.maxRetries,
        initialDelayMs: analysisConfig.retryDelayMs,
        maxDelayMs: 30000,
        backoffMultiplier: analysisConfig.backoffMultiplier,
        retryableErrors: ['429', '503', 'ECONNRESET', 'ETIMEDOUT'],
    };
}

/**
 * Check if an error is retryable
 * Breaker rejections never are: the breaker decides when the service may be called again.
 */
export function isRetryableError(error: Error, retryableErrors: string[] = []): boolean {
    if (error instanceof ServiceUnavailableError) {
        return false;
    }

    if (error instanceof TimeoutError) {
        return true;
    }

    if (error instanceof AnalysisProviderError) {
        return error.retryable;
    }

    const errorString = error.message + (error.name || '');
    return retryableErrors.some(pattern =>
        errorString.includes(pattern) || error.name.includes(pattern)
    );
}

/**
 * Calculate delay with exponential backoff
 */
export function calculateBackoffDelay(
    attempt: number,
    initialDelayMs: number,
    backoffMultiplier: number,
    maxDelayMs: number
): number {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
    // Add jitter (±10%)
    const jitter = delay * 0.1 * (Math.random() * 2 - 1);
    return Math.min(delay + jitter, maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions
): Promise<T> {
    let lastError: Error = new Error('withRetry made no attempts');

    for (let attempt = 1; attempt <= options.maxRetries + 1; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            if (attempt > options.maxRetries) {
                break;
            }

            if (!isRetryableError(lastError, options.retryableErrors)) {
                throw lastError;
            }

            const delayMs = calculateBackoffDelay(
                attempt,
                options.initialDelayMs,
                options.backoffMultiplier,
                options.maxDelayMs
            );

            options.onRetry?.(attempt, lastError, delayMs);

            await sleep(delayMs);
        }
    }

    throw lastError;
}
