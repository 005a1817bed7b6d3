/**
 * Global Test Setup
 *
 * Resets mocks between tests.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { clearCorrelationId } from '../src/errors/index.js';

// ========================================
// MOCK RESET
// ========================================

beforeEach(() => {
    // Clear all vi.fn() mocks
    vi.clearAllMocks();
});

afterEach(() => {
    vi.useRealTimers();
    clearCorrelationId();
});

// ========================================
// GLOBAL TEST HELPERS
// ========================================

/**
 * Wait for a specific duration (useful for async tests)
 */
export async function wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Create a deferred promise for testing async flows
 */
export function createDeferred<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: Error) => void;
} {
    let resolve!: (value: T) => void;
    let reject!: (error: Error) => void;

    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });

    return { promise, resolve, reject };
}
