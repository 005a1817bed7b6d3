/**
 * Mock Storage Probe
 */

import { vi } from 'vitest';

export type MockStorageProbe = {
    freeBytes: ReturnType<typeof vi.fn>;
};

/**
 * Probe reporting a fixed amount of free space
 */
export function createMockStorageProbe(freeBytes: number = 10 * 1024 * 1024 * 1024): MockStorageProbe {
    return {
        freeBytes: vi.fn().mockResolvedValue(freeBytes),
    };
}
