/**
 * Mock OCR Engine
 */

import { vi } from 'vitest';
import type { OcrOutput, PageImage } from '../../src/types/ocr.types.js';

export type MockOcrEngine = {
    name: string;
    recognize: ReturnType<typeof vi.fn>;
};

/**
 * Engine that answers `page N` with confidence 90 for every image
 */
export function createMockOcrEngine(): MockOcrEngine {
    return {
        name: 'mock-ocr',
        recognize: vi.fn(async (image: PageImage): Promise<OcrOutput> => ({
            text: `page ${image.pageNumber}`,
            confidence: 90,
        })),
    };
}
