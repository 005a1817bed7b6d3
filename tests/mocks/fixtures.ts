/**
 * Test Fixtures
 *
 * Factory functions for creating test data. PDFs are built in memory with pdf-lib.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { OcrPipelineConfig, ResolvedConfig } from '../../src/types/config.types.js';
import type { Chunk, ChunkResult } from '../../src/types/job.types.js';
import type { PageImage } from '../../src/types/ocr.types.js';
import { ChunkStatusEnum } from '../../src/types/enums.js';
import { OcrPipelineFactory } from '../../src/ocr-pipeline.factory.js';

// ========================================
// PDF FIXTURES
// ========================================

/**
 * A real PDF with `pageCount` pages, each labelled `Page N`
 */
export async function createPdfBuffer(pageCount: number, options: { title?: string } = {}): Promise<Buffer> {
    const document = await PDFDocument.create();
    const font = await document.embedFont(StandardFonts.Helvetica);

    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        const page = document.addPage([200, 200]);
        page.drawText(`Page ${pageNumber}`, { x: 20, y: 100, size: 18, font });
    }
    if (options.title !== undefined) {
        document.setTitle(options.title);
    }

    return Buffer.from(await document.save());
}

export function createPageImages(count: number, dpi: number = 200): PageImage[] {
    return Array.from({ length: count }, (_, i) => ({
        pageNumber: i + 1,
        data: Buffer.from(`image-${i + 1}`),
        dpi,
    }));
}

// ========================================
// JOB FIXTURES
// ========================================

export function createChunk(index: number, startPage: number, endPage: number, jobId: string = 'job-1'): Chunk {
    return {
        id: `${jobId}-${index}`,
        index,
        filePath: `/tmp/${jobId}/chunk_${index}.pdf`,
        startPage,
        endPage,
        pageCount: endPage - startPage + 1,
        sizeBytes: 1024,
    };
}

export function createChunkResult(chunk: Chunk, overrides: Partial<ChunkResult> = {}): ChunkResult {
    return {
        chunkId: chunk.id,
        index: chunk.index,
        startPage: chunk.startPage,
        endPage: chunk.endPage,
        status: ChunkStatusEnum.COMPLETED,
        content: `text of pages ${chunk.startPage}-${chunk.endPage}`,
        confidence: 80,
        model: 'mock-model',
        processingMs: 5,
        retryCount: 0,
        ...overrides,
    };
}

// ========================================
// CONFIG & FILESYSTEM
// ========================================

/**
 * Resolved config for tests: small pools, quiet logging, no retry delay
 */
export function createTestConfig(workDir: string, overrides: OcrPipelineConfig = {}): ResolvedConfig {
    return OcrPipelineFactory.resolveConfig({
        workDir,
        ...overrides,
        ocr: { maxWorkers: 2, batchSize: 2, ...overrides.ocr },
        analysis: { retryDelayMs: 0, ...overrides.analysis },
        logging: { level: 'error', ...overrides.logging },
    });
}

export async function createTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'pdf-ocr-test-'));
}

export async function listFiles(directory: string): Promise<string[]> {
    try {
        return (await fs.readdir(directory)).sort();
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return [];
        }
        throw error;
    }
}
