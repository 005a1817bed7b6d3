import * as fs from 'fs/promises';
import * as path from 'path';
import { PDFDocument } from 'pdf-lib';
import type { ChunkingConfig, LimitsConfig } from '../types/config.types.js';
import type { Chunk } from '../types/job.types.js';
import type {
    ChunkWindow,
    IPdfChunker,
    SplitOptions,
    SplitResult,
} from '../types/pdf-processor.types.js';
import {
    ChunkTooLargeError,
    InsufficientStorageError,
    ValidationError,
} from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { ensureDir, removeDir, type IStorageProbe } from '../utils/storage.js';
import { openPdf } from './pdf.processor.js';

export interface PdfChunkerDependencies {
    storage: IStorageProbe;
}

/**
 * Plan overlapping page windows over a document
 *
 * The window start always advances by at least one page, so an overlap equal to or
 * larger than the chunk size still terminates.
 *
 * @example
 * ```typescript
 * planChunkWindows(45, 20, 2);
 * // [{ index: 0, startPage: 1, endPage: 20 }, { index: 1, startPage: 19, endPage: 38 },
 * //  { index: 2, startPage: 37, endPage: 45 }]
 * ```
 */
export function planChunkWindows(totalPages: number, chunkSize: number, overlap: number): ChunkWindow[] {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
        throw new ValidationError('Chunk size must be a positive integer', 'chunkSize', { chunkSize });
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new ValidationError('Overlap must be a non-negative integer', 'overlap', { overlap });
    }
    if (totalPages < 1) {
        return [];
    }

    if (totalPages <= chunkSize) {
        return [{ index: 0, startPage: 1, endPage: totalPages }];
    }

    const step = Math.max(1, chunkSize - overlap);
    const windows: ChunkWindow[] = [];

    for (let start = 1; ; start += step) {
        const end = Math.min(start + chunkSize - 1, totalPages);
        windows.push({ index: windows.length, startPage: start, endPage: end });
        if (end >= totalPages) break;
    }

    return windows;
}

/**
 * Writes each planned window as a standalone PDF under `<workDir>/<jobId>/`
 */
export class PdfChunker implements IPdfChunker {
    private readonly workDir: string;
    private readonly chunking: ChunkingConfig;
    private readonly limits: LimitsConfig;
    private readonly storage: IStorageProbe;
    private readonly logger: Logger;

    constructor(
        config: { workDir: string; chunking: ChunkingConfig; limits: LimitsConfig },
        deps: PdfChunkerDependencies,
        logger: Logger
    ) {
        this.workDir = config.workDir;
        this.chunking = config.chunking;
        this.limits = config.limits;
        this.storage = deps.storage;
        this.logger = logger;
    }

    async split(pdfBytes: Buffer, options: SplitOptions): Promise<SplitResult> {
        const source = await openPdf(pdfBytes, options.filename ?? 'document.pdf');
        const totalPages = source.getPageCount();
        const windows = planChunkWindows(totalPages, options.chunkSize, options.overlap);

        const jobDir = path.join(this.workDir, options.jobId);
        await ensureDir(jobDir);

        try {
            const chunks: Chunk[] = [];
            for (const window of windows) {
                chunks.push(await this.writeChunk(source, window, options.jobId, jobDir));
            }

            this.logger.info('PDF split into chunks', {
                jobId: options.jobId,
                totalPages,
                chunks: chunks.length,
                chunkSize: options.chunkSize,
                overlap: options.overlap,
            });

            return { totalPages, chunks, workDir: jobDir };
        } catch (error) {
            await removeDir(jobDir);
            throw error;
        }
    }

    private async writeChunk(
        source: PDFDocument,
        window: ChunkWindow,
        jobId: string,
        jobDir: string
    ): Promise<Chunk> {
        const chunkDoc = await PDFDocument.create();
        const indices = Array.from(
            { length: window.endPage - window.startPage + 1 },
            (_, i) => window.startPage - 1 + i
        );
        const pages = await chunkDoc.copyPages(source, indices);
        pages.forEach(page => chunkDoc.addPage(page));
        const bytes = await chunkDoc.save();

        if (bytes.length > this.chunking.maxChunkBytes) {
            throw new ChunkTooLargeError(window.index, bytes.length, this.chunking.maxChunkBytes);
        }

        const available = await this.storage.freeBytes(jobDir);
        const required = bytes.length + this.limits.minFreeBytes;
        if (available < required) {
            throw new InsufficientStorageError(required, available, this.workDir);
        }

        const filePath = path.join(jobDir, `chunk_${window.index}.pdf`);
        await fs.writeFile(filePath, bytes);

        this.logger.debug('Chunk written', {
            jobId,
            chunkIndex: window.index,
            startPage: window.startPage,
            endPage: window.endPage,
            sizeBytes: bytes.length,
        });

        return {
            id: `${jobId}-${window.index}`,
            index: window.index,
            filePath,
            startPage: window.startPage,
            endPage: window.endPage,
            pageCount: window.endPage - window.startPage + 1,
            sizeBytes: bytes.length,
        };
    }
}
