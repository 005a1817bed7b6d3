import { randomUUID } from 'crypto';
import type { ChunkingConfig, LimitsConfig } from '../types/config.types.js';
import type { UploadOptions, UploadResult } from '../types/extraction.types.js';
import type { IPDFProcessor, IPdfChunker } from '../types/pdf-processor.types.js';
import type { Logger } from '../utils/logger.js';
import { removeDir } from '../utils/storage.js';
import { shortHash } from '../utils/hash.js';
import type { JobOrchestrator } from './job.orchestrator.js';

/**
 * Dependencies for IngestionEngine
 */
export interface IngestionEngineDependencies {
    pdfProcessor: IPDFProcessor;
    chunker: IPdfChunker;
    orchestrator: JobOrchestrator;
}

/**
 * Chunked ingestion: validate, split into chunk files, register the job and
 * hand every chunk to the orchestrator
 */
export class IngestionEngine {
    private readonly chunking: ChunkingConfig;
    private readonly limits: LimitsConfig;
    private readonly deps: IngestionEngineDependencies;
    private readonly logger: Logger;

    constructor(
        config: { chunking: ChunkingConfig; limits: LimitsConfig },
        deps: IngestionEngineDependencies,
        logger: Logger
    ) {
        this.chunking = config.chunking;
        this.limits = config.limits;
        this.deps = deps;
        this.logger = logger;
    }

    /**
     * Ingest a document
     * Splitting failures are fatal: nothing is registered and the chunk directory is gone.
     */
    async ingest(buffer: Buffer, options: UploadOptions): Promise<UploadResult> {
        const { pdfProcessor, chunker, orchestrator } = this.deps;
        const chunkSize = options.chunkSize ?? this.chunking.chunkSize;
        const overlap = options.overlap ?? this.chunking.overlap;

        pdfProcessor.validateUpload(buffer, options.filename, { maxFileBytes: this.limits.maxFileBytes });
        orchestrator.assertCapacity();

        const { metadata } = await pdfProcessor.load(buffer, options.filename);
        const jobId = randomUUID();

        this.logger.info('Starting ingestion', {
            jobId,
            filename: options.filename,
            pageCount: metadata.pageCount,
            fileHash: shortHash(metadata.fileHash),
            chunkSize,
            overlap,
        });

        const split = await chunker.split(buffer, {
            chunkSize,
            overlap,
            jobId,
            filename: options.filename,
        });

        try {
            orchestrator.createJob(options.filename, split.chunks, split.workDir, jobId);
        } catch (error) {
            await removeDir(split.workDir);
            throw error;
        }

        for (const chunk of split.chunks) {
            orchestrator.submitChunk(jobId, chunk);
        }

        return {
            jobId,
            fileName: options.filename,
            totalPages: split.totalPages,
            totalChunks: split.chunks.length,
        };
    }
}
