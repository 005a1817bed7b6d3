import { randomUUID } from 'crypto';
import type { LimitsConfig, RasterConfig } from '../types/config.types.js';
import type { ExtractOptions, ExtractResult } from '../types/extraction.types.js';
import type { IOcrWorkerPool, IPageRasterizer } from '../types/ocr.types.js';
import type { IPDFProcessor } from '../types/pdf-processor.types.js';
import { ProgressUnitEnum } from '../types/enums.js';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEventEmitter } from '../utils/events.js';
import { hashBuffer, shortHash } from '../utils/hash.js';
import type { MetricsRegistry } from '../services/metrics.service.js';
import type { ProgressTracker } from '../services/progress/progress.tracker.js';
import { calculateConfidence, combineText } from '../services/ocr/ocr.worker-pool.js';

/**
 * Dependencies for ExtractionEngine
 */
export interface ExtractionEngineDependencies {
    pdfProcessor: IPDFProcessor;
    rasterizer: IPageRasterizer;
    ocrPool: IOcrWorkerPool;
    progress: ProgressTracker;
    events: PipelineEventEmitter;
    metrics: MetricsRegistry;
}

/**
 * Single-document OCR: rasterize every page, OCR them in parallel and merge the text
 */
export class ExtractionEngine {
    private readonly raster: RasterConfig;
    private readonly limits: LimitsConfig;
    private readonly deps: ExtractionEngineDependencies;
    private readonly logger: Logger;

    constructor(
        config: { raster: RasterConfig; limits: LimitsConfig },
        deps: ExtractionEngineDependencies,
        logger: Logger
    ) {
        this.raster = config.raster;
        this.limits = config.limits;
        this.deps = deps;
        this.logger = logger;
    }

    async extract(buffer: Buffer, options: ExtractOptions): Promise<ExtractResult> {
        const { pdfProcessor, rasterizer, ocrPool, progress, events, metrics } = this.deps;
        const jobId = options.jobId ?? randomUUID();
        const dpi = options.dpi ?? this.raster.dpi;
        const startTime = Date.now();

        pdfProcessor.validateUpload(buffer, options.filename, { maxFileBytes: this.limits.maxFileBytes });

        const fileHash = hashBuffer(buffer);
        progress.start(jobId, ProgressUnitEnum.PAGES, 0);
        events.emit('extract:start', { jobId, filename: options.filename, dpi });
        this.logger.info('Starting extraction', {
            jobId,
            filename: options.filename,
            dpi,
            fileHash: shortHash(fileHash),
        });

        try {
            const raster = await rasterizer.rasterize(buffer, dpi);
            progress.setTotal(jobId, raster.pageCount);

            const pages = await ocrPool.processDocument(raster.pages, completed => {
                progress.advance(jobId, completed);
            });
            progress.complete(jobId);

            const failedPages = pages.filter(page => page.error !== undefined).map(page => page.pageNumber);
            const processingTimeSeconds = Math.round((Date.now() - startTime) / 10) / 100;

            const result: ExtractResult = {
                text: combineText(pages),
                confidence: calculateConfidence(pages),
                pages,
                metadata: {
                    jobId,
                    filename: options.filename,
                    numPages: raster.pageCount,
                    dpi,
                    processingTimeSeconds,
                    workers: ocrPool.maxWorkers,
                    fileHash,
                    pdfInfo: raster.metadata,
                    failedPages,
                },
            };

            metrics.increment('pdfs_processed_total');
            metrics.increment('pages_processed_total', undefined, pages.length);
            metrics.markProcessed();
            events.emit('extract:complete', result);
            this.logger.info('Extraction completed', {
                jobId,
                numPages: raster.pageCount,
                failedPages: failedPages.length,
                confidence: result.confidence,
                processingTimeSeconds,
            });

            return result;
        } catch (error) {
            const reason = errorMessage(error);
            progress.fail(jobId, reason);
            metrics.increment('pdfs_failed_total');
            events.emit('extract:error', {
                jobId,
                error: error instanceof Error ? error : new Error(reason),
            });
            this.logger.error('Extraction failed', { jobId, error: reason });
            throw error;
        }
    }
}
