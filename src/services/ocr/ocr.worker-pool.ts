import pLimit from 'p-limit';
import type { OcrConfig } from '../../types/config.types.js';
import type {
    IOcrEngine,
    IOcrWorkerPool,
    PageImage,
    PageResult,
    ProgressCallback,
} from '../../types/ocr.types.js';
import { errorMessage } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { clampConfidence } from './tesseract.engine.js';

/**
 * Mean page confidence; failed pages count as 0
 */
export function calculateConfidence(results: PageResult[]): number {
    if (results.length === 0) return 0;
    const total = results.reduce((sum, result) => sum + clampConfidence(result.confidence), 0);
    return clampConfidence(total / results.length);
}

/**
 * Page texts joined with newlines, in the order given
 */
export function combineText(results: PageResult[]): string {
    return results.map(result => result.text).join('\n');
}

/**
 * Bounded-concurrency OCR over page images
 *
 * All batches are dispatched at once; the shared limiter caps running OCR processes
 * across every document using this pool.
 */
export class OcrWorkerPool implements IOcrWorkerPool {
    readonly maxWorkers: number;
    private readonly batchSize: number;
    private readonly engine: IOcrEngine;
    private readonly logger: Logger;
    private readonly limit: ReturnType<typeof pLimit>;

    constructor(config: OcrConfig, engine: IOcrEngine, logger: Logger) {
        this.maxWorkers = config.maxWorkers;
        this.batchSize = config.batchSize;
        this.engine = engine;
        this.logger = logger;
        this.limit = pLimit(config.maxWorkers);
    }

    async processDocument(images: PageImage[], onProgress: ProgressCallback): Promise<PageResult[]> {
        const batches: PageImage[][] = [];
        for (let i = 0; i < images.length; i += this.batchSize) {
            batches.push(images.slice(i, i + this.batchSize));
        }

        this.logger.debug('OCR dispatch', {
            pages: images.length,
            batches: batches.length,
            maxWorkers: this.maxWorkers,
        });

        const batchResults = await Promise.all(
            batches.map(async batch => {
                const results = await Promise.all(
                    batch.map(image => this.limit(() => this.processPage(image)))
                );
                await onProgress(batch.length);
                return results;
            })
        );

        return batchResults.flat().sort((a, b) => a.pageNumber - b.pageNumber);
    }

    private async processPage(image: PageImage): Promise<PageResult> {
        try {
            const output = await this.engine.recognize(image);
            return {
                pageNumber: image.pageNumber,
                text: output.text,
                confidence: clampConfidence(output.confidence),
            };
        } catch (error) {
            const message = errorMessage(error);
            this.logger.warn('OCR failed for page', { pageNumber: image.pageNumber, error: message });
            return {
                pageNumber: image.pageNumber,
                text: '',
                confidence: 0,
                error: message,
            };
        }
    }
}
