import * as fs from 'fs/promises';
import type { AnalysisResult, ChunkContext } from '../../types/analysis-provider.types.js';
import type { IOcrWorkerPool, IPageRasterizer } from '../../types/ocr.types.js';
import { AnalysisProviderEnum } from '../../types/enums.js';
import type { Logger } from '../../utils/logger.js';
import { calculateConfidence, combineText } from '../ocr/ocr.worker-pool.js';
import { BaseAnalysisProvider } from './base.provider.js';

export interface OcrAnalysisDependencies {
    rasterizer: IPageRasterizer;
    ocrPool: IOcrWorkerPool;
}

/**
 * Local chunk analysis: rasterize the chunk and OCR its pages
 */
export class OcrAnalysisProvider extends BaseAnalysisProvider {
    readonly name = AnalysisProviderEnum.OCR;
    private readonly dpi: number;
    private readonly rasterizer: IPageRasterizer;
    private readonly ocrPool: IOcrWorkerPool;
    private readonly logger: Logger;

    constructor(
        config: { dpi: number; confidenceThreshold: number },
        deps: OcrAnalysisDependencies,
        logger: Logger
    ) {
        super(config.confidenceThreshold);
        this.dpi = config.dpi;
        this.rasterizer = deps.rasterizer;
        this.ocrPool = deps.ocrPool;
        this.logger = logger;
    }

    protected async analyze(filePath: string, context: ChunkContext): Promise<AnalysisResult> {
        const bytes = await fs.readFile(filePath);
        const raster = await this.rasterizer.rasterize(bytes, this.dpi);
        // Chunk jobs track progress per chunk, not per page
        const pages = await this.ocrPool.processDocument(raster.pages, () => undefined);
        const failedPages = pages.filter(page => page.error !== undefined).length;

        this.logger.debug('Chunk OCR finished', {
            jobId: context.jobId,
            chunkIndex: context.chunkIndex,
            pages: pages.length,
            failedPages,
        });

        return {
            content: combineText(pages),
            confidence: calculateConfidence(pages),
            model: 'tesseract',
        };
    }
}
