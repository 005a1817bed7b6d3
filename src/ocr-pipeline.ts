import type { ResolvedConfig } from './types/config.types.js';
import type { IAnalysisProvider } from './types/analysis-provider.types.js';
import type { ExtractOptions, ExtractResult, UploadOptions, UploadResult } from './types/extraction.types.js';
import type { JobResultView, JobStatusView } from './types/job.types.js';
import type { ProgressSnapshot } from './types/progress.types.js';
import type { HealthReport, MetricsReport } from './types/health.types.js';
import { PACKAGE_VERSION } from './config/constants.js';
import { NotFoundError } from './errors/index.js';
import type { Logger } from './utils/logger.js';
import type { PipelineEventEmitter } from './utils/events.js';
import type { CircuitBreakerRegistry } from './services/circuit-breaker.js';
import type { MetricsRegistry } from './services/metrics.service.js';
import type { ProgressTracker } from './services/progress/progress.tracker.js';
import type { ProgressStream } from './services/progress/progress.stream.js';
import type { JobOrchestrator } from './engines/job.orchestrator.js';
import type { ExtractionEngine } from './engines/extraction.engine.js';
import type { IngestionEngine } from './engines/ingestion.engine.js';

/**
 * Wired collaborators of an OcrPipeline
 */
export interface OcrPipelineComponents {
    logger: Logger;
    events: PipelineEventEmitter;
    metrics: MetricsRegistry;
    breakers: CircuitBreakerRegistry;
    progress: ProgressTracker;
    provider: IAnalysisProvider;
    orchestrator: JobOrchestrator;
    extractionEngine: ExtractionEngine;
    ingestionEngine: IngestionEngine;
}

/**
 * PDF OCR pipeline
 *
 * Two entry points share the same rasterizer, OCR pool and progress tracking:
 * `extract` OCRs a whole document and returns the text, `upload` splits it into
 * chunk jobs that are analysed in the background and polled via `getStatus` /
 * `getResult`.
 *
 * @example
 * ```typescript
 * import { createOcrPipeline } from 'pdf-ocr-pipeline';
 *
 * const pipeline = createOcrPipeline({ raster: { dpi: 300 } });
 *
 * const { text, confidence } = await pipeline.extract(pdfBuffer, { filename: 'scan.pdf' });
 *
 * const { jobId } = await pipeline.upload(pdfBuffer, { filename: 'book.pdf', chunkSize: 10 });
 * for await (const update of pipeline.streamProgress(jobId)) {
 *   console.log(update.percentage);
 * }
 * const merged = pipeline.getResult(jobId);
 * ```
 */
export class OcrPipeline {
    private readonly config: ResolvedConfig;
    private readonly components: OcrPipelineComponents;
    private readonly startedAt = Date.now();

    constructor(config: ResolvedConfig, components: OcrPipelineComponents) {
        this.config = config;
        this.components = components;
    }

    /** Typed pipeline events */
    get events(): PipelineEventEmitter {
        return this.components.events;
    }

    get logger(): Logger {
        return this.components.logger;
    }

    /**
     * Get the resolved configuration
     */
    getConfig(): ResolvedConfig {
        return this.config;
    }

    // ============================================
    // SINGLE-DOCUMENT OCR
    // ============================================

    /**
     * Rasterize and OCR every page of a document
     */
    async extract(buffer: Buffer, options: ExtractOptions): Promise<ExtractResult> {
        return this.components.extractionEngine.extract(buffer, options);
    }

    // ============================================
    // CHUNK JOBS
    // ============================================

    /**
     * Split a document into chunk jobs; analysis continues in the background
     */
    async upload(buffer: Buffer, options: UploadOptions): Promise<UploadResult> {
        return this.components.ingestionEngine.ingest(buffer, options);
    }

    getStatus(jobId: string): JobStatusView {
        return this.components.orchestrator.getStatus(jobId);
    }

    /**
     * @throws JobNotReadyError while the job is processing
     */
    getResult(jobId: string): JobResultView {
        return this.components.orchestrator.getResult(jobId);
    }

    // ============================================
    // PROGRESS
    // ============================================

    /**
     * @throws NotFoundError when no progress record exists
     */
    getProgress(jobId: string): ProgressSnapshot {
        const snapshot = this.components.progress.snapshot(jobId);
        if (!snapshot) {
            throw new NotFoundError('Job', jobId);
        }
        return snapshot;
    }

    /**
     * Live progress updates, ending after the terminal one
     * @throws NotFoundError when no progress record exists
     */
    streamProgress(jobId: string): ProgressStream {
        return this.components.progress.stream(jobId);
    }

    // ============================================
    // HEALTH & METRICS
    // ============================================

    health(): HealthReport {
        const { orchestrator, breakers, metrics } = this.components;
        const lastProcessedAt = metrics.getLastProcessedAt();

        return {
            status: breakers.allClosed() ? 'healthy' : 'degraded',
            version: PACKAGE_VERSION,
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
            activeJobs: orchestrator.activeJobs(),
            queueDepth: orchestrator.queueDepth(),
            breakers: breakers.snapshot(),
            ...(lastProcessedAt && { lastProcessedAt: lastProcessedAt.toISOString() }),
        };
    }

    metrics(): MetricsReport {
        const { metrics, breakers, provider } = this.components;
        return {
            ...metrics.snapshot(),
            breakers: breakers.snapshot(),
            analysis: provider.getMetrics(),
        };
    }

    /**
     * Count a handled HTTP request
     */
    recordRequest(route: string): void {
        this.components.metrics.increment('requests_total', { route });
    }

    /**
     * Wait for in-flight chunks and cancel pending evictions
     */
    async shutdown(): Promise<void> {
        this.components.logger.info('Shutting down OCR pipeline');
        await this.components.orchestrator.drain();
        this.components.orchestrator.dispose();
        this.components.events.removeAllListeners();
    }
}
