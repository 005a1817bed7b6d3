import * as os from 'os';
import * as path from 'path';
import { OcrPipeline } from './ocr-pipeline.js';
import type { OcrPipelineConfig, ResolvedConfig } from './types/config.types.js';
import {
    configSchema,
    DEFAULT_ANALYSIS_CONFIG,
    DEFAULT_BREAKER_CONFIG,
    DEFAULT_CHUNKING_CONFIG,
    DEFAULT_LIMITS_CONFIG,
    DEFAULT_LOG_CONFIG,
    DEFAULT_OCR_CONFIG,
    DEFAULT_ORCHESTRATOR_CONFIG,
    DEFAULT_RASTER_CONFIG,
} from './types/config.types.js';
import type { IAnalysisProvider } from './types/analysis-provider.types.js';
import type { IOcrEngine } from './types/ocr.types.js';
import type { IJobStore } from './types/store.types.js';
import type { IProgressStore } from './types/progress.types.js';
import { OCR_DEFAULTS } from './config/constants.js';
import { ConfigurationError } from './errors/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { createEventEmitter } from './utils/events.js';
import { StatfsStorageProbe, type IStorageProbe } from './utils/storage.js';
import { SpawnCommandRunner, type ICommandRunner } from './services/command.runner.js';
import { CircuitBreakerRegistry } from './services/circuit-breaker.js';
import { MetricsRegistry } from './services/metrics.service.js';
import { PDFProcessor } from './services/pdf.processor.js';
import { PageRasterizer } from './services/pdf.rasterizer.js';
import { PdfChunker } from './services/pdf.chunker.js';
import { TesseractOcrEngine } from './services/ocr/tesseract.engine.js';
import { OcrWorkerPool } from './services/ocr/ocr.worker-pool.js';
import { ProgressTracker } from './services/progress/progress.tracker.js';
import { createAnalysisProvider } from './services/analysis/provider.factory.js';
import { InMemoryJobStore, InMemoryProgressStore } from './stores/index.js';
import { JobOrchestrator } from './engines/job.orchestrator.js';
import { ExtractionEngine } from './engines/extraction.engine.js';
import { IngestionEngine } from './engines/ingestion.engine.js';

/**
 * Replaceable collaborators, mainly for tests
 */
export interface OcrPipelineOverrides {
    logger?: Logger;
    runner?: ICommandRunner;
    storage?: IStorageProbe;
    ocrEngine?: IOcrEngine;
    analysisProvider?: IAnalysisProvider;
    jobStore?: IJobStore;
    progressStore?: IProgressStore;
}

/**
 * Default OCR concurrency: one process per core plus a few for I/O waits
 */
export function defaultMaxWorkers(cpuCount: number = os.cpus().length): number {
    return Math.min(OCR_DEFAULTS.MAX_DEFAULT_WORKERS, cpuCount + 4);
}

/**
 * Factory for creating OcrPipeline instances with every dependency wired
 *
 * @example
 * ```typescript
 * const pipeline = OcrPipelineFactory.create({
 *   raster: { dpi: 300 },
 *   analysis: { provider: 'openai', apiKey: process.env.OPENAI_API_KEY },
 * });
 *
 * const { jobId } = await pipeline.upload(pdfBuffer, { filename: 'report.pdf' });
 * ```
 */
export class OcrPipelineFactory {
    /**
     * Create a new OcrPipeline instance with all dependencies wired
     * @throws ConfigurationError for invalid configuration or an unusable analysis provider
     */
    static create(userConfig: OcrPipelineConfig = {}, overrides: OcrPipelineOverrides = {}): OcrPipeline {
        const config = OcrPipelineFactory.resolveConfig(userConfig);
        const logger = overrides.logger ?? createLogger(config.logging);
        const events = createEventEmitter();
        const metrics = new MetricsRegistry();
        const breakers = new CircuitBreakerRegistry(config.breaker, logger, events, metrics);
        const runner = overrides.runner ?? new SpawnCommandRunner();

        // Document services
        const pdfProcessor = new PDFProcessor(logger);
        const rasterizer = new PageRasterizer(
            { workDir: config.workDir, raster: config.raster },
            { runner, breakers },
            logger
        );
        const ocrEngine = overrides.ocrEngine ?? new TesseractOcrEngine(config.ocr, { runner, breakers }, logger);
        const ocrPool = new OcrWorkerPool(config.ocr, ocrEngine, logger);
        const chunker = new PdfChunker(
            { workDir: config.workDir, chunking: config.chunking, limits: config.limits },
            { storage: overrides.storage ?? new StatfsStorageProbe() },
            logger
        );

        // State
        const progress = new ProgressTracker(
            overrides.progressStore ?? new InMemoryProgressStore(),
            events,
            logger,
            { retentionMs: config.orchestrator.resultRetentionMs }
        );
        const jobStore = overrides.jobStore ?? new InMemoryJobStore();

        const provider = overrides.analysisProvider
            ?? createAnalysisProvider(config, { rasterizer, ocrPool }, logger);

        // Engines
        const orchestrator = new JobOrchestrator(
            config,
            { jobStore, progress, provider, breakers, events, metrics },
            logger
        );
        const extractionEngine = new ExtractionEngine(
            config,
            { pdfProcessor, rasterizer, ocrPool, progress, events, metrics },
            logger
        );
        const ingestionEngine = new IngestionEngine(
            config,
            { pdfProcessor, chunker, orchestrator },
            logger
        );

        logger.info('OCR pipeline initialized', {
            workDir: config.workDir,
            dpi: config.raster.dpi,
            maxWorkers: config.ocr.maxWorkers,
            analysisProvider: provider.name,
        });

        return new OcrPipeline(config, {
            logger,
            events,
            metrics,
            breakers,
            progress,
            provider,
            orchestrator,
            extractionEngine,
            ingestionEngine,
        });
    }

    /**
     * Validate user config and resolve it with defaults
     * @throws ConfigurationError listing each invalid field
     */
    static resolveConfig(userConfig: OcrPipelineConfig): ResolvedConfig {
        const validation = configSchema.safeParse(userConfig);
        if (!validation.success) {
            throw new ConfigurationError('Invalid configuration', {
                errors: validation.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            });
        }

        const maxWorkers = userConfig.ocr?.maxWorkers ?? defaultMaxWorkers();

        return {
            workDir: userConfig.workDir ?? path.join(os.tmpdir(), 'pdf-ocr-work'),
            raster: {
                ...DEFAULT_RASTER_CONFIG,
                ...userConfig.raster,
                probe: {
                    ...DEFAULT_RASTER_CONFIG.probe,
                    ...userConfig.raster?.probe,
                },
            },
            ocr: {
                ...DEFAULT_OCR_CONFIG,
                ...userConfig.ocr,
                maxWorkers,
                batchSize: userConfig.ocr?.batchSize ?? maxWorkers * 2,
            },
            chunking: {
                ...DEFAULT_CHUNKING_CONFIG,
                ...userConfig.chunking,
            },
            limits: {
                ...DEFAULT_LIMITS_CONFIG,
                ...userConfig.limits,
            },
            breaker: {
                ...DEFAULT_BREAKER_CONFIG,
                ...userConfig.breaker,
            },
            analysis: {
                ...DEFAULT_ANALYSIS_CONFIG,
                ...userConfig.analysis,
            },
            orchestrator: {
                ...DEFAULT_ORCHESTRATOR_CONFIG,
                ...userConfig.orchestrator,
            },
            logging: {
                ...DEFAULT_LOG_CONFIG,
                ...userConfig.logging,
                level: userConfig.logging?.level || DEFAULT_LOG_CONFIG.level,
            },
        };
    }
}

/**
 * Create a new OcrPipeline instance
 *
 * @example
 * ```typescript
 * const pipeline = createOcrPipeline({ raster: { dpi: 300 } });
 * const result = await pipeline.extract(pdfBuffer, { filename: 'scan.pdf' });
 * ```
 */
export function createOcrPipeline(config: OcrPipelineConfig = {}, overrides: OcrPipelineOverrides = {}): OcrPipeline {
    return OcrPipelineFactory.create(config, overrides);
}
