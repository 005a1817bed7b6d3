/**
 * pdf-ocr-pipeline: chunked, parallel OCR for PDF documents
 *
 * @packageDocumentation
 */

// Main class and factory
export { OcrPipeline, type OcrPipelineComponents } from './ocr-pipeline.js';
export {
    OcrPipelineFactory,
    createOcrPipeline,
    defaultMaxWorkers,
    type OcrPipelineOverrides,
} from './ocr-pipeline.factory.js';

// HTTP surface
export { createApp, type AppOptions } from './server/app.js';

// Types
export * from './types/index.js';

// Configuration
export { parseEnv, getEnv, envToConfig, getEnvInfo, type Env } from './config/env.js';

// Errors
export {
    OcrPipelineError,
    ValidationError,
    InvalidDocumentError,
    FileTooLargeError,
    ChunkTooLargeError,
    InsufficientStorageError,
    QueueFullError,
    ToolFailureError,
    ConversionError,
    ServiceUnavailableError,
    TimeoutError,
    AnalysisProviderError,
    NotFoundError,
    JobNotReadyError,
    ConfigurationError,
    ErrorCategoryEnum,
    generateCorrelationId,
    setCorrelationId,
    clearCorrelationId,
    wrapError,
    type ErrorCategory,
    type ErrorContext,
} from './errors/index.js';

// Building blocks
export { PDFProcessor } from './services/pdf.processor.js';
export { PageRasterizer, parsePdfInfo } from './services/pdf.rasterizer.js';
export { PdfChunker, planChunkWindows } from './services/pdf.chunker.js';
export { TesseractOcrEngine, parseTesseractTsv } from './services/ocr/tesseract.engine.js';
export { OcrWorkerPool, calculateConfidence, combineText } from './services/ocr/ocr.worker-pool.js';
export { CircuitBreaker, CircuitBreakerRegistry } from './services/circuit-breaker.js';
export { MetricsRegistry } from './services/metrics.service.js';
export { ProgressTracker } from './services/progress/progress.tracker.js';
export { ProgressStream } from './services/progress/progress.stream.js';
export { SpawnCommandRunner, type ICommandRunner, type CommandResult } from './services/command.runner.js';
export { OpenAIAnalysisProvider } from './services/analysis/openai.provider.js';
export { OcrAnalysisProvider } from './services/analysis/ocr.provider.js';
export { createAnalysisProvider } from './services/analysis/provider.factory.js';
export { InMemoryJobStore, InMemoryProgressStore } from './stores/index.js';
export { JobOrchestrator, ExtractionEngine, IngestionEngine } from './engines/index.js';

// Utilities
export { createLogger, type Logger, type LogMeta } from './utils/logger.js';
export { PipelineEventEmitter, createEventEmitter, type PipelineEvents } from './utils/events.js';
export type { IStorageProbe } from './utils/storage.js';
