import { z } from 'zod';
import { AnalysisProviderEnum, type AnalysisProviderEnumType } from './enums.js';

/**
 * Rasterization configuration (pdfinfo / pdftoppm)
 */
export interface RasterConfig {
    /**
     * Rendering resolution (default: 200)
     * Higher values improve OCR accuracy at the cost of processing time and memory
     */
    dpi: number;
    /** Timeout for one full-document conversion in ms (default: 300000) */
    timeoutMs: number;
    /** Page-count probe used when the PDF metadata has no page count */
    probe: {
        /** Upper bound on probed pages (default: 2000) */
        maxPages: number;
        /** Timeout per probed page in ms (default: 5000) */
        pageTimeoutMs: number;
    };
    /** pdftoppm executable (default: 'pdftoppm') */
    pdftoppmPath: string;
    /** pdfinfo executable (default: 'pdfinfo') */
    pdfinfoPath: string;
}

/**
 * OCR worker pool configuration (tesseract)
 */
export interface OcrConfig {
    /** Maximum concurrently running OCR processes (default: min(32, cpus + 4)) */
    maxWorkers: number;
    /** Pages per progress batch (default: maxWorkers * 2) */
    batchSize: number;
    /** Timeout per page in ms (default: 60000) */
    pageTimeoutMs: number;
    /** Tesseract language (default: 'eng') */
    language: string;
    /** tesseract executable (default: 'tesseract') */
    tesseractPath: string;
}

/**
 * PDF chunking configuration
 */
export interface ChunkingConfig {
    /** Pages per chunk (default: 20) */
    chunkSize: number;
    /** Pages shared by adjacent chunks (default: 2) */
    overlap: number;
    /** Maximum bytes per written chunk (default: 50MB) */
    maxChunkBytes: number;
}

/**
 * Resource limits
 */
export interface LimitsConfig {
    /** Maximum upload size in bytes (default: 100MB) */
    maxFileBytes: number;
    /** Free space that must remain in the working directory after a write (default: 100MB) */
    minFreeBytes: number;
    /** Maximum chunk jobs processing at once (default: 100) */
    maxActiveJobs: number;
}

/**
 * Circuit breaker configuration, shared by all call sites
 */
export interface CircuitBreakerConfig {
    /** Consecutive failures before opening (default: 5) */
    failureThreshold: number;
    /** Time in open state before a probe is allowed, in ms (default: 60000) */
    resetTimeoutMs: number;
    /** Minimum time since the last failure before a half-open probe, in ms (default: 30000) */
    halfOpenTimeoutMs: number;
    /** Per-call timeout in ms (default: 120000) */
    callTimeoutMs: number;
}

/**
 * Chunk analysis provider configuration
 */
export interface AnalysisConfig {
    /** Provider variant (default: 'ocr') */
    provider: AnalysisProviderEnumType;
    /** API key for remote providers */
    apiKey?: string;
    /** Model name for remote providers (default: 'gpt-4o-mini') */
    model: string;
    /** Maximum output tokens (default: 2048) */
    maxTokens: number;
    /** Sampling temperature (default: 0.2) */
    temperature: number;
    /** Minimum accepted confidence, 0-100 (default: 60) */
    confidenceThreshold: number;
    /** Retries for transient provider failures (default: 2) */
    maxRetries: number;
    /** Initial retry delay in ms (default: 1000) */
    retryDelayMs: number;
    /** Backoff multiplier for exponential retry (default: 2) */
    backoffMultiplier: number;
}

/**
 * Job orchestration configuration
 */
export interface OrchestratorConfig {
    /** Chunks analysed at once across all jobs (default: 4) */
    maxConcurrentChunks: number;
    /** How long a terminal job survives after its result was first read, in ms (default: 300000) */
    resultRetentionMs: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Main pipeline configuration
 */
export interface OcrPipelineConfig {
    /** Working directory for temporary and chunk files (default: <tmpdir>/pdf-ocr-work) */
    workDir?: string;
    raster?: Partial<Omit<RasterConfig, 'probe'>> & { probe?: Partial<RasterConfig['probe']> };
    ocr?: Partial<OcrConfig>;
    chunking?: Partial<ChunkingConfig>;
    limits?: Partial<LimitsConfig>;
    breaker?: Partial<CircuitBreakerConfig>;
    analysis?: Partial<AnalysisConfig>;
    orchestrator?: Partial<OrchestratorConfig>;
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    workDir: string;
    raster: RasterConfig;
    ocr: OcrConfig;
    chunking: ChunkingConfig;
    limits: LimitsConfig;
    breaker: CircuitBreakerConfig;
    analysis: AnalysisConfig;
    orchestrator: OrchestratorConfig;
    logging: LogConfig;
}

const MB = 1024 * 1024;

/**
 * Default configuration values
 */
export const DEFAULT_RASTER_CONFIG: RasterConfig = {
    dpi: 200,
    timeoutMs: 300_000,
    probe: {
        maxPages: 2000,
        pageTimeoutMs: 5000,
    },
    pdftoppmPath: 'pdftoppm',
    pdfinfoPath: 'pdfinfo',
};

export const DEFAULT_OCR_CONFIG: Omit<OcrConfig, 'maxWorkers' | 'batchSize'> = {
    pageTimeoutMs: 60_000,
    language: 'eng',
    tesseractPath: 'tesseract',
};

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
    chunkSize: 20,
    overlap: 2,
    maxChunkBytes: 50 * MB,
};

export const DEFAULT_LIMITS_CONFIG: LimitsConfig = {
    maxFileBytes: 100 * MB,
    minFreeBytes: 100 * MB,
    maxActiveJobs: 100,
};

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
    failureThreshold: 5,
    resetTimeoutMs: 60_000,
    halfOpenTimeoutMs: 30_000,
    callTimeoutMs: 120_000,
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
    provider: AnalysisProviderEnum.OCR,
    model: 'gpt-4o-mini',
    maxTokens: 2048,
    temperature: 0.2,
    confidenceThreshold: 60,
    maxRetries: 2,
    retryDelayMs: 1000,
    backoffMultiplier: 2,
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
    maxConcurrentChunks: 4,
    resultRetentionMs: 300_000,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    workDir: z.string().min(1).optional(),
    raster: z
        .object({
            dpi: z.number().int().min(50).max(600).optional(),
            timeoutMs: z.number().int().positive().optional(),
            probe: z
                .object({
                    maxPages: z.number().int().min(1).max(100_000).optional(),
                    pageTimeoutMs: z.number().int().positive().optional(),
                })
                .optional(),
            pdftoppmPath: z.string().min(1).optional(),
            pdfinfoPath: z.string().min(1).optional(),
        })
        .optional(),
    ocr: z
        .object({
            maxWorkers: z.number().int().min(1).max(64).optional(),
            batchSize: z.number().int().min(1).optional(),
            pageTimeoutMs: z.number().int().positive().optional(),
            language: z.string().min(1).optional(),
            tesseractPath: z.string().min(1).optional(),
        })
        .optional(),
    chunking: z
        .object({
            chunkSize: z.number().int().min(1).optional(),
            overlap: z.number().int().min(0).optional(),
            maxChunkBytes: z.number().int().positive().optional(),
        })
        .optional(),
    limits: z
        .object({
            maxFileBytes: z.number().int().positive().optional(),
            minFreeBytes: z.number().int().min(0).optional(),
            maxActiveJobs: z.number().int().min(1).optional(),
        })
        .optional(),
    breaker: z
        .object({
            failureThreshold: z.number().int().min(1).optional(),
            resetTimeoutMs: z.number().int().min(0).optional(),
            halfOpenTimeoutMs: z.number().int().min(0).optional(),
            callTimeoutMs: z.number().int().positive().optional(),
        })
        .optional(),
    analysis: z
        .object({
            provider: z.enum([AnalysisProviderEnum.OPENAI, AnalysisProviderEnum.OCR]).optional(),
            apiKey: z.string().optional(),
            model: z.string().min(1).optional(),
            maxTokens: z.number().int().positive().optional(),
            temperature: z.number().min(0).max(2).optional(),
            confidenceThreshold: z.number().min(0).max(100).optional(),
            maxRetries: z.number().int().min(0).max(10).optional(),
            retryDelayMs: z.number().int().min(0).max(60_000).optional(),
            backoffMultiplier: z.number().min(1).max(5).optional(),
        })
        .optional(),
    orchestrator: z
        .object({
            maxConcurrentChunks: z.number().int().min(1).max(64).optional(),
            resultRetentionMs: z.number().int().min(0).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});
