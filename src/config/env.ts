/**
 * Centralized Environment Configuration
 *
 * Validates environment variables with Zod and maps them onto pipeline config.
 * Read through `getEnv()` instead of touching process.env directly.
 *
 * @example
 * ```typescript
 * import { getEnv, envToConfig } from './config/env.js';
 * const pipeline = createOcrPipeline(envToConfig(getEnv()));
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { AnalysisProviderEnum } from '../types/enums.js';
import type { OcrPipelineConfig } from '../types/config.types.js';

const MB = 1024 * 1024;

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /** HTTP port for `pdf-ocr serve` */
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),

    /** Working directory for temp and chunk files */
    WORK_DIR: z.string().min(1).optional(),

    /** Concurrent tesseract processes */
    OCR_MAX_WORKERS: z.coerce.number().int().min(1).max(64).optional(),

    /** Default rendering resolution */
    DEFAULT_DPI: z.coerce.number().int().min(50).max(600).optional(),

    /** Chunk analysis provider */
    ANALYSIS_PROVIDER: z.enum([AnalysisProviderEnum.OPENAI, AnalysisProviderEnum.OCR]).optional(),

    /**
     * OpenAI API key, required when ANALYSIS_PROVIDER=openai
     * Get yours at: https://platform.openai.com/api-keys
     */
    OPENAI_API_KEY: z.string().optional(),

    OPENAI_MODEL: z.string().min(1).optional(),

    /** Minimum accepted chunk confidence, 0-100 */
    CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(100).optional(),

    /** Upload size limit in megabytes */
    MAX_FILE_SIZE_MB: z.coerce.number().positive().optional(),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * @throws ConfigurationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map(issue => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`, {
            fields: result.error.issues.map(issue => issue.path.join('.')),
        });
    }

    return result.data;
}

let cachedEnv: Env | undefined;

/**
 * Validated process environment, parsed on first use
 */
export function getEnv(): Env {
    cachedEnv ??= parseEnv(process.env);
    return cachedEnv;
}

/**
 * Map environment values onto a pipeline config; unset variables leave defaults in place
 */
export function envToConfig(env: Env): OcrPipelineConfig {
    return {
        ...(env.WORK_DIR !== undefined && { workDir: env.WORK_DIR }),
        raster: {
            ...(env.DEFAULT_DPI !== undefined && { dpi: env.DEFAULT_DPI }),
        },
        ocr: {
            ...(env.OCR_MAX_WORKERS !== undefined && { maxWorkers: env.OCR_MAX_WORKERS }),
        },
        limits: {
            ...(env.MAX_FILE_SIZE_MB !== undefined && {
                maxFileBytes: Math.round(env.MAX_FILE_SIZE_MB * MB),
            }),
        },
        analysis: {
            ...(env.ANALYSIS_PROVIDER !== undefined && { provider: env.ANALYSIS_PROVIDER }),
            ...(env.OPENAI_API_KEY !== undefined && { apiKey: env.OPENAI_API_KEY }),
            ...(env.OPENAI_MODEL !== undefined && { model: env.OPENAI_MODEL }),
            ...(env.CONFIDENCE_THRESHOLD !== undefined && {
                confidenceThreshold: env.CONFIDENCE_THRESHOLD,
            }),
        },
        logging: {
            level: env.LOG_LEVEL,
        },
    };
}

/**
 * Get environment info for health checks
 */
export function getEnvInfo(env: Env): {
    logLevel: string;
    analysisProvider: string;
    openaiConfigured: boolean;
} {
    return {
        logLevel: env.LOG_LEVEL,
        analysisProvider: env.ANALYSIS_PROVIDER ?? AnalysisProviderEnum.OCR,
        openaiConfigured: env.OPENAI_API_KEY !== undefined && env.OPENAI_API_KEY !== '',
    };
}
