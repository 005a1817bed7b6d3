import type { AnalysisProviderEnumType } from './enums.js';
import type { TokenUsage } from './job.types.js';

/**
 * Context handed to a provider along with the chunk file
 */
export interface ChunkContext {
    jobId: string;
    filename: string;
    chunkIndex: number;
    startPage: number;
    endPage: number;
    /** Human-readable range, e.g. "pages 19-38" */
    pageRange: string;
}

/**
 * Provider output for one chunk
 */
export interface AnalysisResult {
    content: string;
    /** 0-100 */
    confidence: number;
    model: string;
    usage?: TokenUsage;
    /** True when the provider cut the output short */
    truncated?: boolean;
}

/**
 * Cumulative provider counters
 */
export interface AnalysisProviderMetrics {
    provider: AnalysisProviderEnumType;
    totalRequests: number;
    successfulRequests: number;
    failedRequests: number;
    successRate: number;
    totalTokens: number;
    /** USD */
    estimatedCost: number;
}

/**
 * Chunk analysis provider interface
 *
 * @example
 * ```typescript
 * const provider = createAnalysisProvider(config, deps, logger);
 * const result = await provider.analyzeChunk('/work/job/chunk_0.pdf', context);
 * if (!provider.validateResult(result)) {
 *     // treat as failed chunk
 * }
 * ```
 */
export interface IAnalysisProvider {
    readonly name: AnalysisProviderEnumType;
    analyzeChunk(filePath: string, context: ChunkContext): Promise<AnalysisResult>;
    /** Non-empty content at or above the configured confidence threshold */
    validateResult(result: AnalysisResult): boolean;
    getMetrics(): AnalysisProviderMetrics;
}
