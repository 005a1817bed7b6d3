import type {
    AnalysisProviderMetrics,
    AnalysisResult,
    ChunkContext,
    IAnalysisProvider,
} from '../../types/analysis-provider.types.js';
import type { AnalysisProviderEnumType } from '../../types/enums.js';
import { ANALYSIS_DEFAULTS } from '../../config/constants.js';

/**
 * Shared request accounting and result validation for analysis providers
 */
export abstract class BaseAnalysisProvider implements IAnalysisProvider {
    abstract readonly name: AnalysisProviderEnumType;

    private readonly confidenceThreshold: number;
    private totalRequests = 0;
    private successfulRequests = 0;
    private failedRequests = 0;
    private totalTokens = 0;

    protected constructor(confidenceThreshold: number) {
        this.confidenceThreshold = confidenceThreshold;
    }

    async analyzeChunk(filePath: string, context: ChunkContext): Promise<AnalysisResult> {
        this.totalRequests++;
        try {
            const result = await this.analyze(filePath, context);
            this.successfulRequests++;
            this.totalTokens += result.usage?.total ?? 0;
            return result;
        } catch (error) {
            this.failedRequests++;
            throw error;
        }
    }

    validateResult(result: AnalysisResult): boolean {
        return result.content.trim().length > 0 && result.confidence >= this.confidenceThreshold;
    }

    getMetrics(): AnalysisProviderMetrics {
        return {
            provider: this.name,
            totalRequests: this.totalRequests,
            successfulRequests: this.successfulRequests,
            failedRequests: this.failedRequests,
            successRate: this.totalRequests === 0 ? 0 : this.successfulRequests / this.totalRequests,
            totalTokens: this.totalTokens,
            estimatedCost: (this.totalTokens / 1000) * ANALYSIS_DEFAULTS.COST_PER_1K_TOKENS,
        };
    }

    protected abstract analyze(filePath: string, context: ChunkContext): Promise<AnalysisResult>;
}
