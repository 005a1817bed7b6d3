import * as fs from 'fs/promises';
import * as path from 'path';
import OpenAI from 'openai';
import type { AnalysisConfig } from '../../types/config.types.js';
import type { AnalysisResult, ChunkContext } from '../../types/analysis-provider.types.js';
import type { TokenUsage } from '../../types/job.types.js';
import { AnalysisProviderEnum } from '../../types/enums.js';
import { ANALYSIS_DEFAULTS } from '../../config/constants.js';
import {
    AnalysisProviderError,
    ConfigurationError,
    OcrPipelineError,
    errorMessage,
} from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { BaseAnalysisProvider } from './base.provider.js';

export interface OpenAIAnalysisConfig {
    apiKey?: string;
    model: string;
    maxTokens: number;
    temperature: number;
    confidenceThreshold: number;
}

/**
 * Confidence heuristic for model output
 * Truncated answers score lowest; otherwise longer answers score higher.
 */
export function scoreCompletion(content: string, finishReason: string | null | undefined): number {
    const { CONFIDENCE, LONG_CONTENT_CHARS, MEDIUM_CONTENT_CHARS } = ANALYSIS_DEFAULTS;
    if (finishReason !== 'stop') return CONFIDENCE.TRUNCATED;
    if (content.length > LONG_CONTENT_CHARS) return CONFIDENCE.LONG;
    if (content.length > MEDIUM_CONTENT_CHARS) return CONFIDENCE.MEDIUM;
    return CONFIDENCE.SHORT;
}

function readStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * Chunk analysis through OpenAI chat completions, with the chunk PDF attached as a file part
 */
export class OpenAIAnalysisProvider extends BaseAnalysisProvider {
    readonly name = AnalysisProviderEnum.OPENAI;
    private readonly client: OpenAI;
    private readonly config: OpenAIAnalysisConfig;
    private readonly logger: Logger;

    constructor(config: OpenAIAnalysisConfig, logger: Logger) {
        super(config.confidenceThreshold);

        if (!config.apiKey) {
            throw new ConfigurationError('OpenAI API key is required', { provider: 'openai' });
        }

        // Retries are applied by the orchestrator, outside the circuit breaker
        this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
        this.config = config;
        this.logger = logger;
    }

    static fromConfig(analysis: AnalysisConfig, logger: Logger): OpenAIAnalysisProvider {
        return new OpenAIAnalysisProvider(
            {
                apiKey: analysis.apiKey,
                model: analysis.model,
                maxTokens: analysis.maxTokens,
                temperature: analysis.temperature,
                confidenceThreshold: analysis.confidenceThreshold,
            },
            logger
        );
    }

    protected async analyze(filePath: string, context: ChunkContext): Promise<AnalysisResult> {
        const data = await fs.readFile(filePath);

        try {
            const response = await this.client.chat.completions.create({
                model: this.config.model,
                max_tokens: this.config.maxTokens,
                temperature: this.config.temperature,
                messages: [
                    { role: 'system', content: ANALYSIS_DEFAULTS.SYSTEM_PROMPT },
                    {
                        role: 'user',
                        content: [
                            {
                                type: 'text',
                                text: `Extract the text of ${context.filename}, ${context.pageRange} (chunk ${context.chunkIndex + 1}).`,
                            },
                            {
                                type: 'file',
                                file: {
                                    filename: path.basename(filePath),
                                    file_data: `data:application/pdf;base64,${data.toString('base64')}`,
                                },
                            },
                        ],
                    },
                ],
            });

            const choice = response.choices[0];
            const content = choice?.message?.content ?? '';
            const finishReason = choice?.finish_reason;
            const usage = this.mapUsage(response.usage);

            this.logger.debug('Chunk analysed', {
                jobId: context.jobId,
                chunkIndex: context.chunkIndex,
                finishReason,
                tokens: usage?.total,
            });

            return {
                content,
                confidence: scoreCompletion(content, finishReason),
                model: response.model ?? this.config.model,
                usage,
                truncated: finishReason !== 'stop',
            };
        } catch (error) {
            throw this.mapError(error, context);
        }
    }

    private mapUsage(
        usage: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null | undefined
    ): TokenUsage | undefined {
        if (!usage) return undefined;
        const input = usage.prompt_tokens ?? 0;
        const output = usage.completion_tokens ?? 0;
        return { input, output, total: usage.total_tokens ?? input + output };
    }

    private mapError(error: unknown, context: ChunkContext): OcrPipelineError {
        if (error instanceof OcrPipelineError) {
            return error;
        }

        const status = readStatus(error);
        const message = errorMessage(error);
        const timedOut = error instanceof Error && error.name.includes('Timeout');
        const retryable = timedOut || status === 429 || (status !== undefined && status >= 500);

        this.logger.error('OpenAI API error', {
            jobId: context.jobId,
            chunkIndex: context.chunkIndex,
            status,
            error: message,
        });

        return new AnalysisProviderError(`OpenAI request failed: ${message}`, 'openai', {
            providerStatus: status,
            retryable,
        });
    }
}
