import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { OpenAIAnalysisProvider, scoreCompletion } from '../../src/services/analysis/openai.provider.js';
import { AnalysisProviderError, ConfigurationError } from '../../src/errors/index.js';
import type { ChunkContext } from '../../src/types/analysis-provider.types.js';
import { removeDir } from '../../src/utils/storage.js';
import { createMockLogger, createTempDir } from '../mocks/index.js';

// Mock OpenAI
const mockCreate = vi.fn();
vi.mock('openai', () => {
    return {
        default: vi.fn().mockImplementation(() => ({
            chat: {
                completions: {
                    create: mockCreate,
                },
            },
        })),
    };
});

function completion(content: string, finishReason: string = 'stop'): object {
    return {
        model: 'gpt-4o-mini-2024-07-18',
        choices: [{ message: { content }, finish_reason: finishReason }],
        usage: { prompt_tokens: 100, completion_tokens: 50, total_tokens: 150 },
    };
}

describe('OpenAIAnalysisProvider', () => {
    let provider: OpenAIAnalysisProvider;
    let workDir: string;
    let filePath: string;

    const config = {
        apiKey: 'test-api-key',
        model: 'gpt-4o-mini',
        maxTokens: 2048,
        temperature: 0.2,
        confidenceThreshold: 60,
    };

    const context: ChunkContext = {
        jobId: 'job-1',
        filename: 'book.pdf',
        chunkIndex: 1,
        startPage: 19,
        endPage: 38,
        pageRange: 'pages 19-38',
    };

    beforeEach(async () => {
        workDir = await createTempDir();
        filePath = path.join(workDir, 'chunk_1.pdf');
        await fs.writeFile(filePath, '%PDF-1.7 chunk');
        provider = new OpenAIAnalysisProvider(config, createMockLogger());
    });

    afterEach(async () => {
        await removeDir(workDir);
    });

    it('should require an API key', () => {
        expect(() => new OpenAIAnalysisProvider({ ...config, apiKey: undefined }, createMockLogger()))
            .toThrow(ConfigurationError);
    });

    describe('analyzeChunk', () => {
        it('should send the chunk as a base64 file part', async () => {
            mockCreate.mockResolvedValueOnce(completion('Chunk text'));

            await provider.analyzeChunk(filePath, context);

            expect(mockCreate).toHaveBeenCalledTimes(1);
            const request = mockCreate.mock.calls[0]?.[0];
            expect(request.model).toBe('gpt-4o-mini');
            expect(request.max_tokens).toBe(2048);
            expect(request.temperature).toBe(0.2);
            expect(request.messages[0].role).toBe('system');
            expect(request.messages[1].content).toEqual([
                { type: 'text', text: 'Extract the text of book.pdf, pages 19-38 (chunk 2).' },
                {
                    type: 'file',
                    file: {
                        filename: 'chunk_1.pdf',
                        file_data: `data:application/pdf;base64,${Buffer.from('%PDF-1.7 chunk').toString('base64')}`,
                    },
                },
            ]);
        });

        it('should map the completion to a result', async () => {
            mockCreate.mockResolvedValueOnce(completion('x'.repeat(600)));

            const result = await provider.analyzeChunk(filePath, context);

            expect(result).toEqual({
                content: 'x'.repeat(600),
                confidence: 80,
                model: 'gpt-4o-mini-2024-07-18',
                usage: { input: 100, output: 50, total: 150 },
                truncated: false,
            });
        });

        it('should flag truncated output', async () => {
            mockCreate.mockResolvedValueOnce(completion('partial', 'length'));

            const result = await provider.analyzeChunk(filePath, context);

            expect(result.confidence).toBe(60);
            expect(result.truncated).toBe(true);
        });

        it('should mark rate limits as retryable', async () => {
            mockCreate.mockRejectedValueOnce(Object.assign(new Error('Rate limit reached'), { status: 429 }));

            const error = await provider.analyzeChunk(filePath, context).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AnalysisProviderError);
            if (error instanceof AnalysisProviderError) {
                expect(error.message).toBe('OpenAI request failed: Rate limit reached');
                expect(error.retryable).toBe(true);
                expect(error.providerStatus).toBe(429);
            }
        });

        it('should mark server errors as retryable and bad requests as not', async () => {
            mockCreate
                .mockRejectedValueOnce(Object.assign(new Error('Bad gateway'), { status: 502 }))
                .mockRejectedValueOnce(Object.assign(new Error('Invalid file'), { status: 400 }));

            const serverError = await provider.analyzeChunk(filePath, context).catch((e: unknown) => e);
            const badRequest = await provider.analyzeChunk(filePath, context).catch((e: unknown) => e);

            expect(serverError instanceof AnalysisProviderError && serverError.retryable).toBe(true);
            expect(badRequest instanceof AnalysisProviderError && badRequest.retryable).toBe(false);
        });

        it('should mark timeouts as retryable', async () => {
            const timeout = new Error('Request timed out.');
            timeout.name = 'APIConnectionTimeoutError';
            mockCreate.mockRejectedValueOnce(timeout);

            const error = await provider.analyzeChunk(filePath, context).catch((e: unknown) => e);

            expect(error instanceof AnalysisProviderError && error.retryable).toBe(true);
        });
    });

    describe('validateResult', () => {
        it('should require content at or above the threshold', () => {
            expect(provider.validateResult({ content: 'text', confidence: 60, model: 'm' })).toBe(true);
            expect(provider.validateResult({ content: 'text', confidence: 59, model: 'm' })).toBe(false);
            expect(provider.validateResult({ content: '   ', confidence: 90, model: 'm' })).toBe(false);
        });
    });

    describe('getMetrics', () => {
        it('should account requests, tokens and cost', async () => {
            mockCreate
                .mockResolvedValueOnce(completion('Chunk text'))
                .mockRejectedValueOnce(Object.assign(new Error('Invalid file'), { status: 400 }));

            await provider.analyzeChunk(filePath, context);
            await provider.analyzeChunk(filePath, context).catch(() => undefined);

            const metrics = provider.getMetrics();
            expect(metrics).toMatchObject({
                provider: 'openai',
                totalRequests: 2,
                successfulRequests: 1,
                failedRequests: 1,
                successRate: 0.5,
                totalTokens: 150,
            });
            expect(metrics.estimatedCost).toBeCloseTo(0.0015, 6);
        });
    });
});

describe('scoreCompletion', () => {
    it('should score by finish reason and length', () => {
        expect(scoreCompletion('x'.repeat(2000), 'length')).toBe(60);
        expect(scoreCompletion('x'.repeat(1001), 'stop')).toBe(90);
        expect(scoreCompletion('x'.repeat(501), 'stop')).toBe(80);
        expect(scoreCompletion('x'.repeat(500), 'stop')).toBe(70);
        expect(scoreCompletion('', null)).toBe(60);
    });
});
