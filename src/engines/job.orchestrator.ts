import { randomUUID } from 'crypto';
import pLimit from 'p-limit';
import type {
    AnalysisConfig,
    LimitsConfig,
    OrchestratorConfig,
} from '../types/config.types.js';
import type { IAnalysisProvider, ChunkContext, AnalysisResult } from '../types/analysis-provider.types.js';
import type { Chunk, ChunkResult, Job, JobResultView, JobStatusView } from '../types/job.types.js';
import type { IJobStore } from '../types/store.types.js';
import { ChunkStatusEnum, JobStatusEnum, ProgressUnitEnum } from '../types/enums.js';
import { BREAKER_NAMES } from '../config/constants.js';
import {
    AnalysisProviderError,
    JobNotReadyError,
    NotFoundError,
    QueueFullError,
    ValidationError,
    errorMessage,
} from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { PipelineEventEmitter } from '../utils/events.js';
import { getRetryOptions, withRetry } from '../utils/retry.js';
import { removeDir } from '../utils/storage.js';
import type { CircuitBreaker, CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import type { MetricsRegistry } from '../services/metrics.service.js';
import type { ProgressTracker } from '../services/progress/progress.tracker.js';

/**
 * Dependencies for JobOrchestrator
 */
export interface JobOrchestratorDependencies {
    jobStore: IJobStore;
    progress: ProgressTracker;
    provider: IAnalysisProvider;
    breakers: CircuitBreakerRegistry;
    events: PipelineEventEmitter;
    metrics: MetricsRegistry;
}

export interface JobOrchestratorConfig {
    orchestrator: OrchestratorConfig;
    limits: LimitsConfig;
    analysis: AnalysisConfig;
}

function roundPercentage(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Merged view of a job's results; results are ordered by start page
 */
export function buildResultView(job: Job): JobResultView {
    const results = [...job.results].sort((a, b) => a.startPage - b.startPage);
    const content = results
        .filter(result => result.status === ChunkStatusEnum.COMPLETED)
        .map(result => result.content)
        .join('\n\n');
    const confidence = results.length === 0
        ? 0
        : results.reduce((sum, result) => sum + result.confidence, 0) / results.length;

    return {
        jobId: job.id,
        filename: job.filename,
        status: job.status,
        totalChunks: job.totalChunks,
        results,
        content,
        confidence: roundPercentage(confidence),
        ...(job.error !== undefined && { error: job.error }),
    };
}

/**
 * Job Orchestrator
 *
 * Owns the chunk-job lifecycle: registration, concurrent chunk dispatch through
 * the analysis breaker, completion counting, one-time finalization and eviction.
 */
export class JobOrchestrator {
    private readonly config: JobOrchestratorConfig;
    private readonly jobStore: IJobStore;
    private readonly progress: ProgressTracker;
    private readonly provider: IAnalysisProvider;
    private readonly breaker: CircuitBreaker;
    private readonly events: PipelineEventEmitter;
    private readonly metrics: MetricsRegistry;
    private readonly logger: Logger;
    private readonly limit: ReturnType<typeof pLimit>;
    private readonly inFlight = new Set<Promise<void>>();
    private readonly evictionTimers = new Map<string, NodeJS.Timeout>();

    constructor(
        config: JobOrchestratorConfig,
        deps: JobOrchestratorDependencies,
        logger: Logger
    ) {
        this.config = config;
        this.jobStore = deps.jobStore;
        this.progress = deps.progress;
        this.provider = deps.provider;
        this.breaker = deps.breakers.get(BREAKER_NAMES.ANALYSIS);
        this.events = deps.events;
        this.metrics = deps.metrics;
        this.logger = logger;
        this.limit = pLimit(config.orchestrator.maxConcurrentChunks);
    }

    /**
     * Fail fast when no further job may start
     * @throws QueueFullError
     */
    assertCapacity(): void {
        const active = this.activeJobs();
        if (active >= this.config.limits.maxActiveJobs) {
            throw new QueueFullError(active, this.config.limits.maxActiveJobs);
        }
    }

    /**
     * Register a processing job and its chunk progress record
     * @throws QueueFullError when `limits.maxActiveJobs` jobs are unfinished
     */
    createJob(filename: string, chunks: Chunk[], workDir: string, jobId: string = randomUUID()): string {
        if (chunks.length === 0) {
            throw new ValidationError('A job needs at least one chunk', 'chunks');
        }
        this.assertCapacity();

        this.jobStore.create({
            id: jobId,
            filename,
            chunks,
            results: [],
            status: JobStatusEnum.PROCESSING,
            completedChunks: 0,
            totalChunks: chunks.length,
            createdAt: new Date(),
            workDir,
        });
        this.progress.start(jobId, ProgressUnitEnum.CHUNKS, chunks.length);

        this.metrics.increment('jobs_created_total');
        this.updateGauges();
        this.events.emit('job:created', { jobId, filename, totalChunks: chunks.length });
        this.logger.info('Job created', { jobId, filename, totalChunks: chunks.length });

        return jobId;
    }

    /**
     * Queue a chunk for analysis; returns immediately
     * @throws NotFoundError for an unknown job
     */
    submitChunk(jobId: string, chunk: Chunk): void {
        if (!this.jobStore.get(jobId)) {
            throw new NotFoundError('Job', jobId);
        }

        const task = this.limit(() => this.processChunk(jobId, chunk))
            .catch((error: unknown) => {
                this.logger.error('Chunk task crashed', { jobId, chunkId: chunk.id, error: errorMessage(error) });
            })
            .finally(() => {
                this.inFlight.delete(task);
                this.updateGauges();
            });
        this.inFlight.add(task);
        this.updateGauges();
    }

    getStatus(jobId: string): JobStatusView {
        const job = this.requireJob(jobId);
        const percentage = job.totalChunks === 0 ? 0 : (job.completedChunks / job.totalChunks) * 100;

        return {
            jobId: job.id,
            filename: job.filename,
            status: job.status,
            progress: {
                completedChunks: job.completedChunks,
                totalChunks: job.totalChunks,
                percentage: roundPercentage(Math.min(100, percentage)),
            },
            ...(job.error !== undefined && { error: job.error }),
        };
    }

    /**
     * Merged results of a job in a terminal state
     * The first such read schedules eviction once the job has finished.
     * @throws JobNotReadyError while the job is processing
     */
    getResult(jobId: string): JobResultView {
        const job = this.requireJob(jobId);
        if (job.status === JobStatusEnum.PROCESSING) {
            throw new JobNotReadyError(jobId, job.status);
        }

        if (this.jobStore.markResultRead(jobId) && job.finishedAt !== undefined) {
            this.scheduleEviction(jobId);
        }

        return buildResultView(job);
    }

    activeJobs(): number {
        return this.jobStore.countUnfinished();
    }

    /** Chunks waiting for a free analysis slot */
    queueDepth(): number {
        return this.limit.pendingCount;
    }

    /**
     * Resolve once every submitted chunk has been recorded
     */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }

    /**
     * Cancel pending evictions
     */
    dispose(): void {
        for (const timer of this.evictionTimers.values()) {
            clearTimeout(timer);
        }
        this.evictionTimers.clear();
    }

    private async processChunk(jobId: string, chunk: Chunk): Promise<void> {
        const job = this.jobStore.get(jobId);
        if (!job) {
            this.logger.warn('Chunk dispatched for unknown job', { jobId, chunkId: chunk.id });
            return;
        }

        const startedAt = Date.now();
        let retryCount = 0;
        const context: ChunkContext = {
            jobId,
            filename: job.filename,
            chunkIndex: chunk.index,
            startPage: chunk.startPage,
            endPage: chunk.endPage,
            pageRange: `pages ${chunk.startPage}-${chunk.endPage}`,
        };

        let result: ChunkResult;
        try {
            const analysis = await withRetry(
                () => this.breaker.execute(() => this.provider.analyzeChunk(chunk.filePath, context)),
                {
                    ...getRetryOptions(this.config.analysis),
                    onRetry: (attempt, error, delayMs) => {
                        retryCount = attempt;
                        this.logger.warn('Retrying chunk analysis', {
                            jobId,
                            chunkId: chunk.id,
                            attempt,
                            delayMs: Math.round(delayMs),
                            error: error.message,
                        });
                    },
                }
            );
            this.assertValid(analysis, chunk);
            result = this.toResult(chunk, analysis, startedAt, retryCount);
        } catch (error) {
            const message = errorMessage(error);
            this.logger.error('Chunk analysis failed', { jobId, chunkId: chunk.id, error: message });
            result = {
                chunkId: chunk.id,
                index: chunk.index,
                startPage: chunk.startPage,
                endPage: chunk.endPage,
                status: ChunkStatusEnum.ERROR,
                content: '',
                confidence: 0,
                model: this.provider.name,
                error: message,
                processingMs: Date.now() - startedAt,
                retryCount,
            };
        }

        await this.record(jobId, result);
    }

    private assertValid(analysis: AnalysisResult, chunk: Chunk): void {
        if (!this.provider.validateResult(analysis)) {
            throw new AnalysisProviderError(
                `Result for chunk ${chunk.index} failed validation (confidence ${analysis.confidence}, ${analysis.content.length} characters)`,
                this.provider.name,
                { details: { chunkIndex: chunk.index, confidence: analysis.confidence } }
            );
        }
    }

    private toResult(chunk: Chunk, analysis: AnalysisResult, startedAt: number, retryCount: number): ChunkResult {
        return {
            chunkId: chunk.id,
            index: chunk.index,
            startPage: chunk.startPage,
            endPage: chunk.endPage,
            status: ChunkStatusEnum.COMPLETED,
            content: analysis.content,
            confidence: analysis.confidence,
            model: analysis.model,
            ...(analysis.usage && { usage: analysis.usage }),
            processingMs: Date.now() - startedAt,
            retryCount,
        };
    }

    /**
     * Synchronous from the store update through the finalization decision
     */
    private async record(jobId: string, result: ChunkResult): Promise<void> {
        const outcome = this.jobStore.recordChunkResult(jobId, result);
        if (!outcome) {
            this.logger.warn('Chunk finished for evicted job', { jobId, chunkId: result.chunkId });
            return;
        }

        const { job, finalized } = outcome;
        const failed = result.status === ChunkStatusEnum.ERROR;
        this.metrics.increment(failed ? 'chunks_failed_total' : 'chunks_processed_total');

        // Progress turns terminal in finalize only; the job status may already read error
        this.progress.advance(jobId, 1);

        this.events.emit('job:chunk', {
            jobId,
            result,
            completedChunks: job.completedChunks,
            totalChunks: job.totalChunks,
        });

        if (finalized) {
            await this.finalize(job);
        }
    }

    private async finalize(job: Job): Promise<void> {
        if (job.status === JobStatusEnum.COMPLETED) {
            this.progress.complete(job.id);
            this.metrics.increment('pdfs_processed_total');
            this.events.emit('job:completed', buildResultView(job));
            this.logger.info('Job completed', { jobId: job.id, totalChunks: job.totalChunks });
        } else {
            const reason = job.error ?? 'Job failed';
            this.progress.fail(job.id, reason);
            this.metrics.increment('pdfs_failed_total');
            this.events.emit('job:error', { jobId: job.id, error: reason });
            this.logger.warn('Job finished with errors', { jobId: job.id, error: reason });
        }

        this.metrics.markProcessed();
        this.updateGauges();

        if (job.resultReadAt !== undefined) {
            this.scheduleEviction(job.id);
        }

        try {
            await removeDir(job.workDir);
        } catch (error) {
            this.logger.warn('Failed to remove chunk files', {
                jobId: job.id,
                workDir: job.workDir,
                error: errorMessage(error),
            });
        }
    }

    private scheduleEviction(jobId: string): void {
        if (this.evictionTimers.has(jobId)) return;

        const timer = setTimeout(() => {
            this.evictionTimers.delete(jobId);
            this.jobStore.delete(jobId);
            this.progress.release(jobId);
            this.logger.debug('Job evicted', { jobId });
        }, this.config.orchestrator.resultRetentionMs);
        timer.unref();
        this.evictionTimers.set(jobId, timer);
    }

    private requireJob(jobId: string): Job {
        const job = this.jobStore.get(jobId);
        if (!job) {
            throw new NotFoundError('Job', jobId);
        }
        return job;
    }

    private updateGauges(): void {
        this.metrics.setGauge('jobs_in_progress', this.activeJobs());
        this.metrics.setGauge('queue_depth', this.queueDepth());
    }
}
