import type { IProgressStore, ProgressSnapshot, ProgressState } from '../../types/progress.types.js';
import { JobStatusEnum, type ProgressUnitEnumType } from '../../types/enums.js';
import { NotFoundError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import type { PipelineEventEmitter } from '../../utils/events.js';
import { ProgressStream } from './progress.stream.js';

export interface ProgressTrackerOptions {
    /** Terminal records nobody streamed are released after this many ms (default: never) */
    retentionMs?: number;
}

/**
 * Raw completion percentage clamped to [0, 100]
 */
export function rawPercentage(processed: number, total: number): number {
    if (total <= 0) return 0;
    return Math.min(100, Math.max(0, (processed / total) * 100));
}

export function isTerminal(status: ProgressState['status']): boolean {
    return status === JobStatusEnum.COMPLETED || status === JobStatusEnum.ERROR;
}

/**
 * Build the public view of a record
 * Percentage stays below 100 until the job completes and never drops under the high-water mark.
 */
export function toSnapshot(state: ProgressState, now: number = Date.now()): ProgressSnapshot {
    const percentage = state.status === JobStatusEnum.COMPLETED
        ? 100
        : Math.max(state.highWaterPercentage, Math.min(99, rawPercentage(state.processed, state.total)));

    const snapshot: ProgressSnapshot = {
        jobId: state.jobId,
        unit: state.unit,
        total: state.total,
        processed: state.processed,
        status: state.status,
        percentage: Math.round(percentage * 100) / 100,
        updatedAt: state.updatedAt,
    };

    if (state.processed > 0 && !isTerminal(state.status)) {
        const elapsedSeconds = Math.max(0, now - state.startedAt.getTime()) / 1000;
        const remaining = Math.max(0, state.total - state.processed);
        snapshot.estimatedTimeRemaining = Math.round((elapsedSeconds / state.processed) * remaining * 100) / 100;
    }

    if (state.error !== undefined) {
        snapshot.error = state.error;
    }

    return snapshot;
}

/**
 * Per-job progress records
 *
 * Only the job's own processing path calls the mutators; readers get snapshots.
 * Every mutation emits `progress:update`.
 */
export class ProgressTracker {
    private readonly store: IProgressStore;
    private readonly events: PipelineEventEmitter;
    private readonly logger: Logger;
    private readonly retentionMs?: number;

    constructor(
        store: IProgressStore,
        events: PipelineEventEmitter,
        logger: Logger,
        options: ProgressTrackerOptions = {}
    ) {
        this.store = store;
        this.events = events;
        this.logger = logger;
        this.retentionMs = options.retentionMs;
    }

    start(jobId: string, unit: ProgressUnitEnumType, total: number): ProgressSnapshot {
        const now = new Date();
        const state: ProgressState = {
            jobId,
            unit,
            total,
            processed: 0,
            status: JobStatusEnum.PROCESSING,
            startedAt: now,
            updatedAt: now,
            highWaterPercentage: 0,
        };
        this.store.set(state);
        this.logger.debug('Progress tracking started', { jobId, unit, total });
        return this.publish(state);
    }

    setTotal(jobId: string, total: number): ProgressSnapshot | undefined {
        return this.mutate(jobId, state => {
            state.total = total;
        });
    }

    advance(jobId: string, count: number): ProgressSnapshot | undefined {
        return this.mutate(jobId, state => {
            state.processed += count;
        });
    }

    complete(jobId: string): ProgressSnapshot | undefined {
        const snapshot = this.mutate(jobId, state => {
            state.status = JobStatusEnum.COMPLETED;
            state.processed = Math.max(state.processed, state.total);
        });
        if (snapshot) this.scheduleRelease(jobId);
        return snapshot;
    }

    fail(jobId: string, reason: string): ProgressSnapshot | undefined {
        const snapshot = this.mutate(jobId, state => {
            state.status = JobStatusEnum.ERROR;
            state.error = reason;
        });
        if (snapshot) this.scheduleRelease(jobId);
        return snapshot;
    }

    snapshot(jobId: string): ProgressSnapshot | undefined {
        const state = this.store.get(jobId);
        return state ? toSnapshot(state) : undefined;
    }

    /**
     * Live updates for a job, coalesced on the rounded percentage
     * @throws NotFoundError when the job has no progress record
     */
    stream(jobId: string): ProgressStream {
        const initial = this.snapshot(jobId);
        if (!initial) {
            throw new NotFoundError('Job', jobId);
        }
        return new ProgressStream(initial, this.events, () => this.release(jobId));
    }

    release(jobId: string): boolean {
        return this.store.delete(jobId);
    }

    /** Records currently held */
    size(): number {
        return this.store.size();
    }

    private mutate(jobId: string, apply: (state: ProgressState) => void): ProgressSnapshot | undefined {
        const state = this.store.get(jobId);
        if (!state || isTerminal(state.status)) {
            return undefined;
        }

        apply(state);
        state.updatedAt = new Date();
        return this.publish(state);
    }

    private publish(state: ProgressState): ProgressSnapshot {
        const snapshot = toSnapshot(state);
        if (state.status !== JobStatusEnum.COMPLETED) {
            state.highWaterPercentage = snapshot.percentage;
        }
        this.store.set(state);
        this.events.emit('progress:update', snapshot);
        return snapshot;
    }

    private scheduleRelease(jobId: string): void {
        if (this.retentionMs === undefined) return;
        const timer = setTimeout(() => this.release(jobId), this.retentionMs);
        timer.unref();
    }
}
