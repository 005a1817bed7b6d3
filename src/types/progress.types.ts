import type { JobStatusEnumType, ProgressUnitEnumType } from './enums.js';

/**
 * Mutable progress record, one per in-flight job
 */
export interface ProgressState {
    jobId: string;
    unit: ProgressUnitEnumType;
    total: number;
    processed: number;
    status: JobStatusEnumType;
    startedAt: Date;
    updatedAt: Date;
    /** Highest percentage reported so far */
    highWaterPercentage: number;
    error?: string;
}

/**
 * Read-only view of a progress record
 */
export interface ProgressSnapshot {
    jobId: string;
    unit: ProgressUnitEnumType;
    total: number;
    processed: number;
    status: JobStatusEnumType;
    /** 0-100, below 100 until completed */
    percentage: number;
    /** Seconds, omitted when nothing was processed yet or the job is terminal */
    estimatedTimeRemaining?: number;
    error?: string;
    updatedAt: Date;
}

/**
 * Storage for progress records
 */
export interface IProgressStore {
    get(jobId: string): ProgressState | undefined;
    set(state: ProgressState): void;
    delete(jobId: string): boolean;
    size(): number;
}
