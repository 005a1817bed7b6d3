import type { ChunkResult, Job, RecordChunkOutcome } from './job.types.js';

/**
 * Job storage
 *
 * Implementations must apply `recordChunkResult` as a single synchronous step
 * so concurrent chunk completions cannot lose updates.
 */
export interface IJobStore {
    create(job: Job): void;
    get(jobId: string): Job | undefined;
    delete(jobId: string): boolean;
    /** Jobs whose last chunk has not reported yet, whatever their status */
    countUnfinished(): number;
    /**
     * Append a result and bump completedChunks. A failed chunk flips the job to
     * `error` at once; when the last chunk reports, results are sorted by start
     * page and the final status and reason are settled.
     * @returns undefined when the job no longer exists
     */
    recordChunkResult(jobId: string, result: ChunkResult): RecordChunkOutcome | undefined;
    /**
     * Stamp the first terminal read
     * @returns true for the call that stamped it
     */
    markResultRead(jobId: string): boolean;
}
