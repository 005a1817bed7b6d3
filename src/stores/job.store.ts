import { ChunkStatusEnum, JobStatusEnum } from '../types/enums.js';
import type { ChunkResult, Job, RecordChunkOutcome } from '../types/job.types.js';
import type { IJobStore } from '../types/store.types.js';

/**
 * Human-readable reason naming every failed chunk
 */
export function describeFailedChunks(results: ChunkResult[], totalChunks: number): string {
    const failed = results.filter(result => result.status === ChunkStatusEnum.ERROR);
    const details = failed
        .map(result => `chunk ${result.index} (pages ${result.startPage}-${result.endPage}): ${result.error ?? 'unknown error'}`)
        .join('; ');
    return `${failed.length} of ${totalChunks} chunks failed: ${details}`;
}

/**
 * In-memory job store
 *
 * Every mutation runs synchronously to completion, which on the single-threaded
 * event loop makes each one atomic with respect to chunk completion callbacks.
 *
 * @implements {IJobStore}
 */
export class InMemoryJobStore implements IJobStore {
    private readonly jobs = new Map<string, Job>();

    create(job: Job): void {
        this.jobs.set(job.id, job);
    }

    get(jobId: string): Job | undefined {
        return this.jobs.get(jobId);
    }

    delete(jobId: string): boolean {
        return this.jobs.delete(jobId);
    }

    countUnfinished(): number {
        let count = 0;
        for (const job of this.jobs.values()) {
            if (job.finishedAt === undefined) count++;
        }
        return count;
    }

    recordChunkResult(jobId: string, result: ChunkResult): RecordChunkOutcome | undefined {
        const job = this.jobs.get(jobId);
        if (!job) {
            return undefined;
        }

        // Already finalized; a late duplicate must not push the count past the total
        if (job.finishedAt !== undefined) {
            return { job, finalized: false };
        }

        job.results.push(result);
        job.completedChunks += 1;

        if (result.status === ChunkStatusEnum.ERROR && job.status === JobStatusEnum.PROCESSING) {
            job.status = JobStatusEnum.ERROR;
            job.error = describeFailedChunks([result], job.totalChunks);
        }

        if (job.completedChunks < job.totalChunks) {
            return { job, finalized: false };
        }

        job.results.sort((a, b) => a.startPage - b.startPage);
        const anyFailed = job.results.some(r => r.status === ChunkStatusEnum.ERROR);
        if (anyFailed) {
            job.status = JobStatusEnum.ERROR;
            job.error = describeFailedChunks(job.results, job.totalChunks);
        } else {
            job.status = JobStatusEnum.COMPLETED;
        }
        job.finishedAt = new Date();

        return { job, finalized: true };
    }

    markResultRead(jobId: string): boolean {
        const job = this.jobs.get(jobId);
        if (!job || job.resultReadAt !== undefined) {
            return false;
        }
        job.resultReadAt = new Date();
        return true;
    }
}
