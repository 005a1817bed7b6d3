import type { IProgressStore, ProgressState } from '../types/progress.types.js';

/**
 * In-memory progress store
 *
 * @implements {IProgressStore}
 */
export class InMemoryProgressStore implements IProgressStore {
    private readonly records = new Map<string, ProgressState>();

    get(jobId: string): ProgressState | undefined {
        return this.records.get(jobId);
    }

    set(state: ProgressState): void {
        this.records.set(state.jobId, state);
    }

    delete(jobId: string): boolean {
        return this.records.delete(jobId);
    }

    size(): number {
        return this.records.size;
    }
}
