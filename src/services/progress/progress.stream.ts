import type { ProgressSnapshot } from '../../types/progress.types.js';
import { JobStatusEnum } from '../../types/enums.js';
import type { PipelineEventEmitter } from '../../utils/events.js';

function isTerminalSnapshot(snapshot: ProgressSnapshot): boolean {
    return snapshot.status === JobStatusEnum.COMPLETED || snapshot.status === JobStatusEnum.ERROR;
}

/**
 * Async iterator over one job's progress
 *
 * Yields the current snapshot first, then one per change of the rounded percentage,
 * then the terminal snapshot, after which it ends and calls `onTerminalRead`.
 * Calling `return()` (or breaking out of `for await`) detaches it immediately.
 */
export class ProgressStream implements AsyncIterableIterator<ProgressSnapshot> {
    private readonly jobId: string;
    private readonly events: PipelineEventEmitter;
    private readonly onTerminalRead: () => void;
    private readonly queue: ProgressSnapshot[] = [];
    private pending?: (result: IteratorResult<ProgressSnapshot>) => void;
    private lastRounded: number;
    private attached = true;
    private finished = false;

    private readonly listener = (snapshot: ProgressSnapshot): void => {
        if (snapshot.jobId !== this.jobId) return;

        const terminal = isTerminalSnapshot(snapshot);
        const rounded = Math.round(snapshot.percentage);
        if (!terminal && rounded === this.lastRounded) return;

        this.lastRounded = rounded;
        if (terminal) this.detach();
        this.deliver(snapshot);
    };

    constructor(initial: ProgressSnapshot, events: PipelineEventEmitter, onTerminalRead: () => void) {
        this.jobId = initial.jobId;
        this.events = events;
        this.onTerminalRead = onTerminalRead;
        this.lastRounded = Math.round(initial.percentage);
        this.queue.push(initial);

        if (isTerminalSnapshot(initial)) {
            this.attached = false;
        } else {
            this.events.on('progress:update', this.listener);
        }
    }

    next(): Promise<IteratorResult<ProgressSnapshot>> {
        const snapshot = this.queue.shift();
        if (snapshot) {
            return Promise.resolve(this.handOut(snapshot));
        }
        if (this.finished || !this.attached) {
            return Promise.resolve({ done: true, value: undefined });
        }
        return new Promise(resolve => {
            this.pending = resolve;
        });
    }

    return(): Promise<IteratorResult<ProgressSnapshot>> {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
    }

    /** Stop listening and end any waiting `next()` */
    close(): void {
        this.finished = true;
        this.detach();
        this.queue.length = 0;
        const pending = this.pending;
        this.pending = undefined;
        pending?.({ done: true, value: undefined });
    }

    [Symbol.asyncIterator](): this {
        return this;
    }

    private deliver(snapshot: ProgressSnapshot): void {
        const pending = this.pending;
        if (pending) {
            this.pending = undefined;
            pending(this.handOut(snapshot));
            return;
        }
        this.queue.push(snapshot);
    }

    private handOut(snapshot: ProgressSnapshot): IteratorResult<ProgressSnapshot> {
        if (isTerminalSnapshot(snapshot)) {
            this.finished = true;
            this.detach();
            this.onTerminalRead();
        }
        return { done: false, value: snapshot };
    }

    private detach(): void {
        if (!this.attached) return;
        this.attached = false;
        this.events.off('progress:update', this.listener);
    }
}
