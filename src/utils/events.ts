import { EventEmitter } from 'events';
import type { CircuitStateEnumType } from '../types/enums.js';
import type { ChunkResult, JobResultView } from '../types/job.types.js';
import type { ProgressSnapshot } from '../types/progress.types.js';
import type { ExtractResult } from '../types/extraction.types.js';

/**
 * Event types emitted by the pipeline
 */
export interface PipelineEvents {
    // Chunk job events
    'job:created': { jobId: string; filename: string; totalChunks: number };
    'job:chunk': { jobId: string; result: ChunkResult; completedChunks: number; totalChunks: number };
    'job:completed': JobResultView;
    'job:error': { jobId: string; error: string };

    // Progress events
    'progress:update': ProgressSnapshot;

    // Breaker events
    'breaker:state': { name: string; from: CircuitStateEnumType; to: CircuitStateEnumType };

    // Extraction events
    'extract:start': { jobId: string; filename: string; dpi: number };
    'extract:complete': ExtractResult;
    'extract:error': { jobId: string; error: Error };
}

/**
 * Type-safe event emitter for the pipeline
 */
export class PipelineEventEmitter extends EventEmitter {
    emit<K extends keyof PipelineEvents>(
        event: K,
        data: PipelineEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PipelineEvents>(
        event: K,
        listener: (data: PipelineEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PipelineEvents>(
        event: K,
        listener: (data: PipelineEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PipelineEvents>(
        event: K,
        listener: (data: PipelineEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 * The listener cap is lifted since every open progress stream adds one.
 */
export function createEventEmitter(): PipelineEventEmitter {
    const emitter = new PipelineEventEmitter();
    emitter.setMaxListeners(0);
    return emitter;
}
