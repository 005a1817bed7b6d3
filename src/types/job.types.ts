import type { ChunkStatusEnumType, JobStatusEnumType } from './enums.js';

/**
 * A self-contained page range of the source document, written as its own PDF
 */
export interface Chunk {
    /** Chunk ID (`<jobId>-<index>`) */
    id: string;
    /** Zero-based position in the job */
    index: number;
    /** Path of the written chunk PDF */
    filePath: string;
    /** First page (1-indexed, inclusive) */
    startPage: number;
    /** Last page (1-indexed, inclusive) */
    endPage: number;
    pageCount: number;
    sizeBytes: number;
}

/**
 * Token usage reported by a remote analysis provider
 */
export interface TokenUsage {
    input: number;
    output: number;
    total: number;
}

/**
 * Outcome of analysing one chunk
 */
export interface ChunkResult {
    chunkId: string;
    index: number;
    startPage: number;
    endPage: number;
    status: ChunkStatusEnumType;
    content: string;
    /** 0-100 */
    confidence: number;
    model: string;
    usage?: TokenUsage;
    error?: string;
    processingMs: number;
    retryCount: number;
}

/**
 * Chunk-oriented job record
 */
export interface Job {
    id: string;
    filename: string;
    chunks: Chunk[];
    /** Results in completion order until finalization, then in start-page order */
    results: ChunkResult[];
    status: JobStatusEnumType;
    completedChunks: number;
    totalChunks: number;
    error?: string;
    createdAt: Date;
    /** Set once every chunk has reported */
    finishedAt?: Date;
    /** Directory holding the chunk files */
    workDir: string;
    /** Set on the first read of the result in a terminal state */
    resultReadAt?: Date;
}

/**
 * Point-in-time view returned by getStatus
 */
export interface JobStatusView {
    jobId: string;
    filename: string;
    status: JobStatusEnumType;
    progress: {
        completedChunks: number;
        totalChunks: number;
        percentage: number;
    };
    error?: string;
}

/**
 * Merged view returned by getResult
 */
export interface JobResultView {
    jobId: string;
    filename: string;
    status: JobStatusEnumType;
    totalChunks: number;
    results: ChunkResult[];
    /** Chunk contents joined in start-page order */
    content: string;
    /** Mean chunk confidence, 0-100 */
    confidence: number;
    error?: string;
}

/**
 * Outcome of recording one chunk result against a job
 */
export interface RecordChunkOutcome {
    job: Job;
    /** True only for the call that brought completedChunks to totalChunks */
    finalized: boolean;
}
