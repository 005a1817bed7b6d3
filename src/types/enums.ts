/**
 * Chunk job status enumeration
 */
export const JobStatusEnum = {
    PROCESSING: 'processing',
    COMPLETED: 'completed',
    ERROR: 'error',
} as const;

export type JobStatusEnumType = (typeof JobStatusEnum)[keyof typeof JobStatusEnum];

/**
 * Per-chunk outcome
 */
export const ChunkStatusEnum = {
    COMPLETED: 'completed',
    ERROR: 'error',
} as const;

export type ChunkStatusEnumType = (typeof ChunkStatusEnum)[keyof typeof ChunkStatusEnum];

/**
 * Progress units: single-document OCR counts pages, chunk jobs count chunks
 */
export const ProgressUnitEnum = {
    PAGES: 'pages',
    CHUNKS: 'chunks',
} as const;

export type ProgressUnitEnumType = (typeof ProgressUnitEnum)[keyof typeof ProgressUnitEnum];

/**
 * Circuit breaker state enumeration
 */
export const CircuitStateEnum = {
    CLOSED: 'closed',
    OPEN: 'open',
    HALF_OPEN: 'half-open',
} as const;

export type CircuitStateEnumType = (typeof CircuitStateEnum)[keyof typeof CircuitStateEnum];

/**
 * Analysis provider variants
 */
export const AnalysisProviderEnum = {
    OPENAI: 'openai',
    OCR: 'ocr',
} as const;

export type AnalysisProviderEnumType = (typeof AnalysisProviderEnum)[keyof typeof AnalysisProviderEnum];
