// Re-export all types from a single entry point
export * from './enums.js';
export * from './config.types.js';
export * from './job.types.js';
export * from './ocr.types.js';
export * from './progress.types.js';
export * from './extraction.types.js';
export * from './health.types.js';

// Service interfaces
export * from './analysis-provider.types.js';
export * from './pdf-processor.types.js';
export * from './store.types.js';
