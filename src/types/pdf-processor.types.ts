import type { Chunk } from './job.types.js';

/**
 * PDF document metadata extracted during loading
 */
export interface PDFMetadata {
    /** Original filename */
    filename: string;
    /** SHA-256 hash of file content */
    fileHash: string;
    /** File size in bytes */
    fileSize: number;
    /** Total number of pages */
    pageCount: number;
    /** Document title from PDF metadata */
    title?: string;
    /** Document author from PDF metadata */
    author?: string;
}

/**
 * Result of loading a PDF document
 */
export interface PDFLoadResult {
    /** PDF file buffer */
    buffer: Buffer;
    /** Extracted metadata */
    metadata: PDFMetadata;
}

/**
 * Upload acceptance rules
 */
export interface UploadRules {
    maxFileBytes: number;
}

/**
 * PDF Processor Interface
 *
 * Abstraction over the PDF library so engines can be tested without real documents.
 */
export interface IPDFProcessor {
    /**
     * Reject anything that is not a plausible PDF upload
     * Checks extension, emptiness, `%PDF-` header and size
     */
    validateUpload(buffer: Buffer, filename: string, rules: UploadRules): void;

    /**
     * Parse the document and read its metadata
     * @throws InvalidDocumentError when the bytes cannot be parsed or have no pages
     */
    load(buffer: Buffer, filename: string): Promise<PDFLoadResult>;
}

/**
 * One planned chunk window, 1-indexed inclusive
 */
export interface ChunkWindow {
    index: number;
    startPage: number;
    endPage: number;
}

/**
 * Chunking request
 */
export interface SplitOptions {
    chunkSize: number;
    overlap: number;
    jobId: string;
    filename?: string;
}

/**
 * Written chunks of one document
 */
export interface SplitResult {
    totalPages: number;
    chunks: Chunk[];
    /** Per-job chunk directory */
    workDir: string;
}

/**
 * Splits a PDF into chunk files
 */
export interface IPdfChunker {
    split(pdfBytes: Buffer, options: SplitOptions): Promise<SplitResult>;
}
