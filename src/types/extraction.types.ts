import type { PageResult, PdfInfo } from './ocr.types.js';

/**
 * Options for single-document extraction
 */
export interface ExtractOptions {
    filename: string;
    /** Rendering resolution, 50-600 (default: raster.dpi) */
    dpi?: number;
    /** Pre-assigned job ID, generated when omitted */
    jobId?: string;
}

export interface ExtractMetadata {
    jobId: string;
    filename: string;
    numPages: number;
    dpi: number;
    processingTimeSeconds: number;
    workers: number;
    fileHash: string;
    pdfInfo: PdfInfo;
    /** Page numbers whose OCR failed */
    failedPages: number[];
}

/**
 * Single-document extraction result
 */
export interface ExtractResult {
    /** Page texts joined with newlines */
    text: string;
    /** Mean page confidence, 0-100 */
    confidence: number;
    pages: PageResult[];
    metadata: ExtractMetadata;
}

/**
 * Options for chunked upload
 */
export interface UploadOptions {
    filename: string;
    chunkSize?: number;
    overlap?: number;
}

/**
 * Chunked upload acknowledgement
 */
export interface UploadResult {
    jobId: string;
    fileName: string;
    totalPages: number;
    totalChunks: number;
}
