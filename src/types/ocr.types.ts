/**
 * One rendered page
 */
export interface PageImage {
    /** 1-indexed */
    pageNumber: number;
    /** PNG bytes */
    data: Buffer;
    dpi: number;
}

/**
 * OCR output for one page
 */
export interface PageResult {
    /** 1-indexed */
    pageNumber: number;
    text: string;
    /** 0-100; 0 for a failed page */
    confidence: number;
    error?: string;
}

/**
 * Raw recognition output of an OCR engine
 */
export interface OcrOutput {
    text: string;
    /** 0-100 */
    confidence: number;
}

/**
 * Page-level OCR engine
 */
export interface IOcrEngine {
    readonly name: string;
    recognize(image: PageImage): Promise<OcrOutput>;
}

/**
 * Called with the number of pages a batch just finished
 */
export type ProgressCallback = (completedCount: number) => void | Promise<void>;

/**
 * Fields read from `pdfinfo`
 */
export interface PdfInfo {
    title?: string;
    author?: string;
    creator?: string;
    producer?: string;
    fileSize?: string;
    pages?: number;
}

/**
 * Result of rasterizing one document
 */
export interface RasterResult {
    pageCount: number;
    metadata: PdfInfo;
    /** Ordered by page number */
    pages: PageImage[];
}

/**
 * Converts a PDF into page images
 */
export interface IPageRasterizer {
    rasterize(pdfBytes: Buffer, dpi: number): Promise<RasterResult>;
}

/**
 * Runs OCR over a set of page images
 */
export interface IOcrWorkerPool {
    readonly maxWorkers: number;
    processDocument(images: PageImage[], onProgress: ProgressCallback): Promise<PageResult[]>;
}
