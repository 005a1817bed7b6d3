import * as path from 'path';
import { PDFDocument } from 'pdf-lib';
import type { IPDFProcessor, PDFLoadResult, UploadRules } from '../types/pdf-processor.types.js';
import { UPLOAD_RULES } from '../config/constants.js';
import { FileTooLargeError, InvalidDocumentError, errorMessage } from '../errors/index.js';
import { hashBuffer } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';

/**
 * Parse a PDF with pdf-lib
 * @throws InvalidDocumentError when the bytes cannot be parsed or contain no pages
 */
export async function openPdf(buffer: Buffer, filename: string): Promise<PDFDocument> {
    let document: PDFDocument;
    let pageCount: number;
    try {
        document = await PDFDocument.load(buffer, { ignoreEncryption: true, updateMetadata: false });
        // A header without a catalog loads fine and only fails once the page tree is read
        pageCount = document.getPageCount();
    } catch (error) {
        throw new InvalidDocumentError(`Unable to read PDF: ${errorMessage(error)}`, filename);
    }

    if (pageCount === 0) {
        throw new InvalidDocumentError('PDF file contains no pages', filename);
    }
    return document;
}

/**
 * PDF processing service
 */
export class PDFProcessor implements IPDFProcessor {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    validateUpload(buffer: Buffer, filename: string, rules: UploadRules): void {
        if (path.extname(filename).toLowerCase() !== UPLOAD_RULES.EXTENSION) {
            throw new InvalidDocumentError('Only PDF files are supported', filename);
        }

        if (buffer.length === 0) {
            throw new InvalidDocumentError('Uploaded file is empty', filename);
        }

        if (buffer.length > rules.maxFileBytes) {
            throw new FileTooLargeError(buffer.length, rules.maxFileBytes);
        }

        if (buffer.subarray(0, UPLOAD_RULES.MAGIC.length).toString('latin1') !== UPLOAD_RULES.MAGIC) {
            throw new InvalidDocumentError('File is not a valid PDF document', filename);
        }
    }

    /**
     * Load PDF and read its metadata
     */
    async load(buffer: Buffer, filename: string): Promise<PDFLoadResult> {
        const document = await openPdf(buffer, filename);
        const fileHash = hashBuffer(buffer);
        const pageCount = document.getPageCount();

        this.logger.debug('PDF loaded', {
            filename,
            fileSize: buffer.length,
            pageCount,
        });

        return {
            buffer,
            metadata: {
                filename,
                fileHash,
                fileSize: buffer.length,
                pageCount,
                title: document.getTitle(),
                author: document.getAuthor(),
            },
        };
    }
}
