import * as fs from 'fs/promises';
import * as path from 'path';
import type { RasterConfig } from '../types/config.types.js';
import type { IPageRasterizer, PageImage, PdfInfo, RasterResult } from '../types/ocr.types.js';
import { BREAKER_NAMES, RASTER_DEFAULTS } from '../config/constants.js';
import {
    ConversionError,
    InvalidDocumentError,
    TimeoutError,
    ValidationError,
} from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { ensureDir, fileSize, removeDir } from '../utils/storage.js';
import type { ICommandRunner } from './command.runner.js';
import type { CircuitBreaker, CircuitBreakerRegistry } from './circuit-breaker.js';

export interface PageRasterizerDependencies {
    runner: ICommandRunner;
    breakers: CircuitBreakerRegistry;
}

const PDFINFO_FIELDS: Record<string, keyof Omit<PdfInfo, 'pages'>> = {
    'Title': 'title',
    'Author': 'author',
    'Creator': 'creator',
    'Producer': 'producer',
    'File size': 'fileSize',
};

/**
 * Parse `pdfinfo` output lines of the form `Key:   value`
 */
export function parsePdfInfo(output: string): PdfInfo {
    const info: PdfInfo = {};

    for (const line of output.split(/\r?\n/)) {
        const separator = line.indexOf(':');
        if (separator === -1) continue;

        const key = line.slice(0, separator).trim();
        const value = line.slice(separator + 1).trim();
        if (!value) continue;

        if (key === 'Pages') {
            const pages = Number.parseInt(value, 10);
            if (Number.isFinite(pages)) {
                info.pages = pages;
            }
            continue;
        }

        const field = PDFINFO_FIELDS[key];
        if (field) {
            info[field] = value;
        }
    }

    return info;
}

/**
 * Keep the lines of poppler stderr that report errors, dropping the version banner
 */
export function extractErrorLines(stderr: string): string[] {
    return stderr
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.includes('Error'))
        .filter(line => !line.startsWith('pdftoppm version') && !line.startsWith('Copyright'));
}

/**
 * Page number of a pdftoppm output file such as `page-07.png`
 * The zero padding follows the document's real page count, which a probe may not know.
 */
export function parsePageOutputName(prefix: string, fileName: string): number | undefined {
    if (!fileName.startsWith(`${prefix}-`) || !fileName.endsWith('.png')) {
        return undefined;
    }
    const digits = fileName.slice(prefix.length + 1, -'.png'.length);
    if (!/^\d+$/.test(digits)) {
        return undefined;
    }
    return Number.parseInt(digits, 10);
}

/**
 * Poppler-backed page rasterizer
 *
 * Every run works in its own temp directory under `workDir`, removed on exit.
 * Tool output is located by listing the directory once the process has exited.
 */
export class PageRasterizer implements IPageRasterizer {
    private readonly workDir: string;
    private readonly config: RasterConfig;
    private readonly runner: ICommandRunner;
    private readonly breaker: CircuitBreaker;
    private readonly logger: Logger;

    constructor(
        config: { workDir: string; raster: RasterConfig },
        deps: PageRasterizerDependencies,
        logger: Logger
    ) {
        this.workDir = config.workDir;
        this.config = config.raster;
        this.runner = deps.runner;
        this.breaker = deps.breakers.get(BREAKER_NAMES.RASTERIZER);
        this.logger = logger;
    }

    async rasterize(pdfBytes: Buffer, dpi: number): Promise<RasterResult> {
        if (!Number.isInteger(dpi) || dpi < RASTER_DEFAULTS.MIN_DPI || dpi > RASTER_DEFAULTS.MAX_DPI) {
            throw new ValidationError(
                `DPI must be an integer between ${RASTER_DEFAULTS.MIN_DPI} and ${RASTER_DEFAULTS.MAX_DPI}`,
                'dpi',
                { dpi }
            );
        }

        await ensureDir(this.workDir);
        const tempDir = await fs.mkdtemp(path.join(this.workDir, 'raster-'));

        try {
            await fs.writeFile(path.join(tempDir, RASTER_DEFAULTS.INPUT_FILENAME), pdfBytes);

            const metadata = await this.readInfo(tempDir);
            const pageCount = metadata.pages !== undefined && metadata.pages > 0
                ? metadata.pages
                : await this.probePageCount(tempDir);

            const pages = await this.convert(tempDir, dpi, pageCount);

            this.logger.debug('PDF rasterized', { pageCount, dpi });
            return { pageCount, metadata, pages };
        } finally {
            await removeDir(tempDir);
        }
    }

    private async readInfo(tempDir: string): Promise<PdfInfo> {
        const result = await this.breaker.execute(async () => {
            const output = await this.runner.run(
                this.config.pdfinfoPath,
                ['-box', '-meta', RASTER_DEFAULTS.INPUT_FILENAME],
                { cwd: tempDir }
            );
            if (output.exitCode !== 0) {
                throw new InvalidDocumentError(
                    `Unable to read PDF: ${output.stderr.trim() || `pdfinfo exited with code ${output.exitCode}`}`,
                    undefined,
                    { exitCode: output.exitCode }
                );
            }
            return output;
        });

        return parsePdfInfo(result.stdout.toString('utf8'));
    }

    /**
     * Count pages by rendering them one at a time at minimal resolution until one is missing
     */
    private async probePageCount(tempDir: string): Promise<number> {
        const { maxPages, pageTimeoutMs } = this.config.probe;
        let pageCount = 0;

        for (let pageNumber = 1; pageNumber <= maxPages; pageNumber++) {
            if (!(await this.probePage(tempDir, pageNumber, pageTimeoutMs))) {
                break;
            }
            pageCount = pageNumber;
        }

        if (pageCount === 0) {
            throw new InvalidDocumentError('PDF file contains no pages');
        }

        if (pageCount === maxPages) {
            this.logger.warn('Page probe reached its limit', { maxPages });
        }

        this.logger.debug('Page count probed', { pageCount });
        return pageCount;
    }

    private async probePage(tempDir: string, pageNumber: number, timeoutMs: number): Promise<boolean> {
        const prefix = `${RASTER_DEFAULTS.PROBE_PREFIX}-${pageNumber}`;
        const args = [
            '-f', String(pageNumber),
            '-l', String(pageNumber),
            '-singlefile',
            '-png',
            '-r', String(RASTER_DEFAULTS.PROBE_DPI),
            RASTER_DEFAULTS.INPUT_FILENAME,
            prefix,
        ];

        try {
            const output = await this.breaker.execute(
                () => this.runner.run(this.config.pdftoppmPath, args, { cwd: tempDir, timeoutMs }),
                { timeoutMs }
            );
            if (output.exitCode !== 0) {
                return false;
            }
        } catch (error) {
            if (error instanceof TimeoutError) {
                this.logger.warn('Page probe timed out', { pageNumber, timeoutMs });
                return false;
            }
            throw error;
        }

        const probeFile = path.join(tempDir, `${prefix}.png`);
        const size = await fileSize(probeFile);
        await fs.rm(probeFile, { force: true });
        return size !== undefined && size > 0;
    }

    private async convert(tempDir: string, dpi: number, pageCount: number): Promise<PageImage[]> {
        const args = [
            '-f', '1',
            '-l', String(pageCount),
            '-png',
            '-r', String(dpi),
            '-aa', 'yes',
            '-cropbox',
            RASTER_DEFAULTS.INPUT_FILENAME,
            RASTER_DEFAULTS.PAGE_PREFIX,
        ];

        await this.breaker.execute(async () => {
            const output = await this.runner.run(this.config.pdftoppmPath, args, {
                cwd: tempDir,
                timeoutMs: this.config.timeoutMs,
            });
            if (output.exitCode !== 0) {
                const errorLines = extractErrorLines(output.stderr);
                const reason = errorLines.length > 0
                    ? errorLines.join('; ')
                    : `pdftoppm exited with code ${output.exitCode}`;
                throw new ConversionError(`PDF conversion failed: ${reason}`, {
                    exitCode: output.exitCode,
                    details: { errorLines },
                });
            }
        }, { timeoutMs: this.config.timeoutMs });

        const outputs = new Map<number, string>();
        for (const name of await fs.readdir(tempDir)) {
            const pageNumber = parsePageOutputName(RASTER_DEFAULTS.PAGE_PREFIX, name);
            if (pageNumber !== undefined) {
                outputs.set(pageNumber, name);
            }
        }

        const pages: PageImage[] = [];
        for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
            const name = outputs.get(pageNumber);
            if (name === undefined) {
                throw new ConversionError(`pdftoppm exited successfully but the image of page ${pageNumber} is missing`, {
                    details: { pageNumber, pageCount },
                });
            }
            pages.push({
                pageNumber,
                data: await fs.readFile(path.join(tempDir, name)),
                dpi,
            });
        }

        if (pages.length === 0) {
            throw new ConversionError('PDF conversion produced no images');
        }

        return pages;
    }
}
