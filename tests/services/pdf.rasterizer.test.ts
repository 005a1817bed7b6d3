import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    PageRasterizer,
    extractErrorLines,
    parsePageOutputName,
    parsePdfInfo,
} from '../../src/services/pdf.rasterizer.js';
import { CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import { DEFAULT_BREAKER_CONFIG, DEFAULT_RASTER_CONFIG, type RasterConfig } from '../../src/types/config.types.js';
import { ConversionError, InvalidDocumentError, ValidationError } from '../../src/errors/index.js';
import { CircuitStateEnum } from '../../src/types/enums.js';
import { removeDir } from '../../src/utils/storage.js';
import {
    FakeCommandRunner,
    commandFailed,
    commandOk,
    createMockLogger,
    createTempDir,
    fakePdftoppm,
    listFiles,
    pdfInfoOutput,
    pdftoppmOutputName,
    type MockLogger,
} from '../mocks/index.js';

const PDF = Buffer.from('%PDF-1.7 test');

describe('pdfinfo parsing', () => {
    it('should read known fields', () => {
        const info = parsePdfInfo(pdfInfoOutput({ pages: 12, title: 'Report: Q3' }));

        expect(info).toEqual({
            title: 'Report: Q3',
            producer: 'pdf-lib',
            pages: 12,
            fileSize: '1234 bytes',
        });
    });

    it('should skip empty values and unknown keys', () => {
        expect(parsePdfInfo('Title:\nTagged:         no\nPages:  x\n')).toEqual({});
    });
});

describe('extractErrorLines', () => {
    it('should keep error lines and drop the banner', () => {
        const stderr = 'pdftoppm version 22.02.0\nCopyright 2005-2022 The Poppler Developers\nSyntax Error: Couldn\'t find trailer\nInternal Error: xref\n';
        expect(extractErrorLines(stderr)).toEqual([
            'Syntax Error: Couldn\'t find trailer',
            'Internal Error: xref',
        ]);
    });
});

describe('parsePageOutputName', () => {
    it('should read the page number whatever the padding', () => {
        expect(parsePageOutputName('page', 'page-3.png')).toBe(3);
        expect(parsePageOutputName('page', pdftoppmOutputName('page', 7, 12))).toBe(7);
        expect(parsePageOutputName('page', 'page-042.png')).toBe(42);
    });

    it('should ignore other files', () => {
        expect(parsePageOutputName('page', 'input.pdf')).toBeUndefined();
        expect(parsePageOutputName('page', 'probe-1.png')).toBeUndefined();
        expect(parsePageOutputName('page', 'page-.png')).toBeUndefined();
        expect(parsePageOutputName('page', 'page-1a.png')).toBeUndefined();
    });
});

describe('PageRasterizer', () => {
    let workDir: string;
    let runner: FakeCommandRunner;
    let logger: MockLogger;
    let breakers: CircuitBreakerRegistry;

    const createRasterizer = (raster: RasterConfig = DEFAULT_RASTER_CONFIG): PageRasterizer =>
        new PageRasterizer({ workDir, raster }, { runner, breakers }, logger);

    beforeEach(async () => {
        workDir = await createTempDir();
        runner = new FakeCommandRunner();
        logger = createMockLogger();
        breakers = new CircuitBreakerRegistry(DEFAULT_BREAKER_CONFIG, logger);
    });

    afterEach(async () => {
        await removeDir(workDir);
    });

    it('should convert every page reported by pdfinfo', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 3, title: 'Scan' })))
            .on('pdftoppm', fakePdftoppm(3));

        const result = await createRasterizer().rasterize(PDF, 150);

        expect(result.pageCount).toBe(3);
        expect(result.metadata.title).toBe('Scan');
        expect(result.pages.map(p => p.pageNumber)).toEqual([1, 2, 3]);
        expect(result.pages.map(p => p.data.toString())).toEqual(['image-1', 'image-2', 'image-3']);
        expect(result.pages.every(p => p.dpi === 150)).toBe(true);

        const [convert] = runner.callsTo('pdftoppm');
        expect(convert?.args).toEqual(['-f', '1', '-l', '3', '-png', '-r', '150', '-aa', 'yes', '-cropbox', 'input.pdf', 'page']);
        expect(convert?.options.timeoutMs).toBe(DEFAULT_RASTER_CONFIG.timeoutMs);
    });

    it('should remove its temp directory afterwards', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 1 })))
            .on('pdftoppm', fakePdftoppm(1));

        await createRasterizer().rasterize(PDF, 200);

        expect(await listFiles(workDir)).toEqual([]);
    });

    it('should probe the page count when pdfinfo does not report it', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput()))
            .on('pdftoppm', fakePdftoppm(2));

        const result = await createRasterizer().rasterize(PDF, 200);

        expect(result.pageCount).toBe(2);
        const calls = runner.callsTo('pdftoppm');
        // pages 1, 2 and the missing page 3, then the full conversion
        expect(calls).toHaveLength(4);
        expect(calls[0]?.args).toEqual(['-f', '1', '-l', '1', '-singlefile', '-png', '-r', '10', 'input.pdf', 'probe-1']);
        expect(calls[2]?.options.timeoutMs).toBe(DEFAULT_RASTER_CONFIG.probe.pageTimeoutMs);
    });

    it('should stop probing at the page limit', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput()))
            .on('pdftoppm', fakePdftoppm(5));

        const result = await createRasterizer({
            ...DEFAULT_RASTER_CONFIG,
            probe: { maxPages: 2, pageTimeoutMs: 1000 },
        }).rasterize(PDF, 200);

        expect(result.pageCount).toBe(2);
        expect(logger.warn).toHaveBeenCalledWith('Page probe reached its limit', { maxPages: 2 });
    });

    it('should report a document whose first page cannot be rendered', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput()))
            .on('pdftoppm', () => commandFailed(1, 'Syntax Error: broken'));

        await expect(createRasterizer().rasterize(PDF, 200)).rejects.toThrow('PDF file contains no pages');
    });

    it('should fail without tripping the breaker when pdfinfo rejects the file', async () => {
        runner.on('pdfinfo', () => commandFailed(1, 'Syntax Error: May not be a PDF file\n'));

        const rasterizer = createRasterizer();
        await expect(rasterizer.rasterize(PDF, 200)).rejects.toBeInstanceOf(InvalidDocumentError);
        await expect(rasterizer.rasterize(PDF, 200)).rejects.toThrow('Unable to read PDF: Syntax Error: May not be a PDF file');
        expect(breakers.get('rasterizer').getSnapshot().failures).toBe(0);
    });

    it('should surface the error lines of a failed conversion', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 2 })))
            .on('pdftoppm', () => commandFailed(99, 'pdftoppm version 22.02.0\nSyntax Error: broken xref\n'));

        const error = await createRasterizer().rasterize(PDF, 200).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConversionError);
        if (error instanceof ConversionError) {
            expect(error.message).toBe('PDF conversion failed: Syntax Error: broken xref');
            expect(error.exitCode).toBe(99);
        }
        expect(breakers.get('rasterizer').getSnapshot().failures).toBe(1);
    });

    it('should fall back to the exit code when stderr has no error lines', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 1 })))
            .on('pdftoppm', () => commandFailed(3, ''));

        await expect(createRasterizer().rasterize(PDF, 200))
            .rejects.toThrow('PDF conversion failed: pdftoppm exited with code 3');
    });

    it('should fail when an expected page image is missing', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 3 })))
            .on('pdftoppm', fakePdftoppm(3, { skipPage: 2 }));

        await expect(createRasterizer().rasterize(PDF, 200))
            .rejects.toThrow('pdftoppm exited successfully but the image of page 2 is missing');
    });

    it('should convert only the probed pages when a probe times out', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput()))
            .on('pdftoppm', fakePdftoppm(12, { slowProbe: { page: 10, delayMs: 200 } }));

        const result = await createRasterizer({
            ...DEFAULT_RASTER_CONFIG,
            probe: { maxPages: 2000, pageTimeoutMs: 50 },
        }).rasterize(PDF, 200);

        expect(result.pageCount).toBe(9);
        expect(result.pages.map(p => p.data.toString())).toEqual(
            Array.from({ length: 9 }, (_, i) => `image-${i + 1}`)
        );
        expect(logger.warn).toHaveBeenCalledWith('Page probe timed out', { pageNumber: 10, timeoutMs: 50 });
        expect(runner.callsTo('pdftoppm').at(-1)?.args.slice(0, 4)).toEqual(['-f', '1', '-l', '9']);
    });

    it('should reject calls while the breaker is open', async () => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 1 })))
            .on('pdftoppm', () => commandFailed(1, 'Internal Error: crash'));
        breakers = new CircuitBreakerRegistry({ ...DEFAULT_BREAKER_CONFIG, failureThreshold: 1 }, logger);
        const rasterizer = createRasterizer();

        await expect(rasterizer.rasterize(PDF, 200)).rejects.toBeInstanceOf(ConversionError);
        expect(breakers.get('rasterizer').getState()).toBe(CircuitStateEnum.OPEN);
        await expect(rasterizer.rasterize(PDF, 200)).rejects.toThrow('Service temporarily unavailable: rasterizer');
    });

    it('should reject an out-of-range dpi before running anything', async () => {
        await expect(createRasterizer().rasterize(PDF, 20)).rejects.toBeInstanceOf(ValidationError);
        expect(runner.calls).toHaveLength(0);
    });
});
