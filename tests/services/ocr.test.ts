import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TesseractOcrEngine, clampConfidence, parseTesseractTsv } from '../../src/services/ocr/tesseract.engine.js';
import { OcrWorkerPool, calculateConfidence, combineText } from '../../src/services/ocr/ocr.worker-pool.js';
import { CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import { DEFAULT_BREAKER_CONFIG, DEFAULT_OCR_CONFIG, type OcrConfig } from '../../src/types/config.types.js';
import type { OcrOutput, PageImage } from '../../src/types/ocr.types.js';
import { ToolFailureError } from '../../src/errors/index.js';
import {
    FakeCommandRunner,
    commandFailed,
    commandOk,
    createMockLogger,
    createMockOcrEngine,
    createPageImages,
    tesseractTsv,
} from '../mocks/index.js';
import { wait } from '../setup.js';

const ocrConfig: OcrConfig = { ...DEFAULT_OCR_CONFIG, maxWorkers: 2, batchSize: 2 };

describe('Tesseract TSV parsing', () => {
    it('should join words into lines and average confidence', () => {
        const tsv = tesseractTsv([
            [{ text: 'Hello', conf: 90 }, { text: 'world', conf: 80 }],
            [{ text: 'Second', conf: 70 }],
        ]);

        expect(parseTesseractTsv(tsv)).toEqual({ text: 'Hello world\nSecond', confidence: 80 });
    });

    it('should separate blocks with a blank line', () => {
        const header = 'level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext';
        const tsv = [
            header,
            '5\t1\t1\t1\t1\t1\t0\t0\t10\t10\t95\tTitle',
            '5\t1\t2\t1\t1\t1\t0\t0\t10\t10\t85\tBody',
        ].join('\n');

        expect(parseTesseractTsv(tsv)).toEqual({ text: 'Title\n\nBody', confidence: 90 });
    });

    it('should ignore non-word rows, blank words and unscored words', () => {
        const header = 'level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext';
        const tsv = [
            header,
            '1\t1\t0\t0\t0\t0\t0\t0\t100\t100\t-1\t',
            '5\t1\t1\t1\t1\t1\t0\t0\t10\t10\t60\tword',
            '5\t1\t1\t1\t1\t2\t0\t0\t10\t10\t-1\tnoise',
            '5\t1\t1\t1\t1\t3\t0\t0\t10\t10\t50\t   ',
        ].join('\n');

        expect(parseTesseractTsv(tsv)).toEqual({ text: 'word noise', confidence: 60 });
    });

    it('should return empty text and zero confidence for a blank page', () => {
        expect(parseTesseractTsv(tesseractTsv([]))).toEqual({ text: '', confidence: 0 });
    });

    it('should clamp confidence', () => {
        expect(clampConfidence(120)).toBe(100);
        expect(clampConfidence(-5)).toBe(0);
        expect(clampConfidence(Number.NaN)).toBe(0);
        expect(clampConfidence(42.5)).toBe(42.5);
    });
});

describe('TesseractOcrEngine', () => {
    let runner: FakeCommandRunner;
    let engine: TesseractOcrEngine;
    const image: PageImage = { pageNumber: 4, data: Buffer.from('png-bytes'), dpi: 200 };

    beforeEach(() => {
        runner = new FakeCommandRunner();
        const breakers = new CircuitBreakerRegistry(DEFAULT_BREAKER_CONFIG, createMockLogger());
        engine = new TesseractOcrEngine({ ...ocrConfig, language: 'deu' }, { runner, breakers }, createMockLogger());
    });

    it('should pipe the image through tesseract and parse TSV', async () => {
        runner.on('tesseract', () => commandOk(tesseractTsv([[{ text: 'Guten', conf: 88 }, { text: 'Tag', conf: 92 }]])));

        const output = await engine.recognize(image);

        expect(output).toEqual({ text: 'Guten Tag', confidence: 90 });
        const [call] = runner.callsTo('tesseract');
        expect(call?.args).toEqual(['stdin', 'stdout', '-l', 'deu', '--oem', '1', '--psm', '3', 'tsv']);
        expect(call?.options.input).toBe(image.data);
        expect(call?.options.timeoutMs).toBe(60_000);
    });

    it('should raise a tool failure on non-zero exit', async () => {
        runner.on('tesseract', () => commandFailed(1, 'Error opening data file deu.traineddata\n'));

        const error = await engine.recognize(image).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ToolFailureError);
        if (error instanceof ToolFailureError) {
            expect(error.message).toBe('tesseract failed on page 4: Error opening data file deu.traineddata');
            expect(error.tool).toBe('tesseract');
        }
    });
});

describe('OcrWorkerPool', () => {
    it('should return results sorted by page number', async () => {
        const engine = createMockOcrEngine();
        engine.recognize.mockImplementation(async (page: PageImage): Promise<OcrOutput> => {
            await wait((6 - page.pageNumber) * 5);
            return { text: `page ${page.pageNumber}`, confidence: 90 };
        });
        const pool = new OcrWorkerPool(ocrConfig, engine, createMockLogger());

        const results = await pool.processDocument(createPageImages(5), () => undefined);

        expect(results.map(r => r.pageNumber)).toEqual([1, 2, 3, 4, 5]);
        expect(results.map(r => r.text)).toEqual(['page 1', 'page 2', 'page 3', 'page 4', 'page 5']);
    });

    it('should never run more than maxWorkers pages at once', async () => {
        const engine = createMockOcrEngine();
        let active = 0;
        let peak = 0;
        engine.recognize.mockImplementation(async (page: PageImage): Promise<OcrOutput> => {
            active += 1;
            peak = Math.max(peak, active);
            await wait(5);
            active -= 1;
            return { text: `page ${page.pageNumber}`, confidence: 90 };
        });
        const pool = new OcrWorkerPool(ocrConfig, engine, createMockLogger());

        await pool.processDocument(createPageImages(7), () => undefined);

        expect(peak).toBe(2);
        expect(engine.recognize).toHaveBeenCalledTimes(7);
    });

    it('should report progress once per batch', async () => {
        const pool = new OcrWorkerPool(ocrConfig, createMockOcrEngine(), createMockLogger());
        const onProgress = vi.fn();

        await pool.processDocument(createPageImages(5), onProgress);

        expect(onProgress).toHaveBeenCalledTimes(3);
        const counts = onProgress.mock.calls.map(call => call[0]);
        expect(counts.sort()).toEqual([1, 2, 2]);
    });

    it('should keep going when a page fails', async () => {
        const engine = createMockOcrEngine();
        engine.recognize.mockImplementation(async (page: PageImage): Promise<OcrOutput> => {
            if (page.pageNumber === 2) throw new ToolFailureError('tesseract crashed', 'tesseract');
            return { text: `page ${page.pageNumber}`, confidence: 90 };
        });
        const logger = createMockLogger();
        const pool = new OcrWorkerPool(ocrConfig, engine, logger);

        const results = await pool.processDocument(createPageImages(3), () => undefined);

        expect(results[1]).toEqual({ pageNumber: 2, text: '', confidence: 0, error: 'tesseract crashed' });
        expect(results[0]?.text).toBe('page 1');
        expect(logger.warn).toHaveBeenCalledWith('OCR failed for page', { pageNumber: 2, error: 'tesseract crashed' });
    });

    it('should handle an empty document', async () => {
        const pool = new OcrWorkerPool(ocrConfig, createMockOcrEngine(), createMockLogger());
        const onProgress = vi.fn();

        await expect(pool.processDocument([], onProgress)).resolves.toEqual([]);
        expect(onProgress).not.toHaveBeenCalled();
    });
});

describe('result helpers', () => {
    it('should average confidence with failed pages as zero', () => {
        expect(calculateConfidence([
            { pageNumber: 1, text: 'a', confidence: 90 },
            { pageNumber: 2, text: '', confidence: 0, error: 'boom' },
            { pageNumber: 3, text: 'c', confidence: 60 },
        ])).toBe(50);
        expect(calculateConfidence([])).toBe(0);
    });

    it('should join page texts with newlines', () => {
        expect(combineText([
            { pageNumber: 1, text: 'first', confidence: 90 },
            { pageNumber: 2, text: '', confidence: 0 },
            { pageNumber: 3, text: 'third', confidence: 90 },
        ])).toBe('first\n\nthird');
    });
});
