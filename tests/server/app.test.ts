import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/server/app.js';
import { createOcrPipeline } from '../../src/ocr-pipeline.factory.js';
import type { OcrPipeline } from '../../src/ocr-pipeline.js';
import type { OcrPipelineConfig } from '../../src/types/config.types.js';
import type { AnalysisResult } from '../../src/types/analysis-provider.types.js';
import { removeDir } from '../../src/utils/storage.js';
import { NotFoundError, getCorrelationId } from '../../src/errors/index.js';
import {
    FakeCommandRunner,
    commandFailed,
    commandOk,
    createMockAnalysisProvider,
    createMockLogger,
    createMockOcrEngine,
    createMockStorageProbe,
    createPdfBuffer,
    createTempDir,
    fakePdftoppm,
    pdfInfoOutput,
    type MockAnalysisProvider,
} from '../mocks/index.js';
import { createDeferred } from '../setup.js';

describe('HTTP API', () => {
    let workDir: string;
    let runner: FakeCommandRunner;
    let provider: MockAnalysisProvider;
    let pipeline: OcrPipeline;
    let app: Express;

    const setup = (overrides: OcrPipelineConfig = {}): void => {
        const logger = createMockLogger();
        pipeline = createOcrPipeline({
            workDir,
            ocr: { maxWorkers: 2, batchSize: 2 },
            analysis: { retryDelayMs: 0 },
            logging: { level: 'error' },
            ...overrides,
        }, {
            logger,
            runner,
            storage: createMockStorageProbe(),
            ocrEngine: createMockOcrEngine(),
            analysisProvider: provider,
        });
        app = createApp(pipeline);
    };

    const scanned = (pages: number): void => {
        runner
            .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages })))
            .on('pdftoppm', fakePdftoppm(pages));
    };

    beforeEach(async () => {
        workDir = await createTempDir();
        runner = new FakeCommandRunner();
        provider = createMockAnalysisProvider();
        setup();
    });

    afterEach(async () => {
        await pipeline.shutdown();
        await removeDir(workDir);
    });

    describe('POST /extract', () => {
        it('should return the OCR text with the job id header', async () => {
            scanned(2);
            const pdf = await createPdfBuffer(2);

            const res = await request(app).post('/extract').attach('file', pdf, 'scan.pdf');

            expect(res.status).toBe(200);
            expect(res.headers['x-job-id']).toMatch(/^[0-9a-f-]{36}$/);
            expect(res.body.text).toBe('page 1\npage 2');
            expect(res.body.confidence).toBe(90);
            expect(res.body.metadata).toMatchObject({
                num_pages: 2,
                dpi: 200,
                job_id: res.headers['x-job-id'],
                filename: 'scan.pdf',
                workers: 2,
                failed_pages: [],
            });
        });

        it('should render at the requested dpi', async () => {
            scanned(1);
            const pdf = await createPdfBuffer(1);

            const res = await request(app).post('/extract?dpi=300').attach('file', pdf, 'scan.pdf');

            expect(res.status).toBe(200);
            expect(res.body.metadata.dpi).toBe(300);
        });

        it('should reject a dpi out of range', async () => {
            const pdf = await createPdfBuffer(1);

            const res = await request(app).post('/extract?dpi=10').attach('file', pdf, 'scan.pdf');

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('VALIDATION_ERROR');
            expect(res.body.message).toBe('Invalid dpi: Number must be greater than or equal to 50');
            expect(runner.calls).toHaveLength(0);
        });

        it('should require a file', async () => {
            const res = await request(app).post('/extract');

            expect(res.status).toBe(400);
            expect(res.body).toMatchObject({ error: 'VALIDATION_ERROR', message: 'No file uploaded' });
        });

        it('should refuse files that are not PDFs', async () => {
            const res = await request(app).post('/extract').attach('file', Buffer.from('plain text'), 'notes.txt');

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('INVALID_DOCUMENT');
        });

        it('should answer 413 for uploads over the limit', async () => {
            setup({ limits: { maxFileBytes: 1000 } });

            const res = await request(app).post('/extract').attach('file', Buffer.alloc(2000, 1), 'big.pdf');

            expect(res.status).toBe(413);
            expect(res.body).toMatchObject({
                error: 'FILE_TOO_LARGE',
                message: 'File exceeds limit of 1000 bytes',
            });
        });

        it('should surface conversion failures as 500 with their code', async () => {
            runner
                .on('pdfinfo', () => commandOk(pdfInfoOutput({ pages: 2 })))
                .on('pdftoppm', () => commandFailed(1, 'Syntax Error: broken xref'));
            const pdf = await createPdfBuffer(2);

            const res = await request(app).post('/extract').attach('file', pdf, 'scan.pdf');

            expect(res.status).toBe(500);
            expect(res.body).toMatchObject({
                error: 'CONVERSION_ERROR',
                message: 'PDF conversion failed: Syntax Error: broken xref',
            });
        });

        it('should hide the message of unexpected errors', async () => {
            runner.on('pdfinfo', () => {
                throw new Error('spawn pdfinfo ENOENT');
            });
            const pdf = await createPdfBuffer(1);

            const res = await request(app).post('/extract').attach('file', pdf, 'scan.pdf');

            expect(res.status).toBe(500);
            expect(res.body).toMatchObject({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
        });
    });

    describe('progress', () => {
        it('should report the progress of a finished extraction', async () => {
            scanned(2);
            const pdf = await createPdfBuffer(2);
            const extracted = await request(app).post('/extract').attach('file', pdf, 'scan.pdf');
            const jobId = String(extracted.headers['x-job-id']);

            const res = await request(app).get(`/progress/${jobId}`);

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                job_id: jobId,
                unit: 'pages',
                total_pages: 2,
                processed_pages: 2,
                status: 'completed',
                progress_percentage: 100,
            });
        });

        it('should answer 404 for unknown jobs', async () => {
            const res = await request(app).get('/progress/unknown');

            expect(res.status).toBe(404);
            expect(res.body).toMatchObject({ error: 'NOT_FOUND', message: 'Job not found: unknown' });
        });

        it('should stream the terminal update and release the record', async () => {
            scanned(2);
            const pdf = await createPdfBuffer(2);
            const extracted = await request(app).post('/extract').attach('file', pdf, 'scan.pdf');
            const jobId = String(extracted.headers['x-job-id']);

            const res = await request(app).get(`/progress-stream/${jobId}`);

            expect(res.status).toBe(200);
            expect(res.headers['content-type']).toContain('text/event-stream');
            const payload = JSON.stringify({
                job_id: jobId,
                unit: 'pages',
                total_pages: 2,
                processed_pages: 2,
                status: 'completed',
                progress_percentage: 100,
            });
            expect(res.text).toBe(`event: progress\ndata: ${payload}\n\n`);

            const after = await request(app).get(`/progress/${jobId}`);
            expect(after.status).toBe(404);
        });

        it('should answer 404 before opening a stream for unknown jobs', async () => {
            const res = await request(app).get('/progress-stream/unknown');

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('NOT_FOUND');
        });
    });

    describe('chunk jobs', () => {
        it('should upload, analyse and merge a document', async () => {
            const completed = new Promise<void>(resolve => {
                pipeline.events.once('job:completed', () => resolve());
            });
            const pdf = await createPdfBuffer(5);

            const upload = await request(app)
                .post('/upload')
                .field('chunk_size', '2')
                .field('overlap', '0')
                .attach('file', pdf, 'book.pdf');

            expect(upload.status).toBe(200);
            expect(upload.body).toMatchObject({ file_name: 'book.pdf', total_pages: 5, total_chunks: 3 });
            const jobId = String(upload.body.job_id);

            await completed;

            const status = await request(app).get(`/status/${jobId}`);
            expect(status.body).toEqual({
                job_id: jobId,
                file_name: 'book.pdf',
                status: 'completed',
                progress: { completed_chunks: 3, total_chunks: 3, percentage: 100 },
            });

            const result = await request(app).get(`/result/${jobId}`);
            expect(result.status).toBe(200);
            expect(result.body.content).toBe('text of pages 1-2\n\ntext of pages 3-4\n\ntext of pages 5-5');
            expect(result.body.confidence).toBe(80);
            expect(result.body.results[0]).toMatchObject({
                index: 0,
                start_page: 1,
                end_page: 2,
                status: 'completed',
                model: 'mock-model',
                retry_count: 0,
            });
        });

        it('should reject a result request while the job is processing', async () => {
            const gate = createDeferred<AnalysisResult>();
            provider.analyzeChunk.mockReturnValue(gate.promise);
            const pdf = await createPdfBuffer(2);

            const upload = await request(app).post('/upload').attach('file', pdf, 'book.pdf');
            const jobId = String(upload.body.job_id);

            const res = await request(app).get(`/result/${jobId}`);

            expect(res.status).toBe(400);
            expect(res.body).toMatchObject({
                error: 'JOB_NOT_READY',
                message: `Job ${jobId} is not complete (status: processing)`,
            });

            gate.resolve({ content: 'text', confidence: 90, model: 'mock-model' });
        });

        it('should validate chunking fields', async () => {
            const pdf = await createPdfBuffer(2);

            const res = await request(app)
                .post('/upload')
                .field('chunk_size', '0')
                .attach('file', pdf, 'book.pdf');

            expect(res.status).toBe(400);
            expect(res.body.message).toBe('Invalid chunk_size: Number must be greater than or equal to 1');
        });

        it('should answer 400 for a corrupt document', async () => {
            const res = await request(app)
                .post('/upload')
                .attach('file', Buffer.from('%PDF-1.7 garbage'), 'broken.pdf');

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('INVALID_DOCUMENT');
            expect(res.body.message).toMatch(/^Unable to read PDF: /);
        });

        it('should answer 404 for unknown job status', async () => {
            const res = await request(app).get('/status/missing');

            expect(res.status).toBe(404);
            expect(res.body.error).toBe('NOT_FOUND');
        });
    });

    describe('operational endpoints', () => {
        it('should report health', async () => {
            const res = await request(app).get('/health');

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({
                status: 'healthy',
                version: '1.0.0',
                active_jobs: 0,
                queue_depth: 0,
                last_processed_at: null,
            });
            expect(res.body.circuit_breakers).toEqual([
                { name: 'rasterizer', state: 'closed', failures: 0, failure_threshold: 5 },
                { name: 'analysis', state: 'closed', failures: 0, failure_threshold: 5 },
            ]);
        });

        it('should count requests per route in metrics', async () => {
            await request(app).get('/health');

            const res = await request(app).get('/metrics');

            expect(res.status).toBe(200);
            expect(res.body.counters['requests_total{route="/health"}']).toBe(1);
            expect(res.body.analysis).toEqual({
                provider: 'ocr',
                total_requests: 0,
                successful_requests: 0,
                failed_requests: 0,
                success_rate: 0,
                total_tokens: 0,
                estimated_cost: 0,
            });
        });

        it('should answer unknown routes with the error shape', async () => {
            const res = await request(app).get('/nope').set('x-correlation-id', 'corr-1');

            expect(res.status).toBe(404);
            expect(res.headers['x-correlation-id']).toBe('corr-1');
            expect(res.body).toEqual({
                error: 'NOT_FOUND',
                message: 'Route not found: GET /nope',
                correlation_id: 'corr-1',
            });
        });

        it('should raise errors under the request correlation id', async () => {
            const getStatus = vi.spyOn(pipeline, 'getStatus');

            const res = await request(app).get('/status/missing').set('x-correlation-id', 'corr-7');

            expect(res.body.correlation_id).toBe('corr-7');
            const thrown: unknown = getStatus.mock.results[0]?.value;
            expect(thrown).toBeInstanceOf(NotFoundError);
            if (thrown instanceof NotFoundError) {
                expect(thrown.correlationId).toBe('corr-7');
            }
            expect(getCorrelationId()).toBe('corr-7');
        });

        it('should mint a correlation id when none is sent', async () => {
            const res = await request(app).get('/health');

            expect(res.headers['x-correlation-id']).toMatch(/^ocr_\d+_/);
        });
    });
});
