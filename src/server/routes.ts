import { randomUUID } from 'crypto';
import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { OcrPipeline } from '../ocr-pipeline.js';
import { RASTER_DEFAULTS } from '../config/constants.js';
import { singleFileUpload } from './middleware/upload.js';
import {
    serializeExtract,
    serializeHealth,
    serializeMetrics,
    serializeProgress,
    serializeResult,
    serializeStatus,
    serializeUpload,
} from './serializers.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections of async handlers to the error middleware
 */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

const extractQuerySchema = z.object({
    dpi: z.coerce.number().int().min(RASTER_DEFAULTS.MIN_DPI).max(RASTER_DEFAULTS.MAX_DPI).optional(),
});

const uploadFieldsSchema = z.object({
    chunk_size: z.coerce.number().int().min(1).optional(),
    overlap: z.coerce.number().int().min(0).optional(),
});

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue?.path.join('.');
        throw new ValidationError(
            issue ? `Invalid ${field}: ${issue.message}` : 'Invalid request',
            field,
            { issues: result.error.issues.map(entry => `${entry.path.join('.')}: ${entry.message}`) }
        );
    }
    return result.data;
}

function requireFile(req: Request): Express.Multer.File {
    if (!req.file) {
        throw new ValidationError('No file uploaded', 'file');
    }
    return req.file;
}

function jobIdParam(req: Request): string {
    const jobId = req.params.jobId;
    if (!jobId) {
        throw new ValidationError('Missing job id', 'jobId');
    }
    return jobId;
}

/**
 * HTTP routes over an OcrPipeline
 */
export function createRouter(pipeline: OcrPipeline): Router {
    const router = Router();
    const upload = singleFileUpload(pipeline.getConfig().limits.maxFileBytes);

    router.post('/extract', upload, asyncHandler(async (req, res) => {
        const file = requireFile(req);
        const { dpi } = parseInput(extractQuerySchema, req.query);
        const jobId = randomUUID();

        const result = await pipeline.extract(file.buffer, {
            filename: file.originalname,
            jobId,
            ...(dpi !== undefined && { dpi }),
        });

        res.setHeader('X-Job-ID', jobId);
        res.json(serializeExtract(result));
    }));

    router.get('/progress/:jobId', (req, res) => {
        res.json(serializeProgress(pipeline.getProgress(jobIdParam(req))));
    });

    router.get('/progress-stream/:jobId', asyncHandler(async (req, res) => {
        const stream = pipeline.streamProgress(jobIdParam(req));

        res.status(200);
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();

        res.on('close', () => stream.close());

        for await (const snapshot of stream) {
            res.write(`event: progress\ndata: ${JSON.stringify(serializeProgress(snapshot))}\n\n`);
        }
        res.end();
    }));

    router.post('/upload', upload, asyncHandler(async (req, res) => {
        const file = requireFile(req);
        const fields = parseInput(uploadFieldsSchema, req.body);

        const result = await pipeline.upload(file.buffer, {
            filename: file.originalname,
            ...(fields.chunk_size !== undefined && { chunkSize: fields.chunk_size }),
            ...(fields.overlap !== undefined && { overlap: fields.overlap }),
        });

        res.json(serializeUpload(result));
    }));

    router.get('/status/:jobId', (req, res) => {
        res.json(serializeStatus(pipeline.getStatus(jobIdParam(req))));
    });

    router.get('/result/:jobId', (req, res) => {
        res.json(serializeResult(pipeline.getResult(jobIdParam(req))));
    });

    router.get('/health', (_req, res) => {
        res.json(serializeHealth(pipeline.health()));
    });

    router.get('/metrics', (_req, res) => {
        res.json(serializeMetrics(pipeline.metrics()));
    });

    return router;
}
