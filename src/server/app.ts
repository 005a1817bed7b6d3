import express, { type Express } from 'express';
import type { OcrPipeline } from '../ocr-pipeline.js';
import type { Logger } from '../utils/logger.js';
import { correlationId, errorHandler, notFoundHandler, requestLogger } from './middleware/index.js';
import { createRouter } from './routes.js';

export interface AppOptions {
    /** Request and error logger (default: the pipeline's logger) */
    logger?: Logger;
}

/**
 * Express application exposing an OcrPipeline over HTTP
 *
 * @example
 * ```typescript
 * const pipeline = createOcrPipeline(envToConfig(getEnv()));
 * createApp(pipeline).listen(8000);
 * ```
 */
export function createApp(pipeline: OcrPipeline, options: AppOptions = {}): Express {
    const logger = options.logger ?? pipeline.logger;
    const app = express();

    app.disable('x-powered-by');
    app.use(correlationId);
    app.use(requestLogger(logger, route => pipeline.recordRequest(route)));
    app.use(createRouter(pipeline));
    app.use(notFoundHandler);
    app.use(errorHandler(logger));

    return app;
}
