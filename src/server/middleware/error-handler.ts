import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import { OcrPipelineError, errorMessage } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import { readCorrelationId } from './correlation-id.js';

/**
 * Renders every failure as `{ error, message, correlation_id }` with the error's status code
 * Non-pipeline errors become a 500 without their internal message.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
        const correlationId = readCorrelationId(res);
        const known = err instanceof OcrPipelineError;
        const status = known ? err.statusCode : 500;

        const meta = {
            correlationId,
            method: req.method,
            path: req.originalUrl,
            status,
            code: known ? err.code : 'INTERNAL_ERROR',
            error: errorMessage(err),
        };
        if (status >= 500) {
            logger.error('Request failed', meta);
        } else {
            logger.warn('Request rejected', meta);
        }

        if (res.headersSent) {
            next(err);
            return;
        }

        res.status(status).json({
            error: known ? err.code : 'INTERNAL_ERROR',
            message: known ? err.message : 'Internal server error',
            correlation_id: correlationId,
        });
    };
}

/**
 * 404 for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({
        error: 'NOT_FOUND',
        message: `Route not found: ${req.method} ${req.path}`,
        correlation_id: readCorrelationId(res),
    });
}
