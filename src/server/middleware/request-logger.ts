import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../../utils/logger.js';
import { readCorrelationId } from './correlation-id.js';

/**
 * Route template of a matched request, e.g. `/status/:jobId`
 */
export function routeLabel(req: Request): string {
    const route: unknown = req.route;
    if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
        return route.path;
    }
    return 'unmatched';
}

/**
 * Logs method, path, status and duration of every request once the response finishes
 */
export function requestLogger(logger: Logger, onFinish?: (route: string) => void): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const start = Date.now();

        res.on('finish', () => {
            const route = routeLabel(req);
            onFinish?.(route);
            logger.info('Request completed', {
                correlationId: readCorrelationId(res),
                method: req.method,
                path: req.originalUrl,
                route,
                status: res.statusCode,
                durationMs: Date.now() - start,
            });
        });

        next();
    };
}
