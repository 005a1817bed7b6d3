import type { NextFunction, Request, Response } from 'express';
import { generateCorrelationId, setCorrelationId } from '../../errors/index.js';

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Reuse the caller's correlation id or mint one; exposed on `res.locals`, echoed back
 * and made current so errors raised and entries logged for the request carry it
 */
export function correlationId(req: Request, res: Response, next: NextFunction): void {
    const incoming = req.get(CORRELATION_HEADER);
    const id = incoming !== undefined && incoming.trim().length > 0 ? incoming.trim() : generateCorrelationId();

    res.locals.correlationId = id;
    setCorrelationId(id);
    res.setHeader(CORRELATION_HEADER, id);
    next();
}

/**
 * Correlation id of the current response
 */
export function readCorrelationId(res: Response): string {
    const id: unknown = res.locals.correlationId;
    return typeof id === 'string' ? id : generateCorrelationId();
}
