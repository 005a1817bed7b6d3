import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { FileTooLargeError, ValidationError } from '../../errors/index.js';

/**
 * Accept one in-memory file in the `file` field
 * Multer failures are translated into pipeline errors; a missing file is a ValidationError.
 */
export function singleFileUpload(maxFileBytes: number): RequestHandler {
    const receive = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxFileBytes, files: 1 },
    }).single('file');

    return (req: Request, res: Response, next: NextFunction): void => {
        receive(req, res, (error: unknown) => {
            if (error instanceof multer.MulterError) {
                next(error.code === 'LIMIT_FILE_SIZE'
                    ? new FileTooLargeError(undefined, maxFileBytes)
                    : new ValidationError(error.message, error.field));
                return;
            }
            if (error) {
                next(error);
                return;
            }
            if (!req.file) {
                next(new ValidationError('No file uploaded', 'file'));
                return;
            }
            next();
        });
    };
}
