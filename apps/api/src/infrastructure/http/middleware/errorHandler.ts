import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../../../domain/errors/AppError';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    logger.error(err.message, { name: err.name, path: req.path, stack: err.stack });

    if (err instanceof AppError) {
        return res.status(err.statusCode).json({
            status: 'error',
            message: err.message,
        });
    }

    if (err instanceof ZodError) {
        return res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
    }

    // express.json() rejects unparseable bodies with a SyntaxError carrying the raw body
    if (err instanceof SyntaxError && 'body' in err) {
        return res.status(400).json({
            status: 'fail',
            message: 'Malformed JSON body',
        });
    }

    // body parser errors (payload too large, unsupported charset) carry their own 4xx status
    if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
        return res.status(err.status).json({
            status: 'fail',
            message: err.message,
        });
    }

    return res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
