import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { textBasedHintSchema } from '@notehint/types';
import { errorHandler } from '../src/infrastructure/http/middleware/errorHandler';
import { validateRequest } from '../src/infrastructure/http/middleware/validateRequest';
import { AppError } from '../src/domain/errors/AppError';
import logger from '../src/infrastructure/logger';

vi.mock('../src/infrastructure/logger', () => ({
    default: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('errorHandler', () => {
    let mockReq: Partial<Request>;
    let mockRes: Partial<Response>;
    const mockNext: NextFunction = vi.fn();

    beforeEach(() => {
        mockReq = { path: '/entities/get_text_based_hint' };
        mockRes = {
            status: vi.fn().mockReturnThis(),
            json: vi.fn().mockReturnThis(),
        };
    });

    it('should use the status code of an AppError', () => {
        errorHandler(new AppError('Invalid current_time', 400), mockReq as Request, mockRes as Response, mockNext);

        expect(mockRes.status).toHaveBeenCalledWith(400);
        expect(mockRes.json).toHaveBeenCalledWith({ status: 'error', message: 'Invalid current_time' });
    });

    it('should report validation errors with their issues', () => {
        const result = textBasedHintSchema.safeParse({ context: [] });
        expect(result.success).toBe(false);
        if (result.success) return;

        errorHandler(result.error, mockReq as Request, mockRes as Response, mockNext);

        expect(mockRes.status).toHaveBeenCalledWith(400);
        expect(mockRes.json).toHaveBeenCalledWith({
            status: 'fail',
            message: 'Validation Error',
            errors: result.error.issues,
        });
    });

    it('should report malformed JSON bodies', () => {
        const error = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{"context": }' });

        errorHandler(error, mockReq as Request, mockRes as Response, mockNext);

        expect(mockRes.status).toHaveBeenCalledWith(400);
        expect(mockRes.json).toHaveBeenCalledWith({ status: 'fail', message: 'Malformed JSON body' });
    });

    it('should keep the client status of body parser errors', () => {
        const error = Object.assign(new Error('request entity too large'), { status: 413, type: 'entity.too.large' });

        errorHandler(error, mockReq as Request, mockRes as Response, mockNext);

        expect(mockRes.status).toHaveBeenCalledWith(413);
        expect(mockRes.json).toHaveBeenCalledWith({ status: 'fail', message: 'request entity too large' });
    });

    it('should not pass on server-side statuses carried by an error', () => {
        const error = Object.assign(new Error('upstream exploded'), { status: 502 });

        errorHandler(error, mockReq as Request, mockRes as Response, mockNext);

        expect(mockRes.status).toHaveBeenCalledWith(500);
        expect(mockRes.json).toHaveBeenCalledWith({ status: 'error', message: 'Internal Server Error' });
    });

    it('should hide unexpected errors behind a 500', () => {
        errorHandler(new Error('vectorizer exploded'), mockReq as Request, mockRes as Response, mockNext);

        expect(mockRes.status).toHaveBeenCalledWith(500);
        expect(mockRes.json).toHaveBeenCalledWith({ status: 'error', message: 'Internal Server Error' });
        expect(logger.error).toHaveBeenCalledWith('vectorizer exploded', expect.objectContaining({
            name: 'Error',
            path: '/entities/get_text_based_hint',
        }));
    });
});

describe('validateRequest', () => {
    const middleware = validateRequest(textBasedHintSchema);

    it('should replace the body with the parsed value and continue', async () => {
        const req: Partial<Request> = {
            body: {
                context: [{ text: 'Call mom', createdAt: '2025-06-10 09:00', categoryType: 'Call' }],
                current_time: '2025-06-14 17:10',
            },
        };
        const next = vi.fn();

        await middleware(req as Request, {} as Response, next);

        expect(next).toHaveBeenCalledWith();
        expect(req.body.context[0].triggers).toEqual([]);
    });

    it('should pass validation errors on', async () => {
        const req: Partial<Request> = { body: { context: 'nope' } };
        const next = vi.fn();

        await middleware(req as Request, {} as Response, next);

        expect(next).toHaveBeenCalledTimes(1);
        expect(next.mock.calls[0][0]).toBeInstanceOf(Error);
        expect(next.mock.calls[0][0].name).toBe('ZodError');
    });
});
