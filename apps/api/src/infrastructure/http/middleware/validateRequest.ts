import type { Request, Response, NextFunction } from 'express';
import type { ZodType } from 'zod';

/**
 * Replaces req.body with the parsed value, so schema defaults reach the handler.
 */
export const validateRequest = (schema: ZodType) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            req.body = await schema.parseAsync(req.body);
            next();
        } catch (error) {
            next(error);
        }
    };
};
