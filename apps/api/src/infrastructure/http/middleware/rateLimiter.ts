import rateLimit from 'express-rate-limit';

/**
 * Rate limiter for hint endpoints
 * Limits to 30 requests per minute per IP address
 */
export const hintRateLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 30,
    message: { status: 'error', message: 'Too many hint requests, try again later' },
    standardHeaders: true,
    legacyHeaders: false,
});
