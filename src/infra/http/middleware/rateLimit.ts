import rateLimit from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

/**
 * General API rate limiter (per client IP, one-minute window).
 * Uses in-memory store (resets on server restart).
 */
export function createApiRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: limitPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res, _next, options) => {
      const response: ErrorResponse = {
        code: 'RATE_LIMITED',
        message: 'Too many requests, please try again later.',
      };
      res.status(options.statusCode).json(response);
    },
  });
}
